import { ValidationError } from '../errors';
import { CallerId } from '../types/common';
import { isValidAddress } from './addresses';

/**
 * Validate a caller identity.
 *
 * Any non-empty string is a caller. `strict` adds a host-specific check
 * for deployments whose callers are Stellar account or contract addresses.
 *
 * @throws {ValidationError} If the caller is empty or, in strict mode, malformed.
 */
export function validateCaller(caller: CallerId, strict: boolean, field: string = 'caller'): void {
  if (typeof caller !== 'string' || caller.length === 0) {
    throw new ValidationError(`${field} must be a non-empty string`, { field });
  }
  if (strict && !isValidAddress(caller)) {
    throw new ValidationError(`${field} is not a valid Stellar address`, {
      field,
      value: caller,
    });
  }
}

/**
 * Validate that an amount is a non-negative bigint.
 *
 * Zero is allowed here; operations that reject zero raise ZeroAmountError
 * against the caller's balance instead.
 *
 * @throws {ValidationError} If the amount is not a bigint or is negative.
 */
export function validateAmount(amount: bigint, field: string): void {
  if (typeof amount !== 'bigint') {
    throw new ValidationError(`${field} must be a bigint`, { field });
  }
  if (amount < 0n) {
    throw new ValidationError(`${field} must not be negative`, {
      field,
      value: amount.toString(),
    });
  }
}
