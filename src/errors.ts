/**
 * Typed error hierarchy for the liquidity pool engine.
 *
 * All errors extend PoolError and carry a machine-readable error code
 * for programmatic handling plus a human-readable message. Every one of
 * them is recoverable by the caller; none leaves the pool modified.
 */

import { PoolErrorCode, POOL_ERROR_MAP } from './errors/codes';
import { AssetKind } from './types/common';

/**
 * Base error class for all pool errors.
 */
export class PoolError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(
    code: string,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'PoolError';
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Pool holds no assets; ratio-dependent reads and writes are undefined.
 */
export class ZeroLiquidityError extends PoolError {
  constructor(additionalDetails?: Record<string, unknown>) {
    super(
      'ZERO_LIQUIDITY',
      POOL_ERROR_MAP[PoolErrorCode.ZeroLiquidity],
      additionalDetails,
    );
    this.name = 'ZeroLiquidityError';
  }
}

/**
 * Requested amount is exactly zero.
 */
export class ZeroAmountError extends PoolError {
  constructor(asset: AssetKind, additionalDetails?: Record<string, unknown>) {
    super(
      'ZERO_AMOUNT',
      POOL_ERROR_MAP[PoolErrorCode.ZeroAmount],
      { asset, ...additionalDetails },
    );
    this.name = 'ZeroAmountError';
  }
}

/**
 * Requested amount exceeds the caller's balance of that asset.
 */
export class InsufficientAmountError extends PoolError {
  constructor(
    asset: AssetKind,
    requested: bigint,
    available: bigint,
    additionalDetails?: Record<string, unknown>,
  ) {
    super(
      'INSUFFICIENT_AMOUNT',
      `${POOL_ERROR_MAP[PoolErrorCode.InsufficientAmount]}: requested ${requested} ${asset}, available ${available}`,
      {
        asset,
        requested: requested.toString(),
        available: available.toString(),
        ...additionalDetails,
      },
    );
    this.name = 'InsufficientAmountError';
  }
}

/**
 * Deposit ratio does not match the current pool ratio exactly.
 */
export class NonEquivalentValueError extends PoolError {
  constructor(share1: bigint, share2: bigint, additionalDetails?: Record<string, unknown>) {
    super(
      'NON_EQUIVALENT_VALUE',
      POOL_ERROR_MAP[PoolErrorCode.NonEquivalentValue],
      {
        share1: share1.toString(),
        share2: share2.toString(),
        ...additionalDetails,
      },
    );
    this.name = 'NonEquivalentValueError';
  }
}

/**
 * Computed share amount rounds down to zero.
 */
export class ThresholdNotReachedError extends PoolError {
  constructor(additionalDetails?: Record<string, unknown>) {
    super(
      'THRESHOLD_NOT_REACHED',
      POOL_ERROR_MAP[PoolErrorCode.ThresholdNotReached],
      additionalDetails,
    );
    this.name = 'ThresholdNotReachedError';
  }
}

/**
 * Withdrawal share amount exceeds the total shares issued.
 */
export class InvalidShareError extends PoolError {
  constructor(share: bigint, totalShares: bigint, additionalDetails?: Record<string, unknown>) {
    super(
      'INVALID_SHARE',
      POOL_ERROR_MAP[PoolErrorCode.InvalidShare],
      {
        share: share.toString(),
        totalShares: totalShares.toString(),
        ...additionalDetails,
      },
    );
    this.name = 'InvalidShareError';
  }
}

/**
 * Insufficient pool balance. Reserved for swap-style operations.
 */
export class InsufficientLiquidityError extends PoolError {
  constructor(additionalDetails?: Record<string, unknown>) {
    super(
      'INSUFFICIENT_LIQUIDITY',
      POOL_ERROR_MAP[PoolErrorCode.InsufficientLiquidity],
      additionalDetails,
    );
    this.name = 'InsufficientLiquidityError';
  }
}

/**
 * Slippage tolerance exceeded. Reserved for swap-style operations.
 */
export class SlippageError extends PoolError {
  constructor(additionalDetails?: Record<string, unknown>) {
    super(
      'SLIPPAGE_EXCEEDED',
      POOL_ERROR_MAP[PoolErrorCode.SlippageExceeded],
      additionalDetails,
    );
    this.name = 'SlippageError';
  }
}

/**
 * Invalid input parameters (negative amounts, malformed callers).
 */
export class ValidationError extends PoolError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('VALIDATION_ERROR', message, details);
    this.name = 'ValidationError';
  }
}

/**
 * Pool accounting no longer satisfies its invariants.
 */
export class InvariantViolationError extends PoolError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVARIANT_VIOLATION', message, details);
    this.name = 'InvariantViolationError';
  }
}
