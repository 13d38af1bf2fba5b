import { StrKey } from '@stellar/stellar-sdk';

/**
 * Address utilities for callers identified by Stellar addresses.
 */

/**
 * Validate a Stellar public key (G... address).
 *
 * @example
 * ```ts
 * isValidPublicKey(Keypair.random().publicKey()); // true
 * isValidPublicKey('invalid'); // false
 * ```
 */
export function isValidPublicKey(address: string): boolean {
  try {
    return StrKey.isValidEd25519PublicKey(address);
  } catch {
    return false;
  }
}

/**
 * Validate a Stellar contract address (C... address).
 */
export function isValidContractId(address: string): boolean {
  try {
    return StrKey.isValidContract(address);
  } catch {
    return false;
  }
}

/**
 * Validate any Stellar address (public key or contract).
 */
export function isValidAddress(address: string): boolean {
  return isValidPublicKey(address) || isValidContractId(address);
}

/**
 * Truncate an address for display purposes.
 *
 * Keeps the first and last `chars` characters and replaces the middle
 * with "...". Strings too short to shorten are returned unchanged.
 *
 * @example
 * ```ts
 * truncateAddress('GBRPYHIL2CI3FNQ4BXLFMNDLFJUNPU2HY3ZMFSHONUCEOASW7QC7OX2H');
 * // 'GBRP...OX2H'
 * truncateAddress('alice'); // 'alice'
 * ```
 */
export function truncateAddress(address: string, chars: number = 4): string {
  if (address.length <= chars * 2 + 3) return address;
  return `${address.slice(0, chars)}...${address.slice(-chars)}`;
}
