import { ValidationError } from './errors';
import { Logger } from './types/common';
import { PoolEventListener } from './types/events';
import { AssetLedger } from './modules/ledger';

/**
 * Pool construction options.
 */
export interface PoolConfig {
  /** Trading fee in basis points; values >= FEE_BPS_LIMIT are stored as 0 */
  feeBps: bigint | number;
  /** Optional logger for operation instrumentation. */
  logger?: Logger;
  /** Asset-balance collaborator. Defaults to an in-memory ledger owned by the pool. */
  ledger?: AssetLedger;
  /** Observer invoked after every committed operation. */
  onEvent?: PoolEventListener;
  /** Also require callers to be Stellar account or contract addresses, for hosts keyed by them */
  strictAddresses?: boolean;
}

/**
 * Default pool configuration values.
 */
export const DEFAULTS = {
  strictAddresses: false,
  /** Characters kept on each side when truncating callers in logs */
  logAddressChars: 4,
} as const;

/** Fixed scaling constant for share amounts */
const SHARE_PRECISION = 1_000_000n;

/**
 * Integer precision constants for share and price math.
 */
export const PRECISION = {
  SHARE_PRECISION,
  /** Shares minted for the first deposit into an empty pool */
  GENESIS_SHARES: 100n * SHARE_PRECISION,
  /** Exclusive upper bound of the fee parameter */
  FEE_BPS_LIMIT: 1000n,
  PRICE_SCALE: 10n ** 14n,
} as const;

/**
 * Clamp a fee parameter into [0, FEE_BPS_LIMIT). Out-of-range values become 0.
 *
 * @throws {ValidationError} If a number fee is not an integer.
 */
export function normalizeFeeBps(feeBps: bigint | number): bigint {
  if (typeof feeBps === 'number' && !Number.isInteger(feeBps)) {
    throw new ValidationError('feeBps must be an integer', { feeBps });
  }
  const fee = BigInt(feeBps);
  if (fee < 0n || fee >= PRECISION.FEE_BPS_LIMIT) return 0n;
  return fee;
}
