/**
 * Numeric pool error codes, in the declaration order of the pool error
 * taxonomy.
 */
export enum PoolErrorCode {
  ZeroLiquidity = 0,
  ZeroAmount = 1,
  InsufficientAmount = 2,
  NonEquivalentValue = 3,
  ThresholdNotReached = 4,
  InvalidShare = 5,
  InsufficientLiquidity = 6,
  SlippageExceeded = 7,
}

/** Human-readable messages for pool error codes */
export const POOL_ERROR_MAP: Record<PoolErrorCode, string> = {
  [PoolErrorCode.ZeroLiquidity]: 'Zero liquidity',
  [PoolErrorCode.ZeroAmount]: 'Amount cannot be zero',
  [PoolErrorCode.InsufficientAmount]: 'Insufficient amount',
  [PoolErrorCode.NonEquivalentValue]: 'Equivalent value of tokens not provided',
  [PoolErrorCode.ThresholdNotReached]: 'Asset value less than threshold for contribution',
  [PoolErrorCode.InvalidShare]: 'Share should be less than total shares',
  [PoolErrorCode.InsufficientLiquidity]: 'Insufficient pool balance',
  [PoolErrorCode.SlippageExceeded]: 'Slippage tolerance exceeded',
};
