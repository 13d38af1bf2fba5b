export { LiquidityPool } from './pool';
export type { PoolConfig } from './config';
export { DEFAULTS, PRECISION, normalizeFeeBps } from './config';

export type { AssetLedger } from './modules/ledger';
export { InMemoryAssetLedger } from './modules/ledger';
export { InvariantEngine } from './modules/invariant';
export { EstimateCalculator } from './modules/estimates';
export type { LiquidityManagerDeps } from './modules/liquidity';
export { LiquidityManager } from './modules/liquidity';

export * from './types/common';
export * from './types/pool';
export * from './types/events';

export * from './errors';
export { PoolErrorCode, POOL_ERROR_MAP } from './errors/codes';

export { Fraction, Percent, mulDiv } from './utils/math';
export { isValidAddress, isValidContractId, isValidPublicKey, truncateAddress } from './utils/addresses';
export { validateAmount, validateCaller } from './utils/validation';
