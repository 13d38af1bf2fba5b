import { Percent } from '../utils/math';

/**
 * Mutable pool aggregate. Owned exclusively by a LiquidityPool instance.
 */
export interface PoolState {
  /** Sum of all issued shares */
  totalShares: bigint;
  /** Quantity of token 1 locked in the pool */
  totalToken1: bigint;
  /** Quantity of token 2 locked in the pool */
  totalToken2: bigint;
  /** Trading fee parameter in basis points, within [0, 1000) */
  feeBps: bigint;
}

/**
 * Read-only view of the pool totals and fee parameter.
 */
export type PoolDetails = Readonly<PoolState>;

/**
 * Off-pool balances and share holding of a single caller.
 */
export interface Holdings {
  /** Token 1 available to deposit */
  token1: bigint;
  /** Token 2 available to deposit */
  token2: bigint;
  /** Pool shares held */
  shares: bigint;
}

/**
 * Token amounts released by burning a quantity of shares.
 */
export interface WithdrawAmounts {
  amountToken1: bigint;
  amountToken2: bigint;
}

/**
 * Quote for providing liquidity at the current pool ratio.
 */
export interface ProvideQuote {
  /** Token 1 amount the quote was computed for */
  amountToken1: bigint;
  /** Token 2 amount required to match the pool ratio */
  amountToken2: bigint;
  /** Shares the deposit would mint */
  estimatedShares: bigint;
  /** Share of the pool held by the new shares after the deposit */
  shareOfPool: Percent;
  /** Price of token 1 in token 2, scaled by PRICE_SCALE */
  price1In2: bigint;
  /** Price of token 2 in token 1, scaled by PRICE_SCALE */
  price2In1: bigint;
  /** True if `provide` would accept this exact pair at the current ratio */
  valid: boolean;
}

/**
 * Liquidity position of a caller.
 */
export interface LPPosition {
  /** Shares held by the caller */
  balance: bigint;
  /** Total shares issued by the pool */
  totalShares: bigint;
  /** Caller's fraction of the pool */
  share: Percent;
  /** Implied amount of token 1 belonging to the caller */
  token1Amount: bigint;
  /** Implied amount of token 2 belonging to the caller */
  token2Amount: bigint;
}
