import { PRECISION } from '../config';
import { InvalidShareError } from '../errors';
import { PoolState, ProvideQuote, WithdrawAmounts } from '../types/pool';
import { mulDiv, Percent } from '../utils/math';
import { validateAmount } from '../utils/validation';
import { InvariantEngine } from './invariant';

/**
 * Estimate module -- deposit and withdrawal amounts at the current ratio.
 *
 * Every method is a pure read over the pool totals: repeated calls against
 * unchanged state return identical results. All division floors.
 */
export class EstimateCalculator {
  private state: Readonly<PoolState>;
  private invariant: InvariantEngine;

  constructor(state: Readonly<PoolState>, invariant: InvariantEngine) {
    this.state = state;
    this.invariant = invariant;
  }

  /**
   * Token 1 required alongside `amountToken2` to match the pool ratio.
   *
   * @throws {ZeroLiquidityError} If the pool is empty.
   * @example
   * // pool (100, 200)
   * calc.equivalentToken1For(50n); // 25n
   */
  equivalentToken1For(amountToken2: bigint): bigint {
    validateAmount(amountToken2, 'amountToken2');
    this.invariant.activePool();
    return mulDiv(this.state.totalToken1, amountToken2, this.state.totalToken2);
  }

  /**
   * Token 2 required alongside `amountToken1` to match the pool ratio.
   *
   * @throws {ZeroLiquidityError} If the pool is empty.
   */
  equivalentToken2For(amountToken1: bigint): bigint {
    validateAmount(amountToken1, 'amountToken1');
    this.invariant.activePool();
    return mulDiv(this.state.totalToken2, amountToken1, this.state.totalToken1);
  }

  /**
   * Tokens released by burning `share` shares.
   *
   * @throws {ZeroLiquidityError} If the pool is empty.
   * @throws {InvalidShareError} If `share` exceeds the total shares issued.
   */
  withdrawEstimate(share: bigint): WithdrawAmounts {
    validateAmount(share, 'share');
    this.invariant.activePool();

    const { totalShares, totalToken1, totalToken2 } = this.state;
    if (share > totalShares) {
      throw new InvalidShareError(share, totalShares);
    }

    return {
      amountToken1: mulDiv(share, totalToken1, totalShares),
      amountToken2: mulDiv(share, totalToken2, totalShares),
    };
  }

  /**
   * Quote a deposit of `amountToken1` at the current pool ratio.
   *
   * The paired token 2 amount is floored, which can leave the two share
   * computations unequal; `valid` reports whether `provide` would accept
   * the quoted pair, ignoring the caller's balances.
   *
   * @throws {ZeroLiquidityError} If the pool is empty.
   */
  quoteProvide(amountToken1: bigint): ProvideQuote {
    const amountToken2 = this.equivalentToken2For(amountToken1);
    const { totalShares, totalToken1, totalToken2 } = this.state;

    const share1 = mulDiv(totalShares, amountToken1, totalToken1);
    const share2 = mulDiv(totalShares, amountToken2, totalToken2);
    const estimatedShares = share1 < share2 ? share1 : share2;

    return {
      amountToken1,
      amountToken2,
      estimatedShares,
      shareOfPool: new Percent(estimatedShares, totalShares + estimatedShares),
      price1In2: mulDiv(totalToken2, PRECISION.PRICE_SCALE, totalToken1),
      price2In1: mulDiv(totalToken1, PRECISION.PRICE_SCALE, totalToken2),
      valid: share1 === share2 && share1 > 0n,
    };
  }
}
