import { InvariantViolationError, ZeroLiquidityError } from '../errors';
import { AssetKind } from '../types/common';
import { PoolState } from '../types/pool';
import { AssetLedger } from './ledger';

/**
 * Constant-product bookkeeping over the pool totals.
 *
 * K is used only as the "funded" indicator: a pool with K == 0 holds no
 * assets and every ratio-dependent read is undefined.
 */
export class InvariantEngine {
  private state: Readonly<PoolState>;

  constructor(state: Readonly<PoolState>) {
    this.state = state;
  }

  /**
   * Product of the two pooled token totals.
   */
  getK(): bigint {
    return this.state.totalToken1 * this.state.totalToken2;
  }

  isActive(): boolean {
    return this.getK() !== 0n;
  }

  /**
   * Gate for ratio-dependent computations.
   *
   * @throws {ZeroLiquidityError} If the pool holds no assets.
   */
  activePool(): void {
    if (!this.isActive()) {
      throw new ZeroLiquidityError();
    }
  }

  /**
   * Audit the pool totals against the ledger.
   *
   * Holds after every successful operation: no negative totals, both token
   * totals zero or both non-zero, and total shares equal to the sum of the
   * holders' share balances.
   *
   * @throws {InvariantViolationError} On the first invariant found broken.
   */
  checkInvariants(ledger: AssetLedger): void {
    const { totalShares, totalToken1, totalToken2 } = this.state;

    if (totalShares < 0n || totalToken1 < 0n || totalToken2 < 0n) {
      throw new InvariantViolationError('Pool totals must not be negative', {
        totalShares: totalShares.toString(),
        totalToken1: totalToken1.toString(),
        totalToken2: totalToken2.toString(),
      });
    }

    if ((totalToken1 === 0n) !== (totalToken2 === 0n)) {
      throw new InvariantViolationError('Pool is partially funded', {
        totalToken1: totalToken1.toString(),
        totalToken2: totalToken2.toString(),
      });
    }

    let issued = 0n;
    for (const holder of ledger.holders(AssetKind.SHARE)) {
      issued += ledger.balanceOf(holder, AssetKind.SHARE);
    }
    if (issued !== totalShares) {
      throw new InvariantViolationError('Share balances do not sum to total shares', {
        totalShares: totalShares.toString(),
        heldShares: issued.toString(),
      });
    }
  }
}
