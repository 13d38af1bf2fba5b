import { DEFAULTS, PRECISION } from '../config';
import {
  InsufficientAmountError,
  NonEquivalentValueError,
  ThresholdNotReachedError,
  ZeroAmountError,
} from '../errors';
import { AssetKind, CallerId, Logger } from '../types/common';
import { PoolEventInput } from '../types/events';
import { Holdings, LPPosition, PoolDetails, PoolState, WithdrawAmounts } from '../types/pool';
import { truncateAddress } from '../utils/addresses';
import { mulDiv, Percent } from '../utils/math';
import { validateAmount, validateCaller } from '../utils/validation';
import { EstimateCalculator } from './estimates';
import { InvariantEngine } from './invariant';
import { AssetLedger } from './ledger';

/**
 * Dependencies handed to the LiquidityManager by its owning pool.
 */
export interface LiquidityManagerDeps {
  state: PoolState;
  ledger: AssetLedger;
  invariant: InvariantEngine;
  estimates: EstimateCalculator;
  strictAddresses: boolean;
  emit: (event: PoolEventInput) => void;
  logger?: Logger;
}

/**
 * Liquidity module -- deposits, withdrawals and account reads.
 *
 * Each mutating operation runs every check first and only then writes to
 * the ledger and the pool totals, so a thrown error leaves both untouched.
 */
export class LiquidityManager {
  private state: PoolState;
  private ledger: AssetLedger;
  private invariant: InvariantEngine;
  private estimates: EstimateCalculator;
  private strictAddresses: boolean;
  private emit: (event: PoolEventInput) => void;
  private logger?: Logger;

  constructor(deps: LiquidityManagerDeps) {
    this.state = deps.state;
    this.ledger = deps.ledger;
    this.invariant = deps.invariant;
    this.estimates = deps.estimates;
    this.strictAddresses = deps.strictAddresses;
    this.emit = deps.emit;
    this.logger = deps.logger;
  }

  /**
   * Deposit both tokens and mint pool shares to the caller.
   *
   * The first deposit into an empty pool always mints GENESIS_SHARES,
   * whatever the amounts; it only fixes the price ratio. Later deposits
   * must match the pool ratio exactly under floor division.
   *
   * @returns Shares minted.
   * @throws {ZeroAmountError} If either amount is zero.
   * @throws {InsufficientAmountError} If either amount exceeds the caller's balance.
   * @throws {NonEquivalentValueError} If the amounts are off the pool ratio.
   * @throws {ThresholdNotReachedError} If the deposit rounds to zero shares.
   * @example
   * pool.faucet('alice', 1000n, 1000n);
   * pool.provide('alice', 100n, 100n); // 100_000_000n
   */
  provide(caller: CallerId, amountToken1: bigint, amountToken2: bigint): bigint {
    validateCaller(caller, this.strictAddresses);
    validateAmount(amountToken1, 'amountToken1');
    validateAmount(amountToken2, 'amountToken2');

    this.logger?.debug('provide: validating deposit', {
      caller: this.display(caller),
      amountToken1,
      amountToken2,
    });

    this.checkAvailable(caller, AssetKind.TOKEN1, amountToken1);
    this.checkAvailable(caller, AssetKind.TOKEN2, amountToken2);

    let share: bigint;
    if (this.state.totalShares === 0n) {
      share = PRECISION.GENESIS_SHARES;
    } else {
      const share1 = mulDiv(this.state.totalShares, amountToken1, this.state.totalToken1);
      const share2 = mulDiv(this.state.totalShares, amountToken2, this.state.totalToken2);
      if (share1 !== share2) {
        throw new NonEquivalentValueError(share1, share2);
      }
      share = share1;
    }

    if (share === 0n) {
      throw new ThresholdNotReachedError();
    }

    this.ledger.debit(caller, AssetKind.TOKEN1, amountToken1);
    this.ledger.debit(caller, AssetKind.TOKEN2, amountToken2);
    this.state.totalToken1 += amountToken1;
    this.state.totalToken2 += amountToken2;
    this.state.totalShares += share;
    this.ledger.credit(caller, AssetKind.SHARE, share);

    this.logger?.info('provide: liquidity added', {
      caller: this.display(caller),
      shares: share,
      totalShares: this.state.totalShares,
    });
    this.emit({ type: 'provide', caller, amountToken1, amountToken2, shares: share });

    return share;
  }

  /**
   * Burn shares and release the proportional token amounts to the caller.
   *
   * The caller's share balance is checked before pool activity.
   *
   * @throws {ZeroAmountError} If `share` is zero.
   * @throws {InsufficientAmountError} If `share` exceeds the caller's shares.
   * @throws {ZeroLiquidityError} If the pool is empty.
   * @throws {InvalidShareError} If `share` exceeds the total shares issued.
   */
  withdraw(caller: CallerId, share: bigint): WithdrawAmounts {
    validateCaller(caller, this.strictAddresses);
    validateAmount(share, 'share');

    this.logger?.debug('withdraw: validating withdrawal', {
      caller: this.display(caller),
      share,
    });

    this.checkAvailable(caller, AssetKind.SHARE, share);
    const { amountToken1, amountToken2 } = this.estimates.withdrawEstimate(share);

    this.ledger.debit(caller, AssetKind.SHARE, share);
    this.state.totalShares -= share;
    this.state.totalToken1 -= amountToken1;
    this.state.totalToken2 -= amountToken2;
    this.ledger.credit(caller, AssetKind.TOKEN1, amountToken1);
    this.ledger.credit(caller, AssetKind.TOKEN2, amountToken2);

    this.logger?.info('withdraw: liquidity removed', {
      caller: this.display(caller),
      shares: share,
      totalShares: this.state.totalShares,
    });
    this.emit({ type: 'withdraw', caller, amountToken1, amountToken2, shares: share });

    return { amountToken1, amountToken2 };
  }

  /**
   * Credit free tokens to the caller's off-pool balances.
   *
   * No balance checks apply; the pool totals are not touched.
   */
  faucet(caller: CallerId, amountToken1: bigint, amountToken2: bigint): void {
    validateCaller(caller, this.strictAddresses);
    validateAmount(amountToken1, 'amountToken1');
    validateAmount(amountToken2, 'amountToken2');

    this.ledger.credit(caller, AssetKind.TOKEN1, amountToken1);
    this.ledger.credit(caller, AssetKind.TOKEN2, amountToken2);

    this.logger?.info('faucet: tokens credited', {
      caller: this.display(caller),
      amountToken1,
      amountToken2,
    });
    this.emit({ type: 'faucet', caller, amountToken1, amountToken2 });
  }

  holdingsOf(caller: CallerId): Holdings {
    return {
      token1: this.ledger.balanceOf(caller, AssetKind.TOKEN1),
      token2: this.ledger.balanceOf(caller, AssetKind.TOKEN2),
      shares: this.ledger.balanceOf(caller, AssetKind.SHARE),
    };
  }

  poolDetails(): PoolDetails {
    const { totalToken1, totalToken2, totalShares, feeBps } = this.state;
    return { totalToken1, totalToken2, totalShares, feeBps };
  }

  /**
   * Caller's share of the pool and the token amounts it currently implies.
   */
  positionOf(caller: CallerId): LPPosition {
    const balance = this.ledger.balanceOf(caller, AssetKind.SHARE);
    const { totalShares } = this.state;

    const implied = balance > 0n && this.invariant.isActive()
      ? this.estimates.withdrawEstimate(balance)
      : { amountToken1: 0n, amountToken2: 0n };

    return {
      balance,
      totalShares,
      share: totalShares > 0n ? new Percent(balance, totalShares) : new Percent(0n),
      token1Amount: implied.amountToken1,
      token2Amount: implied.amountToken2,
    };
  }

  // Same rule for tokens and shares: zero first, then the caller's balance.
  private checkAvailable(caller: CallerId, kind: AssetKind, amount: bigint): void {
    if (amount === 0n) {
      throw new ZeroAmountError(kind);
    }
    const available = this.ledger.balanceOf(caller, kind);
    if (amount > available) {
      throw new InsufficientAmountError(kind, amount, available);
    }
  }

  private display(caller: CallerId): string {
    return truncateAddress(caller, DEFAULTS.logAddressChars);
  }
}
