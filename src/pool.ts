import { DEFAULTS, normalizeFeeBps, PoolConfig } from './config';
import { CallerId } from './types/common';
import { PoolEvent, PoolEventInput, PoolEventListener } from './types/events';
import {
  Holdings,
  LPPosition,
  PoolDetails,
  PoolState,
  ProvideQuote,
  WithdrawAmounts,
} from './types/pool';
import { EstimateCalculator } from './modules/estimates';
import { InvariantEngine } from './modules/invariant';
import { AssetLedger, InMemoryAssetLedger } from './modules/ledger';
import { LiquidityManager } from './modules/liquidity';

/**
 * Main entry point of the pool engine.
 *
 * Owns the pool aggregate and the asset ledger for its whole lifetime and
 * exposes every pool operation. Calls are synchronous and must be
 * serialized by the host; nothing inside suspends mid-operation.
 *
 * @example
 * const pool = new LiquidityPool({ feeBps: 30 });
 * pool.faucet('alice', 1000n, 1000n);
 * pool.provide('alice', 100n, 100n); // 100_000_000n
 * pool.poolDetails(); // { totalToken1: 100n, totalToken2: 100n, totalShares: 100_000_000n, feeBps: 30n }
 */
export class LiquidityPool {
  readonly config: PoolConfig;
  readonly ledger: AssetLedger;
  readonly invariant: InvariantEngine;
  readonly estimates: EstimateCalculator;
  readonly liquidity: LiquidityManager;

  private state: PoolState;
  private listeners = new Set<PoolEventListener>();
  private sequence = 0;

  constructor(config: PoolConfig) {
    this.config = {
      strictAddresses: DEFAULTS.strictAddresses,
      ...config,
    };

    this.state = {
      totalShares: 0n,
      totalToken1: 0n,
      totalToken2: 0n,
      feeBps: normalizeFeeBps(config.feeBps),
    };

    this.ledger = config.ledger ?? new InMemoryAssetLedger();
    this.invariant = new InvariantEngine(this.state);
    this.estimates = new EstimateCalculator(this.state, this.invariant);
    this.liquidity = new LiquidityManager({
      state: this.state,
      ledger: this.ledger,
      invariant: this.invariant,
      estimates: this.estimates,
      strictAddresses: this.config.strictAddresses ?? DEFAULTS.strictAddresses,
      emit: (event) => this.emit(event),
      logger: config.logger,
    });

    config.logger?.debug('pool: created', { feeBps: this.state.feeBps });
  }

  /**
   * Deposit liquidity; returns the shares minted.
   */
  provide(caller: CallerId, amountToken1: bigint, amountToken2: bigint): bigint {
    return this.liquidity.provide(caller, amountToken1, amountToken2);
  }

  /**
   * Burn shares; returns the token amounts released.
   */
  withdraw(caller: CallerId, share: bigint): WithdrawAmounts {
    return this.liquidity.withdraw(caller, share);
  }

  faucet(caller: CallerId, amountToken1: bigint, amountToken2: bigint): void {
    this.liquidity.faucet(caller, amountToken1, amountToken2);
  }

  holdingsOf(caller: CallerId): Holdings {
    return this.liquidity.holdingsOf(caller);
  }

  poolDetails(): PoolDetails {
    return this.liquidity.poolDetails();
  }

  positionOf(caller: CallerId): LPPosition {
    return this.liquidity.positionOf(caller);
  }

  equivalentToken1For(amountToken2: bigint): bigint {
    return this.estimates.equivalentToken1For(amountToken2);
  }

  equivalentToken2For(amountToken1: bigint): bigint {
    return this.estimates.equivalentToken2For(amountToken1);
  }

  withdrawEstimate(share: bigint): WithdrawAmounts {
    return this.estimates.withdrawEstimate(share);
  }

  quoteProvide(amountToken1: bigint): ProvideQuote {
    return this.estimates.quoteProvide(amountToken1);
  }

  getK(): bigint {
    return this.invariant.getK();
  }

  isActive(): boolean {
    return this.invariant.isActive();
  }

  /**
   * Audit pool totals against the ledger.
   *
   * @throws {InvariantViolationError} If the accounting is inconsistent.
   */
  checkInvariants(): void {
    this.invariant.checkInvariants(this.ledger);
  }

  /**
   * Register a listener for committed operations.
   *
   * @returns A function that removes the listener.
   */
  subscribe(listener: PoolEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Stamp and deliver an event to the configured hook and all subscribers.
   *
   * The operation has already committed when this runs, so a throwing
   * listener is logged and skipped rather than rethrown.
   */
  private emit(input: PoolEventInput): void {
    this.sequence += 1;
    const event: PoolEvent = {
      ...input,
      sequence: this.sequence,
      timestamp: Math.floor(Date.now() / 1000),
    };

    const targets = [
      ...(this.config.onEvent ? [this.config.onEvent] : []),
      ...this.listeners,
    ];
    for (const listener of targets) {
      try {
        listener(event);
      } catch (err) {
        this.config.logger?.error(`emit: ${event.type} listener failed`, err);
      }
    }
  }
}
