import { CallerId } from './common';

/**
 * Base event emitted after a committed pool operation.
 */
export interface PoolEventBase {
  /** Event type identifier string */
  type: string;
  /** Caller whose call produced the event */
  caller: CallerId;
  /** Position of the event in the pool's commit order, starting at 1 */
  sequence: number;
  /** Unix timestamp in seconds when the event was emitted */
  timestamp: number;
}

/**
 * Liquidity added to the pool.
 */
export interface ProvideEvent extends PoolEventBase {
  /** Literal type tag */
  type: 'provide';
  /** Amount of token 1 deposited */
  amountToken1: bigint;
  /** Amount of token 2 deposited */
  amountToken2: bigint;
  /** Shares minted to the caller */
  shares: bigint;
}

/**
 * Liquidity removed from the pool.
 */
export interface WithdrawEvent extends PoolEventBase {
  /** Literal type tag */
  type: 'withdraw';
  /** Amount of token 1 released */
  amountToken1: bigint;
  /** Amount of token 2 released */
  amountToken2: bigint;
  /** Shares burned */
  shares: bigint;
}

/**
 * Free tokens credited to the caller.
 */
export interface FaucetEvent extends PoolEventBase {
  /** Literal type tag */
  type: 'faucet';
  amountToken1: bigint;
  amountToken2: bigint;
}

/**
 * Union of all pool events.
 */
export type PoolEvent = ProvideEvent | WithdrawEvent | FaucetEvent;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/**
 * Event payload before the pool stamps it with a sequence and timestamp.
 */
export type PoolEventInput = DistributiveOmit<PoolEvent, 'sequence' | 'timestamp'>;

export type PoolEventListener = (event: PoolEvent) => void;
