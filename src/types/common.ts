/**
 * Opaque, equality-comparable identity of the account invoking an operation.
 *
 * The host environment authenticates callers; the pool only compares them.
 * Any non-empty string is a valid caller.
 */
export type CallerId = string;

/**
 * Balance kinds tracked per caller by the asset ledger.
 */
export enum AssetKind {
  TOKEN1 = 'token1',
  TOKEN2 = 'token2',
  SHARE = 'share',
}

/**
 * Logger interface for pool instrumentation.
 *
 * Implement this interface to receive debug, info, and error logs
 * from every pool operation. Defaults to undefined (no logging).
 */
export interface Logger {
  /** Debug-level log for accepted calls and pool creation. */
  debug(msg: string, data?: unknown): void;
  /** Info-level log for committed state changes. */
  info(msg: string, data?: unknown): void;
  /** Error-level log for listener failures. */
  error(msg: string, err?: unknown): void;
}
