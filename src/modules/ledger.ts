import { InsufficientAmountError } from '../errors';
import { AssetKind, CallerId } from '../types/common';

/**
 * Per-caller balance storage for the two pooled tokens and pool shares.
 *
 * Unseen callers read as zero. Implementations must reject a debit larger
 * than the current balance without changing anything.
 */
export interface AssetLedger {
  /** Balance of `kind` held by `caller`, or 0n if never recorded. */
  balanceOf(caller: CallerId, kind: AssetKind): bigint;
  /** Add `amount` to the caller's balance of `kind`. */
  credit(caller: CallerId, kind: AssetKind, amount: bigint): void;
  /**
   * Subtract `amount` from the caller's balance of `kind`.
   *
   * @throws {InsufficientAmountError} If `amount` exceeds the balance.
   */
  debit(caller: CallerId, kind: AssetKind, amount: bigint): void;
  /** Callers holding a non-zero balance of `kind`. */
  holders(kind: AssetKind): CallerId[];
}

type AccountRecord = Record<AssetKind, bigint>;

const zeroRecord = (): AccountRecord => ({
  [AssetKind.TOKEN1]: 0n,
  [AssetKind.TOKEN2]: 0n,
  [AssetKind.SHARE]: 0n,
});

/**
 * Default AssetLedger backed by a Map from caller to account record.
 *
 * Records are created on first write and never removed; a zero balance
 * and a missing record read the same.
 */
export class InMemoryAssetLedger implements AssetLedger {
  private accounts = new Map<CallerId, AccountRecord>();

  balanceOf(caller: CallerId, kind: AssetKind): bigint {
    return this.accounts.get(caller)?.[kind] ?? 0n;
  }

  credit(caller: CallerId, kind: AssetKind, amount: bigint): void {
    const record = this.upsert(caller);
    record[kind] += amount;
  }

  debit(caller: CallerId, kind: AssetKind, amount: bigint): void {
    const available = this.balanceOf(caller, kind);
    if (amount > available) {
      throw new InsufficientAmountError(kind, amount, available);
    }
    const record = this.upsert(caller);
    record[kind] = available - amount;
  }

  holders(kind: AssetKind): CallerId[] {
    const result: CallerId[] = [];
    for (const [caller, record] of this.accounts) {
      if (record[kind] > 0n) result.push(caller);
    }
    return result;
  }

  private upsert(caller: CallerId): AccountRecord {
    let record = this.accounts.get(caller);
    if (!record) {
      record = zeroRecord();
      this.accounts.set(caller, record);
    }
    return record;
  }
}
