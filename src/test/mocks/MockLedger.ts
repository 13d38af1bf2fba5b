/**
 * MockLedger: an in-process AssetLedger that journals every call.
 *
 * Usage
 * -----
 *   const ledger = new MockLedger();
 *   ledger.setBalance('alice', AssetKind.TOKEN1, 500n);
 *   const pool = new LiquidityPool({ feeBps: 0, ledger });
 *   ...
 *   ledger.mutations();   // credits and debits, in call order
 *   ledger.reset();
 *
 * Design notes
 * ------------
 *  - Reads are journaled as well as writes, so tests can assert that all
 *    balance checks happen before the first mutation.
 *  - setBalance() is staging, not an operation: it is not journaled.
 */

import { AssetLedger, InMemoryAssetLedger } from '../../modules/ledger';
import { AssetKind, CallerId } from '../../types/common';

export type LedgerCall =
  | { method: 'balanceOf'; caller: CallerId; kind: AssetKind }
  | { method: 'credit' | 'debit'; caller: CallerId; kind: AssetKind; amount: bigint }
  | { method: 'holders'; kind: AssetKind };

export class MockLedger implements AssetLedger {
  private inner = new InMemoryAssetLedger();
  private _calls: LedgerCall[] = [];

  // -------------------------------------------------------------------------
  // Staging
  // -------------------------------------------------------------------------

  /** Force a caller's balance of `kind` to `amount`. */
  setBalance(caller: CallerId, kind: AssetKind, amount: bigint): void {
    const current = this.inner.balanceOf(caller, kind);
    if (amount > current) {
      this.inner.credit(caller, kind, amount - current);
    } else if (amount < current) {
      this.inner.debit(caller, kind, current - amount);
    }
  }

  /** Clear the journal, keeping balances. */
  clearCalls(): void {
    this._calls = [];
  }

  /** Clear all balances and the journal. */
  reset(): void {
    this.inner = new InMemoryAssetLedger();
    this._calls = [];
  }

  // -------------------------------------------------------------------------
  // Journal
  // -------------------------------------------------------------------------

  get calls(): readonly LedgerCall[] {
    return this._calls;
  }

  /** Only the credit and debit calls, in order. */
  mutations(): LedgerCall[] {
    return this._calls.filter((c) => c.method === 'credit' || c.method === 'debit');
  }

  // -------------------------------------------------------------------------
  // AssetLedger
  // -------------------------------------------------------------------------

  balanceOf(caller: CallerId, kind: AssetKind): bigint {
    this._calls.push({ method: 'balanceOf', caller, kind });
    return this.inner.balanceOf(caller, kind);
  }

  credit(caller: CallerId, kind: AssetKind, amount: bigint): void {
    this._calls.push({ method: 'credit', caller, kind, amount });
    this.inner.credit(caller, kind, amount);
  }

  debit(caller: CallerId, kind: AssetKind, amount: bigint): void {
    this._calls.push({ method: 'debit', caller, kind, amount });
    this.inner.debit(caller, kind, amount);
  }

  holders(kind: AssetKind): CallerId[] {
    this._calls.push({ method: 'holders', kind });
    return this.inner.holders(kind);
  }
}
