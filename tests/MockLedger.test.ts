/**
 * Tests for MockLedger, the journaling AssetLedger stand-in.
 */

import { MockLedger } from '../src/test/mocks/MockLedger';
import { InsufficientAmountError } from '../src/errors';
import { AssetKind } from '../src/types/common';

describe('MockLedger', () => {
  let ledger: MockLedger;

  beforeEach(() => {
    ledger = new MockLedger();
  });

  it('stages balances without journaling', () => {
    ledger.setBalance('alice', AssetKind.TOKEN1, 50n);
    expect(ledger.calls).toEqual([]);
    expect(ledger.balanceOf('alice', AssetKind.TOKEN1)).toBe(50n);
  });

  it('can stage a balance downwards', () => {
    ledger.setBalance('alice', AssetKind.SHARE, 50n);
    ledger.setBalance('alice', AssetKind.SHARE, 20n);
    expect(ledger.balanceOf('alice', AssetKind.SHARE)).toBe(20n);
  });

  it('journals reads and writes in order', () => {
    ledger.credit('alice', AssetKind.TOKEN2, 5n);
    ledger.balanceOf('alice', AssetKind.TOKEN2);
    ledger.debit('alice', AssetKind.TOKEN2, 2n);
    ledger.holders(AssetKind.TOKEN2);

    expect(ledger.calls).toEqual([
      { method: 'credit', caller: 'alice', kind: AssetKind.TOKEN2, amount: 5n },
      { method: 'balanceOf', caller: 'alice', kind: AssetKind.TOKEN2 },
      { method: 'debit', caller: 'alice', kind: AssetKind.TOKEN2, amount: 2n },
      { method: 'holders', kind: AssetKind.TOKEN2 },
    ]);
    expect(ledger.mutations()).toHaveLength(2);
  });

  it('keeps the ledger semantics for overdrafts', () => {
    expect(() => ledger.debit('alice', AssetKind.TOKEN1, 1n)).toThrow(InsufficientAmountError);
  });

  it('clearCalls keeps balances, reset drops them', () => {
    ledger.credit('alice', AssetKind.TOKEN1, 5n);

    ledger.clearCalls();
    expect(ledger.calls).toEqual([]);
    expect(ledger.balanceOf('alice', AssetKind.TOKEN1)).toBe(5n);

    ledger.reset();
    expect(ledger.balanceOf('alice', AssetKind.TOKEN1)).toBe(0n);
  });
});
