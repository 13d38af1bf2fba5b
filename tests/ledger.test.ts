import { InMemoryAssetLedger } from '../src/modules/ledger';
import { InsufficientAmountError } from '../src/errors';
import { AssetKind } from '../src/types/common';

describe('InMemoryAssetLedger', () => {
  let ledger: InMemoryAssetLedger;

  beforeEach(() => {
    ledger = new InMemoryAssetLedger();
  });

  it('reads zero for unseen callers', () => {
    expect(ledger.balanceOf('alice', AssetKind.TOKEN1)).toBe(0n);
    expect(ledger.balanceOf('alice', AssetKind.SHARE)).toBe(0n);
  });

  it('credits accumulate', () => {
    ledger.credit('alice', AssetKind.TOKEN1, 5n);
    ledger.credit('alice', AssetKind.TOKEN1, 7n);
    expect(ledger.balanceOf('alice', AssetKind.TOKEN1)).toBe(12n);
  });

  it('debits reduce the balance', () => {
    ledger.credit('alice', AssetKind.TOKEN2, 10n);
    ledger.debit('alice', AssetKind.TOKEN2, 4n);
    expect(ledger.balanceOf('alice', AssetKind.TOKEN2)).toBe(6n);
  });

  it('allows debiting the whole balance', () => {
    ledger.credit('alice', AssetKind.SHARE, 3n);
    ledger.debit('alice', AssetKind.SHARE, 3n);
    expect(ledger.balanceOf('alice', AssetKind.SHARE)).toBe(0n);
  });

  it('rejects an overdraft without changing the balance', () => {
    ledger.credit('alice', AssetKind.TOKEN1, 5n);

    let caught: unknown;
    try {
      ledger.debit('alice', AssetKind.TOKEN1, 6n);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(InsufficientAmountError);
    expect((caught as InsufficientAmountError).message).toBe(
      'Insufficient amount: requested 6 token1, available 5',
    );
    expect((caught as InsufficientAmountError).details).toEqual({
      asset: 'token1',
      requested: '6',
      available: '5',
    });
    expect(ledger.balanceOf('alice', AssetKind.TOKEN1)).toBe(5n);
  });

  it('keeps asset kinds and callers independent', () => {
    ledger.credit('alice', AssetKind.TOKEN1, 1n);
    ledger.credit('bob', AssetKind.TOKEN2, 2n);

    expect(ledger.balanceOf('alice', AssetKind.TOKEN2)).toBe(0n);
    expect(ledger.balanceOf('bob', AssetKind.TOKEN1)).toBe(0n);
    expect(ledger.balanceOf('bob', AssetKind.TOKEN2)).toBe(2n);
  });

  it('lists holders with a non-zero balance of a kind', () => {
    ledger.credit('alice', AssetKind.SHARE, 5n);
    ledger.credit('bob', AssetKind.TOKEN1, 3n);
    ledger.credit('carol', AssetKind.SHARE, 2n);
    ledger.debit('carol', AssetKind.SHARE, 2n);

    expect(ledger.holders(AssetKind.SHARE)).toEqual(['alice']);
    expect(ledger.holders(AssetKind.TOKEN1)).toEqual(['bob']);
  });
});
