import { PoolErrorCode, POOL_ERROR_MAP } from '../src/errors/codes';
import {
  PoolError,
  ZeroAmountError,
  ZeroLiquidityError,
  InsufficientAmountError,
  InsufficientLiquidityError,
  InvalidShareError,
  NonEquivalentValueError,
  SlippageError,
  ValidationError,
} from '../src/errors';
import { AssetKind } from '../src/types/common';

describe('PoolErrorCode', () => {
  it('numbers the taxonomy in declaration order', () => {
    expect(PoolErrorCode.ZeroLiquidity).toBe(0);
    expect(PoolErrorCode.InvalidShare).toBe(5);
    expect(PoolErrorCode.SlippageExceeded).toBe(7);
  });

  it('has a message for every code', () => {
    expect(POOL_ERROR_MAP[PoolErrorCode.NonEquivalentValue]).toBe(
      'Equivalent value of tokens not provided',
    );
    expect(POOL_ERROR_MAP[PoolErrorCode.InvalidShare]).toBe(
      'Share should be less than total shares',
    );
  });
});

describe('Error classes', () => {
  it('carry code, name and details', () => {
    const err = new ZeroAmountError(AssetKind.SHARE);
    expect(err).toBeInstanceOf(PoolError);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('ZeroAmountError');
    expect(err.code).toBe('ZERO_AMOUNT');
    expect(err.message).toBe('Amount cannot be zero');
    expect(err.details).toEqual({ asset: 'share' });
  });

  it('take their messages from the code table', () => {
    expect(new ZeroLiquidityError().message).toBe('Zero liquidity');
    expect(new NonEquivalentValueError(1n, 2n).message).toBe(
      'Equivalent value of tokens not provided',
    );
    expect(new InsufficientLiquidityError().code).toBe('INSUFFICIENT_LIQUIDITY');
    expect(new SlippageError().message).toBe('Slippage tolerance exceeded');
  });

  it('describe the shortfall of an insufficient amount', () => {
    const err = new InsufficientAmountError(AssetKind.TOKEN1, 10n, 4n);
    expect(err.message).toBe('Insufficient amount: requested 10 token1, available 4');
    expect(err.details).toEqual({ asset: 'token1', requested: '10', available: '4' });
  });

  it('serialize bigint details as strings', () => {
    const err = new InvalidShareError(7n, 5n);
    expect(err.details).toEqual({ share: '7', totalShares: '5' });
  });

  it('merge additional details', () => {
    const err = new ZeroLiquidityError({ operation: 'withdraw' });
    expect(err.details).toEqual({ operation: 'withdraw' });
  });

  it('keep the caller-supplied message for validation failures', () => {
    const err = new ValidationError('share must not be negative', { field: 'share' });
    expect(err.code).toBe('VALIDATION_ERROR');
    expect(err.message).toBe('share must not be negative');
    expect(err.name).toBe('ValidationError');
  });
});
