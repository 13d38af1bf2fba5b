type BigintIsh = bigint | number | string;

/**
 * Floor of `a * b / denominator` for non-negative operands.
 *
 * Every ratio in the pool goes through here so the multiplication always
 * happens before the division.
 */
export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
  if (denominator === 0n) {
    throw new RangeError('Division by zero');
  }
  return (a * b) / denominator;
}

/**
 * Exact rational number over bigint, used for display-only ratios.
 */
export class Fraction {
  public readonly numerator: bigint;
  public readonly denominator: bigint;

  constructor(numerator: BigintIsh, denominator: BigintIsh = 1n) {
    this.numerator = BigInt(numerator);
    this.denominator = BigInt(denominator);
    if (this.denominator === 0n) {
      throw new RangeError('Fraction denominator cannot be zero');
    }
  }

  public multiply(other: Fraction | BigintIsh): Fraction {
    const otherParsed = other instanceof Fraction ? other : new Fraction(other);
    return new Fraction(
      this.numerator * otherParsed.numerator,
      this.denominator * otherParsed.denominator,
    );
  }

  /**
   * Decimal rendering, rounded half away from zero at `decimalPlaces`.
   */
  public toFixed(decimalPlaces: number): string {
    if (!Number.isInteger(decimalPlaces) || decimalPlaces < 0) {
      throw new RangeError(`${decimalPlaces} is not a valid decimal places.`);
    }

    const scaled = divideHalfUp(
      this.numerator * 10n ** BigInt(decimalPlaces),
      this.denominator,
    );

    const isNegative = scaled < 0n;
    let digits = (isNegative ? -scaled : scaled).toString();
    digits = digits.padStart(decimalPlaces + 1, '0');

    const decimalPos = digits.length - decimalPlaces;
    const result = decimalPlaces > 0
      ? `${digits.slice(0, decimalPos)}.${digits.slice(decimalPos)}`
      : digits;
    return isNegative ? `-${result}` : result;
  }
}

export class Percent extends Fraction {
  private static ONE_HUNDRED = new Fraction(100n);

  public toFixed(decimalPlaces: number = 2): string {
    return this.multiply(Percent.ONE_HUNDRED).toFixed(decimalPlaces);
  }
}

function divideHalfUp(numerator: bigint, denominator: bigint): bigint {
  const negative = (numerator < 0n) !== (denominator < 0n);
  const numAbs = numerator < 0n ? -numerator : numerator;
  const denAbs = denominator < 0n ? -denominator : denominator;

  const quotient = numAbs / denAbs;
  const remainder = numAbs % denAbs;
  const magnitude = remainder * 2n >= denAbs ? quotient + 1n : quotient;
  return negative ? -magnitude : magnitude;
}
