/**
 * Exact rational values used for note durations and the measure time cursor.
 * Always reduced, with a positive denominator; zero is `{ num: 0, den: 1 }`.
 */
export interface Fraction {
  readonly num: number;
  readonly den: number;
}

export const ZERO: Fraction = { num: 0, den: 1 };

const gcd = (a: number, b: number): number => {
  let x = Math.abs(a);
  let y = Math.abs(b);
  while (y !== 0) {
    const t = x % y;
    x = y;
    y = t;
  }
  return x;
};

/** Build a reduced fraction. Both parts must be safe integers. */
export function fraction(num: number, den = 1): Fraction {
  if (!Number.isSafeInteger(num) || !Number.isSafeInteger(den)) {
    throw new RangeError(`Fraction parts must be integers: ${num}/${den}`);
  }
  if (den === 0) {
    throw new RangeError('Fraction denominator must not be zero');
  }
  if (num === 0) return ZERO;
  const sign = den < 0 ? -1 : 1;
  const g = gcd(num, den);
  return { num: (sign * num) / g, den: (sign * den) / g };
}

export function addFractions(a: Fraction, b: Fraction): Fraction {
  return fraction(a.num * b.den + b.num * a.den, a.den * b.den);
}

export function subtractFractions(a: Fraction, b: Fraction): Fraction {
  return addFractions(a, negateFraction(b));
}

export function multiplyFractions(a: Fraction, b: Fraction): Fraction {
  return fraction(a.num * b.num, a.den * b.den);
}

export function divideFractions(a: Fraction, b: Fraction): Fraction {
  if (b.num === 0) {
    throw new RangeError('Division by a zero fraction');
  }
  return fraction(a.num * b.den, a.den * b.num);
}

export function negateFraction(a: Fraction): Fraction {
  return a.num === 0 ? ZERO : { num: -a.num, den: a.den };
}

/** Negative when a < b, zero when equal, positive when a > b. */
export function compareFractions(a: Fraction, b: Fraction): number {
  return a.num * b.den - b.num * a.den;
}

export function maxFraction(a: Fraction, b: Fraction): Fraction {
  return compareFractions(a, b) >= 0 ? a : b;
}

export function isNegative(a: Fraction): boolean {
  return a.num < 0;
}

export function fractionToNumber(a: Fraction): number {
  return a.num / a.den;
}

export function fractionToString(a: Fraction): string {
  return a.den === 1 ? String(a.num) : `${a.num}/${a.den}`;
}

const DECIMAL_PATTERN = /^([+-]?)(\d*)(?:\.(\d*))?$/;

/**
 * Parse an integer or decimal literal ("12", "-3", "1.5", ".25") exactly.
 * Returns undefined when the text is not such a literal.
 */
export function parseFraction(text: string): Fraction | undefined {
  const match = DECIMAL_PATTERN.exec(text.trim());
  if (!match) return undefined;
  const [, sign, whole = '', decimals = ''] = match;
  if (whole === '' && decimals === '') return undefined;

  const digits = `${whole}${decimals}`.replace(/^0+(?=\d)/, '');
  const num = Number.parseInt(digits, 10);
  const den = 10 ** decimals.length;
  return fraction(sign === '-' ? -num : num, den);
}
