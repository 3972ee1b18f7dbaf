// Enough fraction digits to print a double's exact decimal value at the
// magnitudes this engine produces.
const EXACT_FRACTION_DIGITS = 100;

const TIE_REMAINDER = /^50*$/;

/**
 * Rounds to a fixed number of decimals. Exact ties go to the even neighbour
 * (banker's rounding), so 76.625 becomes 76.62 rather than 76.63. Everything
 * else rounds the exact binary value, so 10587.565 (stored slightly above the
 * tie) becomes 10587.57.
 */
export function roundTo(value: number, digits: number = 2): number {
  const expansion = Math.abs(value).toFixed(EXACT_FRACTION_DIGITS);
  const point = expansion.indexOf('.');

  if (point !== -1 && TIE_REMAINDER.test(expansion.slice(point + 1 + digits))) {
    const truncated = Number(expansion.slice(0, point) + expansion.slice(point + 1, point + 1 + digits));
    const even = truncated % 2 === 0 ? truncated : truncated + 1;
    return Math.sign(value) * even / Math.pow(10, digits);
  }

  return Number(value.toFixed(digits));
}

export function safeDivide(numerator: number, denominator: number): number {
  return denominator > 0 ? numerator / denominator : 0;
}
