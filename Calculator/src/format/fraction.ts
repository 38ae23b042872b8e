/**
 * Best rational approximation with a bounded denominator.
 *
 * Walks the continued-fraction expansion of |x| and stops at the last
 * convergent whose denominator fits; the final candidate is chosen between
 * that convergent and the best semiconvergent.
 */

export interface Fraction {
  numerator: number;
  denominator: number;
}

/** Below this remainder the expansion is treated as terminated */
const EXACT_EPSILON = 1e-12;

export function approximateFraction(x: number, maxDenominator: number): Fraction {
  if (!Number.isFinite(x)) {
    throw new RangeError(`Cannot approximate ${x} as a fraction`);
  }
  if (!Number.isInteger(maxDenominator) || maxDenominator < 1) {
    throw new RangeError('maxDenominator must be a positive integer');
  }

  const sign = x < 0 ? -1 : 1;
  const target = Math.abs(x);

  let p0 = 0;
  let q0 = 1;
  let p1 = 1;
  let q1 = 0;
  let rest = target;

  for (;;) {
    const a = Math.floor(rest);
    const q2 = q0 + a * q1;
    if (q2 > maxDenominator) {
      const k = Math.floor((maxDenominator - q0) / q1);
      const semiNum = p0 + k * p1;
      const semiDen = q0 + k * q1;
      const useConvergent =
        Math.abs(p1 / q1 - target) <= Math.abs(semiNum / semiDen - target);
      return useConvergent
        ? { numerator: sign * p1, denominator: q1 }
        : { numerator: sign * semiNum, denominator: semiDen };
    }

    [p0, q0, p1, q1] = [p1, q1, p0 + a * p1, q2];

    const frac = rest - a;
    if (frac < EXACT_EPSILON) {
      return { numerator: sign * p1, denominator: q1 };
    }
    rest = 1 / frac;
  }
}

export function gcd(a: number, b: number): number {
  let x = Math.abs(a);
  let y = Math.abs(b);
  while (y !== 0) {
    [x, y] = [y, x % y];
  }
  return x;
}
