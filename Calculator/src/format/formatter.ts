import { approximateFraction, gcd } from './fraction.js';

export const DEFAULT_MAX_DENOMINATOR = 1000;

/** Values beyond this are not worth rationalizing */
const MAX_RATIONAL_MAGNITUDE = 1e15;

/** Relative error above which a fraction is considered a poor fit */
const FRACTION_TOLERANCE = 5e-7;

export type FormattedResult =
  | { style: 'decimal'; text: string; value: number }
  | { style: 'fraction'; text: string; value: number; numerator: number; denominator: number };

/**
 * Decimal text for a result. Integral values keep one decimal place ("4.0"),
 * everything else uses the shortest text that reads back to the same number.
 */
export function formatDecimal(value: number): string {
  if (Object.is(value, -0)) return '-0.0';
  if (Number.isInteger(value) && Math.abs(value) < 1e16) {
    return value.toFixed(1);
  }
  return String(value);
}

/**
 * Whether the fraction option makes sense for this value.
 */
export function canShowAsFraction(value: number): boolean {
  return Number.isFinite(value) && !Number.isInteger(value) && Math.abs(value) < MAX_RATIONAL_MAGNITUDE;
}

export function formatResult(
  result: number,
  wantFraction: boolean,
  maxDenominator: number = DEFAULT_MAX_DENOMINATOR,
): FormattedResult {
  const decimal: FormattedResult = { style: 'decimal', text: formatDecimal(result), value: result };
  if (!wantFraction || !canShowAsFraction(result)) {
    return decimal;
  }

  const { numerator, denominator } = approximateFraction(result, maxDenominator);
  const error = Math.abs(result - numerator / denominator);
  if (error > FRACTION_TOLERANCE * Math.abs(result) || denominator === 1) {
    return decimal;
  }

  // lowest terms
  const divisor = gcd(numerator, denominator);
  const num = numerator / divisor;
  const den = denominator / divisor;
  return { style: 'fraction', text: `${num}/${den}`, value: result, numerator: num, denominator: den };
}

/**
 * Scientific notation with two decimals and a two-digit signed exponent, e.g. "1.23e+04".
 */
export function formatScientific(value: number): string {
  return value.toExponential(2).replace(/e([+-])(\d)$/, 'e$10$2');
}

export interface Sexagesimal {
  units: number;
  minutes: number;
  seconds: number;
}

/**
 * Split a decimal value into whole units, minutes and seconds (seconds to 2 places).
 * Fractional parts keep the sign of the input.
 */
export function toSexagesimal(value: number): Sexagesimal {
  const units = Math.trunc(value);
  const minuteValue = (value - units) * 60;
  const minutes = Math.trunc(minuteValue);
  const seconds = Math.round((minuteValue - minutes) * 60 * 100) / 100;
  return { units, minutes, seconds };
}

export function formatSexagesimal(value: number): string {
  const { units, minutes, seconds } = toSexagesimal(value);
  return `${units}˚ ${minutes}' ${formatDecimal(seconds)}''`;
}
