/**
 * Number notations used by the log file: Morse digits for the total line and
 * Roman numerals for entry timestamps.
 */

const MORSE_DIGITS = [
  '-----',
  '.----',
  '..---',
  '...--',
  '....-',
  '.....',
  '-....',
  '--...',
  '---..',
  '----.',
] as const;

const ROMAN_NUMERALS: ReadonlyArray<readonly [string, number]> = [
  ['M', 1000],
  ['CM', 900],
  ['D', 500],
  ['CD', 400],
  ['C', 100],
  ['XC', 90],
  ['L', 50],
  ['XL', 40],
  ['X', 10],
  ['IX', 9],
  ['V', 5],
  ['IV', 4],
  ['I', 1],
];

/**
 * Encode a non-negative integer as space-separated Morse digits.
 */
export function numToMorse(num: number): string {
  if (!Number.isSafeInteger(num) || num < 0) {
    throw new RangeError(`Cannot encode ${num} as Morse digits`);
  }
  return String(num)
    .split('')
    .map((digit) => MORSE_DIGITS[Number(digit)])
    .join(' ');
}

/**
 * Decode space-separated Morse digits. Returns null when any group is not a digit.
 */
export function morseToNum(morse: string): number | null {
  const groups = morse.trim().split(/\s+/).filter(Boolean);
  if (groups.length === 0) return null;

  let digits = '';
  for (const group of groups) {
    const digit = MORSE_DIGITS.findIndex((code) => code === group);
    if (digit === -1) return null;
    digits += String(digit);
  }
  return Number(digits);
}

/**
 * Roman numeral for 0..3999; zero is written as "N".
 */
export function numToRoman(num: number): string {
  if (!Number.isInteger(num) || num < 0 || num > 3999) {
    throw new RangeError(`Cannot write ${num} as a Roman numeral`);
  }
  if (num === 0) return 'N';

  let remaining = num;
  let roman = '';
  for (const [numeral, value] of ROMAN_NUMERALS) {
    while (remaining >= value) {
      roman += numeral;
      remaining -= value;
    }
  }
  return roman;
}

/**
 * Local date as D.M.Y in Roman numerals, e.g. 19 Oct 2026 -> "XIX.X.MMXXVI".
 */
export function romanDate(date: Date = new Date()): string {
  return [date.getDate(), date.getMonth() + 1, date.getFullYear()].map(numToRoman).join('.');
}
