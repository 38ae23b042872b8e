/**
 * Text layout of the calculation log.
 *
 *   Total calculations: ..---
 *   Timestamp XIX.X.MMXXVI #1 Calculation 1.5 + 2.0 = 3.5
 *   Timestamp XIX.X.MMXXVI #2 Calculation 7.0 ÷ 2.0 = 7/2
 *
 * The total line carries the count in Morse digits. Older logs have no
 * `#N` field; such entries take their position in the file as sequence.
 * Lines that are not entries are kept verbatim and written back on save.
 */

import { OPERATIONS, kindForSymbol, type OperationKind } from '../arithmetic/engine.js';
import { formatDecimal } from '../format/formatter.js';
import { morseToNum, numToMorse } from '../utils/numerals.js';
import { createLogEntry, type LogEntry } from './types.js';

export const TOTAL_PREFIX = 'Total calculations: ';

const ENTRY_PATTERN =
  /^Timestamp ([IVXLCDMN]+\.[IVXLCDMN]+\.[IVXLCDMN]+) (?:#(\d+) )?Calculation (\S+) (\S) (\S+) = (\S.*)$/u;

/** A line of the log body: a decoded entry, or text kept as it was read */
export type LogLine = LogEntry | string;

export interface DecodedLog {
  /** Body lines in file order, total lines and blank lines excluded */
  lines: LogLine[];
  entries: LogEntry[];
  /** Count from the last total line, null when absent or unreadable */
  storedCount: number | null;
  /** Non-empty lines that were neither an entry nor a total line (also kept in `lines`) */
  skipped: Array<{ lineNumber: number; text: string }>;
}

export function describeCalculation(kind: OperationKind, left: number, right: number, result: string): string {
  return `Calculation ${formatDecimal(left)} ${OPERATIONS[kind].symbol} ${formatDecimal(right)} = ${result}`;
}

export function encodeEntry(entry: LogEntry): string {
  return `Timestamp ${entry.timestamp} #${entry.sequence} ${describeCalculation(entry.kind, entry.left, entry.right, entry.result)}`;
}

export function encodeTotal(totalCount: number): string {
  return TOTAL_PREFIX + numToMorse(totalCount);
}

function parseOperand(text: string): number | null {
  const value = Number(text);
  return text.length > 0 && Number.isFinite(value) ? value : null;
}

/**
 * Decode one entry line, or null if the line is not an entry.
 * `position` is the sequence used when the line carries no `#N`.
 */
export function decodeEntry(line: string, position = 1): LogEntry | null {
  const match = ENTRY_PATTERN.exec(line.trimEnd());
  if (!match) return null;

  const [, timestamp, sequence, leftText, symbol, rightText, result] = match;
  const kind = kindForSymbol(symbol);
  const left = parseOperand(leftText);
  const right = parseOperand(rightText);
  if (kind === null || left === null || right === null) return null;

  return createLogEntry({
    // the group is optional, so it is undefined on lines without `#N`
    sequence: sequence === undefined ? position : Number(sequence),
    timestamp,
    kind,
    left,
    right,
    result: result.trimEnd(),
  });
}

function encodeLine(line: LogLine): string {
  return typeof line === 'string' ? line : encodeEntry(line);
}

export function encodeLog(totalCount: number, lines: readonly LogLine[]): string {
  return [encodeTotal(totalCount), ...lines.map(encodeLine)].join('\n') + '\n';
}

export function decodeLog(content: string): DecodedLog {
  const decoded: DecodedLog = { lines: [], entries: [], storedCount: null, skipped: [] };

  content.split(/\r?\n/).forEach((raw, index) => {
    const line = raw.trimEnd();
    if (line.length === 0) return;

    if (line.startsWith(TOTAL_PREFIX)) {
      decoded.storedCount = morseToNum(line.slice(TOTAL_PREFIX.length));
      return;
    }

    const entry = decodeEntry(line, decoded.entries.length + 1);
    if (entry) {
      decoded.entries.push(entry);
      decoded.lines.push(entry);
    } else {
      decoded.skipped.push({ lineNumber: index + 1, text: line });
      decoded.lines.push(raw);
    }
  });

  return decoded;
}
