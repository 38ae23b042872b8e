import { describe, it, expect } from 'vitest';
import {
  decodeEntry,
  decodeLog,
  describeCalculation,
  encodeEntry,
  encodeLog,
  encodeTotal,
} from '../../src/log/codec.js';
import { createLogEntry } from '../../src/log/types.js';

const entry = createLogEntry({
  sequence: 2,
  timestamp: 'XIX.X.MMXXVI',
  kind: 'divide',
  left: 7,
  right: -2,
  result: '-3.5',
});

describe('entry lines', () => {
  it('encodes an entry in the log layout', () => {
    expect(encodeEntry(entry)).toBe('Timestamp XIX.X.MMXXVI #2 Calculation 7.0 ÷ -2.0 = -3.5');
  });

  it('decodes what it encodes', () => {
    expect(decodeEntry(encodeEntry(entry))).toEqual(entry);
  });

  it('keeps fraction results and exponent operands intact', () => {
    const line = 'Timestamp I.I.MMXXIV #9 Calculation 1e+21 × 0.5 = 1/3';
    expect(decodeEntry(line)).toEqual({
      sequence: 9,
      timestamp: 'I.I.MMXXIV',
      kind: 'multiply',
      left: 1e21,
      right: 0.5,
      result: '1/3',
    });
  });

  it('takes the given position as sequence when the line has no #N', () => {
    const line = 'Timestamp XIX.X.MMXXVI Calculation 7.0 ÷ -2.0 = -3.5';
    expect(decodeEntry(line, 5)).toEqual({ ...entry, sequence: 5 });
    expect(decodeEntry(line)?.sequence).toBe(1);
  });

  it('ignores a trailing carriage return', () => {
    expect(decodeEntry(encodeEntry(entry) + '\r')).toEqual(entry);
  });

  it('rejects lines with an unknown operator or bad operands', () => {
    expect(decodeEntry('Timestamp I.I.MMXXIV #1 Calculation 1.0 % 2.0 = 0.5')).toBeNull();
    expect(decodeEntry('Timestamp I.I.MMXXIV #1 Calculation one + 2.0 = 3.0')).toBeNull();
    expect(decodeEntry('hello')).toBeNull();
  });

  it('describes a calculation for display', () => {
    expect(describeCalculation('subtract', 1, 0.5, '0.5')).toBe('Calculation 1.0 - 0.5 = 0.5');
  });
});

describe('whole log', () => {
  it('writes the Morse total first, then one line per entry', () => {
    expect(encodeLog(1, [entry])).toBe(
      'Total calculations: .----\nTimestamp XIX.X.MMXXVI #2 Calculation 7.0 ÷ -2.0 = -3.5\n',
    );
    expect(encodeLog(0, [])).toBe('Total calculations: -----\n');
  });

  it('reads the stored count and skips unknown lines', () => {
    const content = [
      encodeTotal(12),
      encodeEntry(entry),
      '',
      'garbage line',
    ].join('\n');

    const decoded = decodeLog(content);
    expect(decoded.storedCount).toBe(12);
    expect(decoded.entries).toEqual([entry]);
    expect(decoded.skipped).toEqual([{ lineNumber: 4, text: 'garbage line' }]);
  });

  it('keeps every body line in file order, undecodable ones verbatim', () => {
    const content = [
      encodeTotal(2),
      'Timestamp I.I.MMXXIV Calculation 1.0 + 1.0 = 2.0',
      '  hand-written note',
      encodeEntry(entry),
    ].join('\n');

    const decoded = decodeLog(content);
    expect(decoded.entries.map((e) => e.sequence)).toEqual([1, 2]);
    expect(decoded.lines[1]).toBe('  hand-written note');
    expect(encodeLog(2, decoded.lines)).toBe(
      'Total calculations: ..---\n' +
        'Timestamp I.I.MMXXIV #1 Calculation 1.0 + 1.0 = 2.0\n' +
        '  hand-written note\n' +
        'Timestamp XIX.X.MMXXVI #2 Calculation 7.0 ÷ -2.0 = -3.5\n',
    );
  });

  it('uses the last total line and reports an unreadable one as null', () => {
    expect(decodeLog(`${encodeTotal(1)}\n${encodeTotal(2)}\n`).storedCount).toBe(2);
    expect(decodeLog('Total calculations: abc\n').storedCount).toBeNull();
    expect(decodeLog('').storedCount).toBeNull();
  });
});
