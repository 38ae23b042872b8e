import { describe, it, expect } from 'vitest';
import { findMenuAction, renderFormattingMenu } from '../../src/session/menu.js';

describe('findMenuAction', () => {
  it('maps choices to actions, ignoring surrounding whitespace', () => {
    expect(findMenuAction('1')).toEqual({ type: 'calculate', kind: 'add' });
    expect(findMenuAction(' 4 ')).toEqual({ type: 'calculate', kind: 'divide' });
    expect(findMenuAction('5')).toEqual({ type: 'triangle' });
    expect(findMenuAction('9')).toEqual({ type: 'exit' });
  });

  it('returns null for anything else', () => {
    for (const choice of ['', '8', '10', 'add', '1.0']) {
      expect(findMenuAction(choice)).toBeNull();
    }
  });
});

describe('renderFormattingMenu', () => {
  it('lists the fraction option only when offered', () => {
    expect(renderFormattingMenu(true)).toContain('|_ 4. Fraction Format');
    expect(renderFormattingMenu(false)).not.toContain('|_ 4. Fraction Format');
    expect(renderFormattingMenu(false).at(-2)).toBe('|_ 9. Exit Submenu');
  });
});
