import { OPERATIONS, type OperationKind } from '../arithmetic/engine.js';

export type MenuAction =
  | { type: 'calculate'; kind: OperationKind }
  | { type: 'triangle' }
  | { type: 'view-log' }
  | { type: 'reset-log' }
  | { type: 'exit' };

export interface MenuItem {
  choice: string;
  label: string;
  action: MenuAction;
}

export const MAIN_MENU: readonly MenuItem[] = [
  { choice: '1', label: OPERATIONS.add.label, action: { type: 'calculate', kind: 'add' } },
  { choice: '2', label: OPERATIONS.subtract.label, action: { type: 'calculate', kind: 'subtract' } },
  { choice: '3', label: OPERATIONS.multiply.label, action: { type: 'calculate', kind: 'multiply' } },
  { choice: '4', label: OPERATIONS.divide.label, action: { type: 'calculate', kind: 'divide' } },
  { choice: '5', label: 'Draw Triangle', action: { type: 'triangle' } },
  { choice: '6', label: 'View Log', action: { type: 'view-log' } },
  { choice: '7', label: 'Reset Log', action: { type: 'reset-log' } },
  { choice: '9', label: 'Exit Program', action: { type: 'exit' } },
];

export function findMenuAction(choice: string): MenuAction | null {
  return MAIN_MENU.find((item) => item.choice === choice.trim())?.action ?? null;
}

export function renderMainMenu(): string[] {
  return ['', 'Menu', 'Select from the following:', ...MAIN_MENU.map((item) => `${item.choice}: ${item.label}`)];
}

export function renderFormattingMenu(offerFraction: boolean): string[] {
  const lines = [
    '',
    'Formatting Submenu',
    '-- Select from the following:',
    '|_ 1. Standard Format',
    '|_ 2. Scientific Notation Format',
    '|_ 3. Sexagesimal Format',
  ];
  if (offerFraction) lines.push('|_ 4. Fraction Format');
  lines.push('|_ 9. Exit Submenu', '');
  return lines;
}
