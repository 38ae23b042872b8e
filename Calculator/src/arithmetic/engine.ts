/**
 * Arithmetic engine: the four basic operations with overflow detection.
 *
 * Every operation throws instead of returning Infinity; `calculate` turns
 * those throws into a StandardResponse for the session layer.
 */

import {
  createErrorFromException,
  createSuccess,
  type StandardResponse,
} from '@tally/shared/Types/StandardResponse.js';
import { DivisionByZeroError, OverflowDetectedError } from '../errors.js';

export type OperationKind = 'add' | 'subtract' | 'multiply' | 'divide';

export type BinaryOperation = (a: number, b: number) => number;

export interface OperationDefinition {
  /** Menu label */
  label: string;
  /** Symbol used in log lines */
  symbol: string;
  /** Prompt nouns for the two operands */
  operands: readonly [string, string];
  run: BinaryOperation;
}

function checked(kind: OperationKind, a: number, b: number, value: number): number {
  if (!Number.isFinite(value)) {
    throw new OverflowDetectedError({ kind, a, b });
  }
  return value;
}

export function add(a: number, b: number): number {
  return checked('add', a, b, a + b);
}

export function subtract(a: number, b: number): number {
  return checked('subtract', a, b, a - b);
}

export function multiply(a: number, b: number): number {
  return checked('multiply', a, b, a * b);
}

export function divide(a: number, b: number): number {
  if (b === 0) {
    throw new DivisionByZeroError({ a });
  }
  return checked('divide', a, b, a / b);
}

export const OPERATIONS: Record<OperationKind, OperationDefinition> = {
  add: { label: 'Addition', symbol: '+', operands: ['addend 1', 'addend 2'], run: add },
  subtract: { label: 'Subtraction', symbol: '-', operands: ['minuend', 'subtrahend'], run: subtract },
  multiply: { label: 'Multiplication', symbol: '×', operands: ['factor 1', 'factor 2'], run: multiply },
  divide: { label: 'Division', symbol: '÷', operands: ['dividend', 'divisor'], run: divide },
};

export const OPERATION_KINDS = Object.keys(OPERATIONS).filter(isOperationKind);

export function isOperationKind(value: string): value is OperationKind {
  return Object.hasOwn(OPERATIONS, value);
}

/**
 * Find the operation whose log symbol matches, or null.
 */
export function kindForSymbol(symbol: string): OperationKind | null {
  return OPERATION_KINDS.find((kind) => OPERATIONS[kind].symbol === symbol) ?? null;
}

export function calculate(kind: OperationKind, a: number, b: number): StandardResponse<number> {
  try {
    return createSuccess(OPERATIONS[kind].run(a, b));
  } catch (error) {
    return createErrorFromException(error);
  }
}
