/**
 * Numeric input validation.
 *
 * `readFloat` keeps asking until the answer is a finite decimal number or the
 * cancel token. Bad text never escapes as an exception.
 */

import { z } from 'zod';
import type { Prompter } from './prompter.js';

export const CANCEL = Symbol('cancel');

export type NumericInput = number | typeof CANCEL;

export type ParsedInput =
  | { kind: 'number'; value: number }
  | { kind: 'cancel' }
  | { kind: 'invalid'; reason: string };

const CANCEL_TOKENS = new Set(['x', 'exit']);

const DECIMAL_LITERAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;

const numberSchema = z
  .string()
  .trim()
  .regex(DECIMAL_LITERAL, 'Not a decimal number')
  .transform(Number)
  .pipe(z.number().finite('Number too big in magnitude'));

export const INVALID_NUMBER_HINT = "Invalid number! Please try again. Type 'x' to exit inputting";

export function parseFloatInput(text: string): ParsedInput {
  if (CANCEL_TOKENS.has(text.trim().toLowerCase())) {
    return { kind: 'cancel' };
  }

  const result = numberSchema.safeParse(text);
  if (!result.success) {
    return { kind: 'invalid', reason: result.error.issues[0]?.message ?? 'Invalid number' };
  }
  return { kind: 'number', value: result.data };
}

/**
 * Prompt until a valid float or the cancel token is entered.
 * End of input counts as cancel.
 */
export async function readFloat(prompter: Prompter, prompt: string): Promise<NumericInput> {
  for (;;) {
    const answer = await prompter.ask(prompt);
    if (answer === null) return CANCEL;

    const parsed = parseFloatInput(answer);
    switch (parsed.kind) {
      case 'number':
        return parsed.value;
      case 'cancel':
        return CANCEL;
      case 'invalid':
        prompter.print(INVALID_NUMBER_HINT);
    }
  }
}
