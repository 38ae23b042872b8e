/**
 * SessionController: the interactive menu loop.
 *
 * Reads a menu choice, dispatches it, prints the outcome and repeats until
 * the user confirms Exit or input ends. The LogStore is handed in by the
 * caller; the controller never reaches the log file directly.
 */

import { Logger, logger } from '@tally/shared/Utils/logger.js';
import {
  createErrorFromException,
  createSuccess,
  type StandardResponse,
} from '@tally/shared/Types/StandardResponse.js';
import { ValidationError } from '@tally/shared/Types/errors.js';
import { OPERATIONS, calculate, type OperationKind } from '../arithmetic/engine.js';
import { LogUnavailableError } from '../errors.js';
import {
  canShowAsFraction,
  formatDecimal,
  formatResult,
  formatScientific,
  formatSexagesimal,
} from '../format/formatter.js';
import type { Prompter } from '../input/prompter.js';
import { CANCEL, readFloat } from '../input/validator.js';
import { describeCalculation } from '../log/codec.js';
import type { LogStore } from '../log/store.js';
import { createLogEntry, type LogEntry } from '../log/types.js';
import { drawTriangle } from '../triangle/svg.js';
import { describeSides } from '../triangle/geometry.js';
import { romanDate } from '../utils/numerals.js';
import { findMenuAction, renderFormattingMenu, renderMainMenu, type MenuAction } from './menu.js';

export interface SessionOptions {
  store: LogStore;
  prompter: Prompter;
  trianglePath: string;
  /** Record results as fractions when they rationalize cleanly */
  fractionResults: boolean;
  maxDenominator: number;
  clock?: () => Date;
}

export interface CalculationOutcome {
  entry: LogEntry;
  /** "Calculation 1.0 + 2.0 = 3.0" */
  message: string;
  value: number;
}

export interface SessionSummary {
  reason: 'exit' | 'end-of-input';
  saved: boolean;
  totalCount: number;
}

type StepResult = 'continue' | 'exit' | 'end-of-input';

const YES = new Set(['y', 'yes']);
const NO = new Set(['n', 'no']);

export class SessionController {
  private store: LogStore;
  private prompter: Prompter;
  private options: SessionOptions;
  private clock: () => Date;
  private log: Logger;
  /** False when the user declined to replace an unreadable log */
  private persist = true;

  constructor(options: SessionOptions) {
    this.options = options;
    this.store = options.store;
    this.prompter = options.prompter;
    this.clock = options.clock ?? (() => new Date());
    this.log = logger.child('session');
  }

  async run(): Promise<SessionSummary> {
    this.prompter.print('Welcome to the advanced mathematics calculator.');
    await this.openLog();

    let reason: SessionSummary['reason'] = 'exit';
    for (;;) {
      const step = await this.step();
      if (step === 'continue') continue;
      reason = step;
      break;
    }

    const saved = await this.finish();
    return { reason, saved, totalCount: this.store.snapshot().totalCount };
  }

  /**
   * Compute, format and log one calculation. Failures write no entry.
   */
  performCalculation(kind: OperationKind, left: number, right: number): StandardResponse<CalculationOutcome> {
    const response = calculate(kind, left, right);
    if (!response.success) {
      return response;
    }

    const value = response.data;
    const formatted = formatResult(value, this.options.fractionResults, this.options.maxDenominator);
    const entry = createLogEntry({
      sequence: this.store.nextSequence,
      timestamp: romanDate(this.clock()),
      kind,
      left,
      right,
      result: formatted.text,
    });
    this.store.append(entry);

    return createSuccess({ entry, value, message: describeCalculation(kind, left, right, formatted.text) });
  }

  /**
   * "Are you sure? [y/n]" until a yes or no. Returns true to leave; end of input leaves.
   */
  async runningConfirmation(question = 'Are you sure? [y/n]: '): Promise<boolean> {
    return (await this.askYesNo(question)) ?? true;
  }

  private async openLog(): Promise<void> {
    try {
      await this.store.initialize();
      return;
    } catch (error) {
      if (!(error instanceof LogUnavailableError)) throw error;
      this.log.warn('Log unavailable', error);
      this.prompter.print(error.message);
    }

    const fresh = await this.askYesNo('Start a fresh log? It replaces the unreadable file on exit. [y/n]: ');
    this.store.startFresh();
    if (fresh !== true) {
      this.persist = false;
      this.prompter.print('Continuing with an empty log that will not be saved.');
    }
  }

  private async step(): Promise<StepResult> {
    for (const line of renderMainMenu()) this.prompter.print(line);

    const choice = await this.prompter.ask('\nPlease input a valid menu number: ');
    if (choice === null) return 'end-of-input';

    const action = findMenuAction(choice);
    if (!action) {
      this.prompter.print('That is not a main menu option!');
      return 'continue';
    }

    try {
      return await this.dispatch(action);
    } catch (error) {
      this.log.error('Menu action failed', error);
      this.prompter.print(createErrorFromException(error).error);
      return 'continue';
    }
  }

  private async dispatch(action: MenuAction): Promise<StepResult> {
    switch (action.type) {
      case 'calculate':
        return this.calculateFlow(action.kind);
      case 'triangle':
        return this.triangleFlow();
      case 'view-log':
        this.viewLog();
        return 'continue';
      case 'reset-log':
        return this.resetLog();
      case 'exit':
        return (await this.runningConfirmation()) ? 'exit' : 'continue';
      default: {
        const unreachable: never = action;
        throw new Error(`Unhandled menu action: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  private async calculateFlow(kind: OperationKind): Promise<StepResult> {
    const [first, second] = OPERATIONS[kind].operands;

    const left = await readFloat(this.prompter, `Input ${first}: `);
    if (left === CANCEL) return 'continue';
    const right = await readFloat(this.prompter, `Input ${second}: `);
    if (right === CANCEL) return 'continue';

    const outcome = this.performCalculation(kind, left, right);
    if (!outcome.success) {
      this.prompter.print(outcome.error);
      return 'continue';
    }

    this.prompter.print(outcome.data.message);
    return this.formattingSubmenu(outcome.data.value);
  }

  private async formattingSubmenu(value: number): Promise<StepResult> {
    const offerFraction = canShowAsFraction(value);

    for (;;) {
      for (const line of renderFormattingMenu(offerFraction)) this.prompter.print(line);

      const choice = await this.prompter.ask('Please input a valid submenu number: ');
      if (choice === null) return 'end-of-input';

      switch (choice.trim()) {
        case '1':
          this.prompter.print(`   = ${formatDecimal(value)}`);
          break;
        case '2':
          this.prompter.print(`   = ${formatScientific(value)}`);
          break;
        case '3':
          this.prompter.print(`   = ${formatSexagesimal(value)}`);
          break;
        case '4':
          if (offerFraction) {
            this.prompter.print(`   = ${formatResult(value, true, this.options.maxDenominator).text}`);
          } else {
            this.prompter.print('That is not a submenu option!');
          }
          break;
        case '9':
          if (await this.runningConfirmation()) return 'continue';
          break;
        default:
          this.prompter.print('That is not a submenu option!');
      }
    }
  }

  private async triangleFlow(): Promise<StepResult> {
    const angles: number[] = [];
    for (const n of [1, 2, 3]) {
      const angle = await readFloat(this.prompter, `Angle ${n} of triangle: `);
      if (angle === CANCEL) return 'continue';
      angles.push(angle);
    }

    const [a1, a2, a3] = angles;
    try {
      const geometry = await drawTriangle({ a1, a2, a3 }, this.options.trianglePath);
      this.prompter.print(`Please view the exported SVG for the drawn triangle: ${this.options.trianglePath}`);
      this.prompter.print(describeSides(geometry));
    } catch (error) {
      if (!(error instanceof ValidationError)) {
        this.log.error('Triangle export failed', error);
      }
      this.prompter.print(createErrorFromException(error).error);
    }
    return 'continue';
  }

  private viewLog(): void {
    const { totalCount, newEntries } = this.store.snapshot();
    this.prompter.print(`Total calculations: ${totalCount}`);
    if (totalCount === 0) {
      this.prompter.print('The log is empty.');
      return;
    }
    for (const line of this.store.lines()) this.prompter.print(line);
    if (newEntries.length > 0) {
      this.prompter.print(`(${newEntries.length} from this session, saved on exit)`);
    }
  }

  private async resetLog(): Promise<StepResult> {
    const confirmed = await this.askYesNo('Clear every log entry? [y/n]: ');
    if (confirmed === null) return 'end-of-input';
    if (confirmed) {
      this.store.reset();
      this.prompter.print('Log cleared.');
    }
    return 'continue';
  }

  private async finish(): Promise<boolean> {
    if (!this.persist) {
      if (this.store.hasUnsavedEntries()) {
        this.prompter.print('Log not saved.');
      }
      return false;
    }

    try {
      const state = await this.store.save();
      this.prompter.print(`Saved ${state.totalCount} calculations to ${this.store.getPath()}`);
      return true;
    } catch (error) {
      if (!(error instanceof LogUnavailableError)) throw error;
      this.log.error('Log save failed', error);
      this.prompter.print(error.message);
      return false;
    }
  }

  /**
   * Ask until y/yes/n/no. Resolves null if input ends first.
   */
  private async askYesNo(question: string): Promise<boolean | null> {
    for (;;) {
      const answer = await this.prompter.ask(question);
      if (answer === null) return null;

      const normalized = answer.trim().toLowerCase();
      if (YES.has(normalized)) return true;
      if (NO.has(normalized)) return false;
      this.prompter.print('Invalid input!');
    }
  }
}
