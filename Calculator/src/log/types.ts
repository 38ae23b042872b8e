/**
 * Calculation log types.
 *
 * - LogEntry: one completed calculation, frozen once created
 * - LogState: the old/new split owned by a LogStore
 */

import type { OperationKind } from '../arithmetic/engine.js';

export interface LogEntry {
  /** 1-based position in the log */
  readonly sequence: number;
  /** Roman-numeral date, D.M.Y */
  readonly timestamp: string;
  readonly kind: OperationKind;
  readonly left: number;
  readonly right: number;
  /** Result as displayed (decimal or fraction text) */
  readonly result: string;
}

export interface LogState {
  /** Entries read from the file at start-up (or merged by the last save) */
  readonly oldEntries: readonly LogEntry[];
  /** Entries produced since, not yet written */
  readonly newEntries: readonly LogEntry[];
  readonly totalCount: number;
}

export type LogStorePhase = 'uninitialized' | 'loaded' | 'accepting' | 'saved';

export function createLogEntry(fields: LogEntry): LogEntry {
  return Object.freeze({ ...fields });
}
