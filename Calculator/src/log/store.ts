/**
 * LogStore: owner of the calculation log.
 *
 * Keeps the entries read at start-up ("old") apart from the ones produced in
 * this session ("new") and rewrites the file on save atomically
 * (write to temp + rename). Lines that do not decode as entries stay in
 * place and are written back unchanged. The file is only touched inside
 * initialize() and save(); no handle stays open in between.
 *
 * Phases: uninitialized -> loaded -> accepting* -> saved
 */

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { logger } from '@tally/shared/Utils/logger.js';
import { LogStateError, LogUnavailableError } from '../errors.js';
import { decodeLog, encodeEntry, encodeLog, type LogLine } from './codec.js';
import type { LogEntry, LogState, LogStorePhase } from './types.js';

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export class LogStore {
  private phase: LogStorePhase = 'uninitialized';
  /** Body of the file as read: entries plus undecodable lines, in order */
  private oldLines: LogLine[] = [];
  private newEntries: LogEntry[] = [];
  private totalCount = 0;
  private lastSequence = 0;
  private log = logger.child('log-store');

  constructor(private readonly logPath: string) {}

  getPath(): string {
    return this.logPath;
  }

  getPhase(): LogStorePhase {
    return this.phase;
  }

  /** One past the highest sequence loaded or appended */
  get nextSequence(): number {
    return this.lastSequence + 1;
  }

  /**
   * Read the log file: decoded entries plus any lines kept as they were.
   * A missing file is an empty log; an unreadable one raises LogUnavailableError
   * and leaves the store uninitialized.
   */
  async initialize(): Promise<LogState> {
    const content = await this.readLogFile();
    const decoded = decodeLog(content ?? '');

    for (const { lineNumber, text } of decoded.skipped) {
      this.log.warn(`Keeping undecodable log line ${lineNumber} as is: ${text.substring(0, 100)}`);
    }

    if (decoded.storedCount !== null && decoded.storedCount !== decoded.entries.length) {
      this.log.warn('Stored total disagrees with entry count, using entry count', {
        stored: decoded.storedCount,
        entries: decoded.entries.length,
      });
    }

    this.oldLines = decoded.lines;
    this.newEntries = [];
    this.totalCount = decoded.entries.length;
    this.lastSequence = decoded.entries.reduce((max, entry) => Math.max(max, entry.sequence), 0);
    this.phase = 'loaded';

    this.log.debug('Log loaded', { path: this.logPath, entries: this.totalCount, existed: content !== null });
    return this.snapshot();
  }

  /**
   * Begin with an empty log without reading the file.
   */
  startFresh(): LogState {
    this.clear();
    this.phase = 'loaded';
    return this.snapshot();
  }

  append(entry: LogEntry): void {
    this.assertInitialized('append');
    this.newEntries.push(entry);
    this.totalCount += 1;
    this.lastSequence = Math.max(this.lastSequence, entry.sequence);
    this.phase = 'accepting';
  }

  /**
   * Write the total, the old lines and the new entries, replacing the file in
   * one rename. On success the new entries join the old lines.
   */
  async save(): Promise<LogState> {
    this.assertInitialized('save');

    const merged: LogLine[] = [...this.oldLines, ...this.newEntries];
    const tempPath = `${this.logPath}.${process.pid}.tmp`;

    try {
      await mkdir(dirname(this.logPath), { recursive: true });
      await writeFile(tempPath, encodeLog(this.totalCount, merged), 'utf-8');
      await rename(tempPath, this.logPath);
    } catch (error) {
      await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        this.log.warn(`Could not remove temp file ${tempPath}`, cleanupError);
      });
      throw new LogUnavailableError(`Could not write log file ${this.logPath}`, {
        path: this.logPath,
        code: errnoCode(error),
      });
    }

    this.oldLines = merged;
    this.newEntries = [];
    this.phase = 'saved';

    this.log.debug('Log saved', { path: this.logPath, entries: this.totalCount });
    return this.snapshot();
  }

  /**
   * Drop every entry (and any kept line) and zero the count. Nothing is
   * written until save().
   */
  reset(): void {
    this.assertInitialized('reset');
    this.clear();
    this.phase = 'loaded';
    this.log.info('Log reset', { path: this.logPath });
  }

  snapshot(): LogState {
    return {
      oldEntries: this.oldEntries(),
      newEntries: [...this.newEntries],
      totalCount: this.totalCount,
    };
  }

  /** Every entry, old then new, in log-file layout */
  lines(): string[] {
    return [...this.oldEntries(), ...this.newEntries].map(encodeEntry);
  }

  /** Old lines that did not decode as entries, as they will be written back */
  keptLines(): string[] {
    return this.oldLines.filter((line): line is string => typeof line === 'string');
  }

  hasUnsavedEntries(): boolean {
    return this.newEntries.length > 0;
  }

  private oldEntries(): LogEntry[] {
    return this.oldLines.filter((line): line is LogEntry => typeof line !== 'string');
  }

  private clear(): void {
    this.oldLines = [];
    this.newEntries = [];
    this.totalCount = 0;
    this.lastSequence = 0;
  }

  private assertInitialized(operation: string): void {
    if (this.phase === 'uninitialized') {
      throw new LogStateError(`Cannot ${operation} before the log is initialized`, { operation });
    }
  }

  /**
   * Read the log as UTF-8 text. Returns null when the file does not exist.
   */
  private async readLogFile(): Promise<string | null> {
    let raw: Buffer;
    try {
      raw = await readFile(this.logPath);
    } catch (error) {
      const code = errnoCode(error);
      if (code === 'ENOENT') {
        return null;
      }
      throw new LogUnavailableError(`Could not read log file ${this.logPath} (${code ?? 'unknown error'})`, {
        path: this.logPath,
        code,
      });
    }

    let text: string;
    try {
      text = new TextDecoder('utf-8', { fatal: true }).decode(raw);
    } catch {
      throw new LogUnavailableError(`Log file ${this.logPath} is not valid UTF-8 text`, { path: this.logPath });
    }

    if (text.includes('\u0000')) {
      throw new LogUnavailableError(`Log file ${this.logPath} contains binary data`, { path: this.logPath });
    }
    return text;
  }
}
