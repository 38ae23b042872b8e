/**
 * Prompter: the interactive I/O seam.
 *
 * The session and the input validator only talk to this interface, so tests
 * drive them with scripted answers instead of a terminal.
 */

import * as readline from 'node:readline';

export interface Prompter {
  /**
   * Ask a question and resolve with the typed line.
   * Resolves null once input has ended (Ctrl-D, Ctrl-C, closed stdin).
   */
  ask(question: string): Promise<string | null>;
  /** Print one line of user-facing output */
  print(line: string): void;
  close(): void;
}

/**
 * Readline-backed prompter. Lines are queued as they arrive so piped input
 * that lands before a question is asked is not lost.
 */
export class ReadlinePrompter implements Prompter {
  private rl: readline.Interface;
  private closed = false;
  private buffered: string[] = [];
  private waiting: Array<(answer: string | null) => void> = [];

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private output: NodeJS.WritableStream = process.stdout,
  ) {
    this.rl = readline.createInterface({ input, output });
    this.rl.on('line', (line) => {
      const next = this.waiting.shift();
      if (next) {
        next(line);
      } else {
        this.buffered.push(line);
      }
    });
    // Ctrl-C on a TTY ends input the same way Ctrl-D does
    this.rl.on('SIGINT', () => this.close());
    this.rl.on('close', () => {
      this.closed = true;
      for (const resolve of this.waiting.splice(0)) {
        resolve(null);
      }
    });
  }

  ask(question: string): Promise<string | null> {
    this.output.write(question);

    const line = this.buffered.shift();
    if (line !== undefined) return Promise.resolve(line);
    if (this.closed) return Promise.resolve(null);

    return new Promise((resolve) => {
      this.waiting.push(resolve);
    });
  }

  print(line: string): void {
    this.output.write(line + '\n');
  }

  close(): void {
    if (!this.closed) {
      this.rl.close();
    }
  }
}
