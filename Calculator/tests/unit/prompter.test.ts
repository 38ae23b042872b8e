import { describe, it, expect } from 'vitest';
import { PassThrough } from 'node:stream';
import { ReadlinePrompter } from '../../src/input/prompter.js';

describe('ReadlinePrompter', () => {
  it('answers questions from piped lines in order, then null at end of input', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const prompter = new ReadlinePrompter(input, output);

    input.write('first\nsecond\n');
    await expect(prompter.ask('Q1: ')).resolves.toBe('first');
    await expect(prompter.ask('Q2: ')).resolves.toBe('second');

    input.end();
    await expect(prompter.ask('Q3: ')).resolves.toBeNull();
    await expect(prompter.ask('Q4: ')).resolves.toBeNull();
  });

  it('writes questions and printed lines to the output stream', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const prompter = new ReadlinePrompter(input, output);

    prompter.print('hello');
    const answer = prompter.ask('Name: ');
    input.write('Ada\n');
    await expect(answer).resolves.toBe('Ada');
    prompter.close();

    expect(String(output.read())).toBe('hello\nName: ');
  });

  it('resolves a pending question with null when closed', async () => {
    const prompter = new ReadlinePrompter(new PassThrough(), new PassThrough());
    const pending = prompter.ask('Waiting: ');
    prompter.close();
    await expect(pending).resolves.toBeNull();
  });
});
