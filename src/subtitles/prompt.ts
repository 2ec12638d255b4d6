/**
 * Prompting for a candidate number.
 *
 * On a terminal the question is asked through inquirer; with piped stdin
 * answers are read line by line, so a script can feed choices.
 */

import inquirer from 'inquirer';
import * as readline from 'readline';
import { AppError, ErrorCode } from '../errors/types';

export interface Prompter {
  /** Ask for a choice among `count` candidates; resolves with the raw answer */
  ask(count: number): Promise<string>;
  close(): void;
}

export function promptMessage(count: number): string {
  return `Choose subtitle [1-${count}], q to quit:`;
}

export class InquirerPrompter implements Prompter {
  async ask(count: number): Promise<string> {
    const answers = await inquirer.prompt<{ choice: string }>([
      {
        type: 'input',
        name: 'choice',
        message: promptMessage(count),
      },
    ]);
    return answers.choice;
  }

  close(): void {
    // inquirer releases the terminal after each prompt
  }
}

export class ReadlinePrompter implements Prompter {
  private rl: readline.Interface | null = null;
  private lines: AsyncIterableIterator<string> | null = null;

  constructor(
    private input: NodeJS.ReadableStream = process.stdin,
    private output: NodeJS.WritableStream = process.stdout
  ) {}

  async ask(count: number): Promise<string> {
    if (!this.rl || !this.lines) {
      this.rl = readline.createInterface({ input: this.input, terminal: false });
      this.lines = this.rl[Symbol.asyncIterator]();
    }

    this.output.write(`${promptMessage(count)} `);
    const next = await this.lines.next();
    if (next.done) {
      throw new AppError('End of input while waiting for a choice', ErrorCode.IO_ERROR, {}, false);
    }
    return next.value;
  }

  close(): void {
    this.rl?.close();
    this.rl = null;
    this.lines = null;
  }
}

/**
 * Pick the prompter for the current stdin/stdout
 */
export function createPrompter(): Prompter {
  if (process.stdin.isTTY && process.stdout.isTTY) {
    return new InquirerPrompter();
  }
  return new ReadlinePrompter();
}
