/**
 * @module @envstage/cli/prompt/terminal-prompt
 * Yes/no question on the terminal that gives up after a deadline.
 */

import { createInterface } from 'node:readline/promises';
import type { Readable, Writable } from 'node:stream';
import type { PromptOutcome, StartupPrompt } from '@envstage/core';

export interface TerminalPromptOptions {
  input: Readable;
  output: Writable;
}

export function parseAnswer(raw: string, defaultAnswer: boolean): boolean {
  const answer = raw.trim().toLowerCase();
  if (answer === '') {
    return defaultAnswer;
  }
  return answer === 'y' || answer === 'yes';
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

export class TerminalPrompt implements StartupPrompt {
  private readonly input: Readable;
  private readonly output: Writable;

  constructor(options: TerminalPromptOptions) {
    this.input = options.input;
    this.output = options.output;
  }

  async confirm(
    question: string,
    options: { timeoutMs: number; defaultAnswer: boolean }
  ): Promise<PromptOutcome> {
    const hint = options.defaultAnswer ? '[Y/n]' : '[y/N]';
    const seconds = Math.ceil(options.timeoutMs / 1000);
    const rl = createInterface({ input: this.input, output: this.output });
    try {
      const raw = await rl.question(`${question} ${hint} (${seconds}s) `, {
        signal: AbortSignal.timeout(options.timeoutMs),
      });
      return { answer: parseAnswer(raw, options.defaultAnswer), timedOut: false };
    } catch (error) {
      if (isAbortError(error)) {
        this.output.write('\n');
        return { answer: options.defaultAnswer, timedOut: true };
      }
      throw error;
    } finally {
      rl.close();
    }
  }
}
