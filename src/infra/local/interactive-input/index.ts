import * as readline from 'readline/promises';
import type { InteractiveInputPort } from '../../../ports/interactive-input.port.js';

/**
 * Terminal prompts over readline. An empty answer to `ask` counts as cancel.
 */
export class ReadlineInteractiveInput implements InteractiveInputPort {
  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stderr
  ) {}

  async ask(prompt: string): Promise<string | null> {
    const answer = await this.question(`${prompt} `);
    const trimmed = answer?.trim() ?? '';
    return trimmed === '' ? null : trimmed;
  }

  async confirm(prompt: string): Promise<boolean> {
    const answer = await this.question(`${prompt} [y/N] `);
    return /^y(es)?$/i.test(answer?.trim() ?? '');
  }

  private async question(text: string): Promise<string | null> {
    const rl = readline.createInterface({ input: this.input, output: this.output, terminal: false });
    // Ctrl+D closes the interface without an answer; the pending question then rejects.
    const closed = new Promise<null>((resolve) => rl.once('close', () => resolve(null)));
    const answered = rl.question(text).catch(() => null);
    try {
      return await Promise.race([answered, closed]);
    } finally {
      rl.close();
    }
  }
}

/**
 * Non-interactive input: every question is answered as if the user canceled.
 * Used when stdin is not a TTY and for scripted runs.
 */
export class NonInteractiveInput implements InteractiveInputPort {
  async ask(_prompt: string): Promise<string | null> {
    return null;
  }

  async confirm(_prompt: string): Promise<boolean> {
    return false;
  }
}
