import { input } from '@inquirer/prompts';
import type { OTPResolution, CodeSource } from './resolver';

export type AskForCode = (message: string) => Promise<string>;

const askWithInquirer: AskForCode = (message) =>
  input({
    message,
    validate: (value) => (value.trim() ? true : 'Code is required'),
  });

/** Asks the person at the terminal for the emailed code. */
export class PromptCodeSource implements CodeSource {
  private asked = 0;

  constructor(private maxAttempts = 3, private ask: AskForCode = askWithInquirer) {}

  get retries(): number {
    return this.maxAttempts;
  }

  async resolve(): Promise<OTPResolution> {
    if (this.asked >= this.maxAttempts) {
      return { state: 'timed-out', attempts: this.asked };
    }
    this.asked++;
    const suffix = this.asked > 1 ? ` (attempt ${this.asked}/${this.maxAttempts})` : '';
    const code = (await this.ask(`Verification code${suffix}:`)).trim();
    return { state: 'resolved', code, messageId: 'terminal' };
  }
}
