import { firstVisible, type FormPage } from '../browser/page';
import { silentLogger, type Logger } from '../utils/logger';
import { describeError, OTPTimeoutError } from './errors';
import { enterCode, isOTPChallenge } from './otp/entry';
import type { CodeSource } from './otp/resolver';
import { poll, sleep, type RetryPolicy, type Sleep } from './retry';

export const SUBMIT_BUTTON_SELECTORS = [
  '#submit_app',
  'button[type="submit"]',
  'input[type="submit"]',
  'button:has-text("Submit application")',
  'button:has-text("Submit")',
];

export const CONFIRMATION_SELECTORS = [
  '#application_confirmation',
  '.confirmation',
  '#confirmation',
  'h1:has-text("Thank")',
  'h2:has-text("Thank")',
];

export const ERROR_BANNER_SELECTORS = [
  '.error-message',
  '.field-error',
  '.form-error',
  '.flash-error',
  '[role="alert"]',
  '.application--error',
];

const CONFIRMATION_PATH = /confirmation|thank|success/i;

function urlPath(url: string): string {
  try {
    return new URL(url).pathname;
  } catch {
    return '';
  }
}
const CONFIRMATION_TEXT = /thank you for applying|application has been submitted|received your application/i;

export type SubmissionOutcome =
  | { state: 'confirmed'; message: string }
  | { state: 'rejected'; message: string }
  | { state: 'otp-required' }
  | { state: 'ambiguous'; message: string };

export interface SubmissionControllerOptions {
  policy: RetryPolicy;
  captchaPolicy: RetryPolicy;
  /** A visible browser lets the user solve a CAPTCHA by hand. */
  interactive: boolean;
  logger?: Logger;
  sleep?: Sleep;
}

export class SubmissionController {
  private logger: Logger;
  private wait: Sleep;
  private urlBeforeSubmit: string;

  constructor(private page: FormPage, private options: SubmissionControllerOptions) {
    this.logger = options.logger ?? silentLogger;
    this.wait = options.sleep ?? sleep;
    this.urlBeforeSubmit = page.url();
  }

  /**
   * Clicks the reCAPTCHA checkbox when there is one and, in a visible
   * browser, waits for the user to finish the challenge. Returns whether the
   * form is clear to submit; submission goes ahead either way.
   */
  async passCaptcha(): Promise<boolean> {
    if (!(await this.page.hasCaptcha())) return true;

    await this.page.clickCaptchaCheckbox();
    if (await this.page.isCaptchaSolved()) return true;

    if (!this.options.interactive) {
      this.logger.warning('reCAPTCHA is not solved and the browser is headless; submitting anyway');
      return false;
    }

    this.logger.info('Solve the reCAPTCHA in the browser window to continue');
    const outcome = await poll(
      async () => ((await this.page.isCaptchaSolved()) ? true : undefined),
      this.options.captchaPolicy,
      this.wait
    );
    if (outcome.status === 'exhausted') {
      this.logger.warning('reCAPTCHA still unsolved; submitting anyway');
      return false;
    }
    return true;
  }

  async submit(): Promise<SubmissionOutcome> {
    this.urlBeforeSubmit = this.page.url();
    const clicked = await this.clickSubmit();
    if (!clicked) {
      return { state: 'rejected', message: 'Could not find submit button' };
    }
    await this.page.settle();
    return this.observe();
  }

  /** Polls until the page shows a terminal state or the attempts run out. */
  async observe(): Promise<SubmissionOutcome> {
    const outcome = await poll(() => this.readState(), this.options.policy, this.wait);
    if (outcome.status === 'resolved') return outcome.value;
    return {
      state: 'ambiguous',
      message: `No confirmation or error after ${outcome.attempts} checks`,
    };
  }

  /**
   * Feeds codes from `source` into the challenge until the page moves on.
   * Throws `OTPTimeoutError` when the source runs dry.
   */
  async completeOTPChallenge(source: CodeSource, challengeStartedAt: Date): Promise<SubmissionOutcome> {
    for (let attempt = 1; attempt <= source.retries; attempt++) {
      const resolution = await source.resolve(challengeStartedAt);
      if (resolution.state === 'timed-out') {
        throw new OTPTimeoutError(resolution.attempts);
      }

      this.logger.info('Entering verification code');
      await enterCode(this.page, resolution.code);
      await this.page.settle();

      const outcome = await this.observe();
      if (outcome.state !== 'otp-required') return outcome;
      this.logger.warning('Verification code was not accepted');
    }
    return { state: 'rejected', message: 'Verification code was not accepted' };
  }

  private async clickSubmit(): Promise<boolean> {
    for (const selector of SUBMIT_BUTTON_SELECTORS) {
      try {
        const button = await firstVisible(this.page, selector);
        if (button && (await button.isEnabled())) {
          this.logger.debug(`Clicking submit button ${selector}`);
          await button.click();
          return true;
        }
      } catch (error) {
        this.logger.debug(`Submit candidate ${selector} failed: ${describeError(error)}`);
      }
    }
    return false;
  }

  private async readState(): Promise<SubmissionOutcome | undefined> {
    for (const selector of CONFIRMATION_SELECTORS) {
      const element = await firstVisible(this.page, selector);
      if (element) {
        return { state: 'confirmed', message: (await element.textContent()) || 'Application submitted' };
      }
    }

    const body = await this.page.bodyText();
    const confirmation = CONFIRMATION_TEXT.exec(body);
    if (confirmation) {
      return { state: 'confirmed', message: `Application submitted (${confirmation[0]})` };
    }

    if (await isOTPChallenge(this.page)) {
      return { state: 'otp-required' };
    }

    for (const selector of ERROR_BANNER_SELECTORS) {
      const banner = await firstVisible(this.page, selector);
      if (banner) {
        const text = await banner.textContent();
        return { state: 'rejected', message: text || 'The form reported an error' };
      }
    }

    // Only after navigation, and only on the path
    const url = this.page.url();
    if (url !== this.urlBeforeSubmit && CONFIRMATION_PATH.test(urlPath(url))) {
      return { state: 'confirmed', message: 'Application submitted' };
    }

    return undefined;
  }
}
