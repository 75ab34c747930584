import { firstVisible, type FormElement, type FormPage } from '../browser/page';
import type { FieldMapping, Matcher } from '../types';
import { silentLogger, type Logger } from '../utils/logger';
import { describeError, ExternalServiceError, FieldNotFoundError } from './errors';
import { toSelector } from './field-mapping';
import { poll, sleep, type RetryPolicy, type Sleep } from './retry';

export const FORM_ROOT_SELECTORS = [
  '#application_form',
  '#application-form',
  'form#application',
  'form[action*="applications"]',
  '#main_fields',
  'form',
];

export const APPLY_BUTTON_SELECTORS = [
  '#apply_button',
  'a[href*="#app"]',
  'button:has-text("Apply")',
  'a:has-text("Apply for this job")',
  '.application-button',
];

const FORM_WAIT_INTERVAL_MS = 500;

export type FieldLookup =
  | { found: true; element: FormElement; matcher: Matcher }
  | { found: false };

export interface NavigatorOptions {
  /** How long `open` waits for the form root. */
  elementTimeoutMs: number;
  lookup: RetryPolicy;
  sleep?: Sleep;
  logger?: Logger;
}

export class FormNavigator {
  private wait: Sleep;
  private logger: Logger;

  constructor(private page: FormPage, private options: NavigatorOptions) {
    this.wait = options.sleep ?? sleep;
    this.logger = options.logger ?? silentLogger;
  }

  async open(url: string): Promise<void> {
    try {
      await this.page.goto(url);
    } catch (error) {
      throw new ExternalServiceError('browser', `Failed to open ${url}`, error);
    }

    let clickedApply = false;
    const policy: RetryPolicy = {
      intervalMs: FORM_WAIT_INTERVAL_MS,
      maxAttempts: Math.max(1, Math.ceil(this.options.elementTimeoutMs / FORM_WAIT_INTERVAL_MS)),
    };

    const outcome = await poll(
      async () => {
        const root = await this.firstMatch(FORM_ROOT_SELECTORS);
        if (root) return root;
        if (!clickedApply) {
          clickedApply = await this.clickApplyButton();
        }
        return undefined;
      },
      policy,
      this.wait
    );

    if (outcome.status === 'exhausted') {
      throw new ExternalServiceError(
        'browser',
        `Application form did not appear within ${this.options.elementTimeoutMs}ms`
      );
    }
    this.logger.debug(`Form root found: ${outcome.value}`);
  }

  /**
   * Tries the mapping's candidates in order on every attempt of the lookup
   * policy. Required fields that never match throw `FieldNotFoundError`.
   */
  async findField(mapping: FieldMapping): Promise<FieldLookup> {
    // File inputs sit hidden behind an "Attach" button but still accept uploads
    const match = (selector: string) =>
      mapping.kind === 'file' ? this.attachedMatch(selector) : this.visibleMatch(selector);
    const outcome = await poll(
      async () => {
        for (const matcher of mapping.candidates) {
          const element = await match(toSelector(matcher));
          if (element) return { element, matcher };
        }
        return undefined;
      },
      this.options.lookup,
      this.wait
    );

    if (outcome.status === 'resolved') {
      this.logger.debug(`${mapping.label} matched ${toSelector(outcome.value.matcher)}`);
      return { found: true, ...outcome.value };
    }
    if (mapping.required) {
      throw new FieldNotFoundError(mapping.field, mapping.label);
    }
    return { found: false };
  }

  private async visibleMatch(selector: string): Promise<FormElement | null> {
    try {
      return await firstVisible(this.page, selector);
    } catch (error) {
      // Invalid selectors in a custom mapping only disqualify that candidate
      this.logger.debug(`Selector ${selector} failed: ${describeError(error)}`);
      return null;
    }
  }

  private async attachedMatch(selector: string): Promise<FormElement | null> {
    try {
      return await this.page.query(selector);
    } catch (error) {
      this.logger.debug(`Selector ${selector} failed: ${describeError(error)}`);
      return null;
    }
  }

  private async firstMatch(selectors: string[]): Promise<string | undefined> {
    for (const selector of selectors) {
      if (await this.visibleMatch(selector)) return selector;
    }
    return undefined;
  }

  private async clickApplyButton(): Promise<boolean> {
    for (const selector of APPLY_BUTTON_SELECTORS) {
      const button = await this.visibleMatch(selector);
      if (button) {
        this.logger.debug(`Clicking apply button ${selector}`);
        await button.click();
        return true;
      }
    }
    return false;
  }
}
