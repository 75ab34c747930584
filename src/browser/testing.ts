import type { BrowserSession, FormElement, FormPage, OptionChoice, UnansweredQuestion } from './page';

export interface FakeElementOptions {
  visible?: boolean;
  enabled?: boolean;
  text?: string;
  options?: { label: string; value: string }[];
  onClick?: () => void;
  failWith?: Error;
}

/** In-memory element that records every interaction. */
export class FakeElement implements FormElement {
  value = '';
  files: string[] = [];
  typed: string[] = [];
  pressed: string[] = [];
  clicks = 0;

  constructor(private options: FakeElementOptions = {}) {}

  private guard(): void {
    if (this.options.failWith) throw this.options.failWith;
  }

  async fill(value: string): Promise<void> {
    this.guard();
    this.value = value;
  }

  async type(value: string): Promise<void> {
    this.guard();
    this.typed.push(value);
    this.value += value;
  }

  async setInputFiles(filePath: string): Promise<void> {
    this.guard();
    this.files.push(filePath);
  }

  async selectOption(choice: OptionChoice): Promise<void> {
    this.guard();
    const match = (this.options.options ?? []).find((o) =>
      'label' in choice ? o.label === choice.label : o.value === choice.value
    );
    if (!match) throw new Error('No matching option');
    this.value = match.value;
  }

  async click(): Promise<void> {
    this.guard();
    this.clicks++;
    this.options.onClick?.();
  }

  async press(key: string): Promise<void> {
    this.pressed.push(key);
  }

  async isVisible(): Promise<boolean> {
    return this.options.visible ?? true;
  }

  async isEnabled(): Promise<boolean> {
    return this.options.enabled ?? true;
  }

  async textContent(): Promise<string> {
    return this.options.text ?? '';
  }
}

/** In-memory page. Selectors match only when registered verbatim. */
export class FakeFormPage implements FormPage {
  currentUrl = 'about:blank';
  body = '';
  visited: string[] = [];
  screenshots: string[] = [];
  captcha = { present: false, solved: false, clicks: 0 };
  questions: UnansweredQuestion[] = [];
  queries: string[] = [];
  private elements = new Map<string, FakeElement[]>();

  add(selector: string, element: FakeElement = new FakeElement()): FakeElement {
    this.elements.set(selector, [...(this.elements.get(selector) ?? []), element]);
    return element;
  }

  remove(selector: string): void {
    this.elements.delete(selector);
  }

  async goto(url: string): Promise<void> {
    this.visited.push(url);
    this.currentUrl = url;
  }

  url(): string {
    return this.currentUrl;
  }

  async query(selector: string): Promise<FormElement | null> {
    this.queries.push(selector);
    return this.elements.get(selector)?.[0] ?? null;
  }

  async queryAll(selector: string): Promise<FormElement[]> {
    this.queries.push(selector);
    return this.elements.get(selector) ?? [];
  }

  async bodyText(): Promise<string> {
    return this.body;
  }

  async settle(): Promise<void> {}

  async screenshot(filePath: string): Promise<void> {
    this.screenshots.push(filePath);
  }

  async hasCaptcha(): Promise<boolean> {
    return this.captcha.present;
  }

  async clickCaptchaCheckbox(): Promise<boolean> {
    if (!this.captcha.present) return false;
    this.captcha.clicks++;
    return true;
  }

  async isCaptchaSolved(): Promise<boolean> {
    return !this.captcha.present || this.captcha.solved;
  }

  async findUnansweredQuestions(): Promise<UnansweredQuestion[]> {
    return this.questions;
  }
}

export class FakeBrowserSession implements BrowserSession {
  closed = 0;

  constructor(readonly page: FakeFormPage = new FakeFormPage(), readonly headless = true) {}

  async close(): Promise<void> {
    this.closed++;
  }
}

export const noSleep = async (): Promise<void> => {};
