/**
 * The slice of a browser page the application flow relies on. Playwright
 * implements it in ./session; tests use an in-memory fake.
 */

export type OptionChoice = { label: string } | { value: string };

export interface FormElement {
  fill(value: string): Promise<void>;
  /** Types key by key, for widgets that react to keystrokes. */
  type(value: string): Promise<void>;
  setInputFiles(filePath: string): Promise<void>;
  selectOption(choice: OptionChoice): Promise<void>;
  click(): Promise<void>;
  press(key: string): Promise<void>;
  isVisible(): Promise<boolean>;
  isEnabled(): Promise<boolean>;
  textContent(): Promise<string>;
}

export type QuestionType = 'text' | 'textarea' | 'select' | 'combobox' | 'checkbox';

/** A required control the field mapping does not cover that is still empty. */
export interface UnansweredQuestion {
  selector: string;
  label: string;
  type: QuestionType;
  options: string[];
}

export interface FormPage {
  goto(url: string): Promise<void>;
  url(): string;
  query(selector: string): Promise<FormElement | null>;
  queryAll(selector: string): Promise<FormElement[]>;
  bodyText(): Promise<string>;
  /** Waits for network activity to settle after a click. Never throws. */
  settle(): Promise<void>;
  screenshot(filePath: string): Promise<void>;

  hasCaptcha(): Promise<boolean>;
  /** Clicks the reCAPTCHA checkbox; false when it is not visible. */
  clickCaptchaCheckbox(): Promise<boolean>;
  isCaptchaSolved(): Promise<boolean>;

  findUnansweredQuestions(): Promise<UnansweredQuestion[]>;
}

export interface BrowserSession {
  readonly page: FormPage;
  readonly headless: boolean;
  close(): Promise<void>;
}

/** Returns the first visible element matching `selector`, or null. */
export async function firstVisible(page: FormPage, selector: string): Promise<FormElement | null> {
  const elements = await page.queryAll(selector);
  for (const element of elements) {
    if (await element.isVisible()) return element;
  }
  return null;
}
