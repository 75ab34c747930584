import { existsSync } from 'fs';
import { chromium, type Browser, type BrowserContext, type ElementHandle, type Page } from 'playwright';
import type { AppConfig } from '../types';
import type { BrowserSession, FormElement, FormPage, OptionChoice, UnansweredQuestion } from './page';

const USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

const QUESTION_MARKER = 'data-greenhouse-apply-question';

export async function launchBrowserSession(config: AppConfig['browser']): Promise<BrowserSession> {
  const browser = await chromium.launch({
    headless: config.headless,
    slowMo: config.slowMo,
    args: [
      '--disable-blink-features=AutomationControlled',
      '--disable-features=IsolateOrigins,site-per-process',
    ],
  });

  try {
    const context = await browser.newContext({
      userAgent: USER_AGENT,
      storageState: config.storageState && existsSync(config.storageState) ? config.storageState : undefined,
      viewport: { width: 1920, height: 1080 },
      locale: Intl.DateTimeFormat().resolvedOptions().locale || 'en-US',
      timezoneId: Intl.DateTimeFormat().resolvedOptions().timeZone || 'UTC',
    });

    // Mask automation indicators
    await context.addInitScript(() => {
      Object.defineProperty(navigator, 'webdriver', { get: () => undefined });
      Object.defineProperty(navigator, 'languages', {
        get: () => (navigator.language ? [navigator.language, 'en'] : ['en']),
      });
    });

    const page = await context.newPage();
    page.setDefaultTimeout(config.timeout);
    return new PlaywrightBrowserSession(browser, context, new PlaywrightFormPage(page), config.headless);
  } catch (error) {
    await browser.close();
    throw error;
  }
}

class PlaywrightBrowserSession implements BrowserSession {
  constructor(
    private browser: Browser,
    private context: BrowserContext,
    readonly page: FormPage,
    readonly headless: boolean
  ) {}

  async close(): Promise<void> {
    await this.context.close();
    await this.browser.close();
  }
}

class PlaywrightFormElement implements FormElement {
  constructor(private handle: ElementHandle<HTMLElement | SVGElement>) {}

  async fill(value: string): Promise<void> {
    await this.handle.fill(value);
  }

  async type(value: string): Promise<void> {
    await this.handle.type(value, { delay: 50 });
  }

  async setInputFiles(filePath: string): Promise<void> {
    await this.handle.setInputFiles(filePath);
  }

  async selectOption(choice: OptionChoice): Promise<void> {
    await this.handle.selectOption(choice, { timeout: 2000 });
  }

  async click(): Promise<void> {
    await this.handle.click();
  }

  async press(key: string): Promise<void> {
    await this.handle.press(key);
  }

  isVisible(): Promise<boolean> {
    return this.handle.isVisible();
  }

  isEnabled(): Promise<boolean> {
    return this.handle.isEnabled();
  }

  async textContent(): Promise<string> {
    return (await this.handle.textContent())?.trim() ?? '';
  }
}

class PlaywrightFormPage implements FormPage {
  constructor(private page: Page) {}

  async goto(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: 60000 });
  }

  url(): string {
    return this.page.url();
  }

  async query(selector: string): Promise<FormElement | null> {
    const handle = await this.page.$(selector);
    return handle ? new PlaywrightFormElement(handle) : null;
  }

  async queryAll(selector: string): Promise<FormElement[]> {
    const handles = await this.page.$$(selector);
    return handles.map((handle) => new PlaywrightFormElement(handle));
  }

  bodyText(): Promise<string> {
    return this.page.evaluate(() => document.body?.innerText ?? '');
  }

  async settle(): Promise<void> {
    await this.page.waitForLoadState('networkidle', { timeout: 10000 }).catch(() => undefined);
  }

  async screenshot(filePath: string): Promise<void> {
    await this.page.screenshot({ path: filePath, fullPage: true });
  }

  async hasCaptcha(): Promise<boolean> {
    return this.recaptchaFrames().length > 0;
  }

  async clickCaptchaCheckbox(): Promise<boolean> {
    for (const frame of this.recaptchaFrames()) {
      const checkbox = await frame.$('#recaptcha-anchor, .recaptcha-checkbox');
      if (checkbox && (await checkbox.isVisible())) {
        await checkbox.click();
        return true;
      }
    }
    return false;
  }

  isCaptchaSolved(): Promise<boolean> {
    return this.page.evaluate(() => {
      const token = document.querySelector<HTMLTextAreaElement>('textarea[name="g-recaptcha-response"]');
      return !token || token.value.length > 0;
    });
  }

  findUnansweredQuestions(): Promise<UnansweredQuestion[]> {
    return this.page.evaluate((marker) => {
      const found: UnansweredQuestion[] = [];
      const containers = document.querySelectorAll('#application_form .field, .application--questions .field, div[class*="question"], fieldset');

      containers.forEach((container) => {
        const label = container.querySelector('label, legend');
        const labelText = label?.textContent?.replace(/\s+/g, ' ').trim() ?? '';
        const control = container.querySelector<HTMLInputElement | HTMLTextAreaElement | HTMLSelectElement>(
          'select, textarea, input:not([type="hidden"]):not([type="file"]):not([type="submit"])'
        );
        if (!control || !labelText) return;

        const required =
          labelText.includes('*') || control.required || control.getAttribute('aria-required') === 'true';
        if (!required) return;

        const style = window.getComputedStyle(control);
        if (style.display === 'none' || style.visibility === 'hidden') return;

        let type: UnansweredQuestion['type'] = 'text';
        let options: string[] = [];
        if (control instanceof HTMLSelectElement) {
          if (control.value) return;
          type = 'select';
          options = Array.from(control.options)
            .map((o) => o.text.trim())
            .filter((text) => text && !/^select/i.test(text));
        } else if (control instanceof HTMLTextAreaElement) {
          if (control.value) return;
          type = 'textarea';
        } else if (control.type === 'checkbox') {
          if (control.checked) return;
          type = 'checkbox';
        } else {
          if (control.value) return;
          type = control.classList.contains('select__input') || control.getAttribute('role') === 'combobox' ? 'combobox' : 'text';
        }

        const index = control.getAttribute(marker) ?? String(document.querySelectorAll(`[${marker}]`).length);
        control.setAttribute(marker, index);
        found.push({
          selector: `[${marker}="${index}"]`,
          label: labelText.replace(/\*/g, '').trim(),
          type,
          options,
        });
      });

      return found;
    }, QUESTION_MARKER);
  }

  private recaptchaFrames() {
    return this.page.frames().filter((f) => f.url().includes('recaptcha'));
  }
}
