import { firstVisible, type FormElement, type FormPage } from '../../browser/page';
import { ExternalServiceError } from '../errors';

export const OTP_INPUT_SELECTORS = [
  'input[name*="security_code" i]',
  'input[name*="verification" i]',
  'input[id*="verification" i]',
  'input[name*="code" i]',
  'input[id*="otp" i]',
  'input[placeholder*="code" i]',
  'input[aria-label*="verification" i]',
  'input[aria-label*="code" i]',
];

export const OTP_SPLIT_INPUT_SELECTOR = 'input[maxlength="1"]';

export const VERIFY_BUTTON_SELECTORS = [
  'button:has-text("Verify")',
  'button:has-text("Confirm")',
  'button:has-text("Submit")',
  'input[type="submit"]',
  'button[type="submit"]',
];

const OTP_PROMPT_TEXT = /check your email|verification code|security code|enter the code|sent you a code|confirm your email/i;

export type CodeInputs = { kind: 'single'; input: FormElement } | { kind: 'split'; inputs: FormElement[] };

export async function findCodeInputs(page: FormPage): Promise<CodeInputs | null> {
  const split: FormElement[] = [];
  for (const element of await page.queryAll(OTP_SPLIT_INPUT_SELECTOR)) {
    if (await element.isVisible()) split.push(element);
  }
  if (split.length > 1) return { kind: 'split', inputs: split };

  for (const selector of OTP_INPUT_SELECTORS) {
    const input = await firstVisible(page, selector);
    if (input) return { kind: 'single', input };
  }
  return null;
}

/** A verification prompt is showing along with somewhere to type the code. */
export async function isOTPChallenge(page: FormPage): Promise<boolean> {
  if (!OTP_PROMPT_TEXT.test(await page.bodyText())) return false;
  return (await findCodeInputs(page)) !== null;
}

export async function enterCode(page: FormPage, code: string): Promise<void> {
  const inputs = await findCodeInputs(page);
  if (!inputs) {
    throw new ExternalServiceError('browser', 'Could not find the verification code input');
  }

  if (inputs.kind === 'single') {
    await inputs.input.fill('');
    await inputs.input.type(code);
  } else {
    const characters = [...code];
    for (const [index, input] of inputs.inputs.entries()) {
      const character = characters[index];
      if (character === undefined) break;
      await input.fill(character);
    }
  }

  for (const selector of VERIFY_BUTTON_SELECTORS) {
    const button = await firstVisible(page, selector);
    if (button && (await button.isEnabled())) {
      await button.click();
      return;
    }
  }
  // Some forms submit on the last keystroke
  await (inputs.kind === 'single' ? inputs.input : inputs.inputs[inputs.inputs.length - 1])?.press('Enter');
}
