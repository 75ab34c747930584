import { describe, expect, test } from 'vitest';
import { FakeElement, FakeFormPage, noSleep } from '../browser/testing';
import type { ApplicationInput, FieldMapping } from '../types';
import { ExternalServiceError, FieldNotFoundError } from './errors';
import { COMBOBOX_OPTION_SELECTOR, FieldFiller } from './form-filler';
import { FormNavigator } from './navigator';

const mappings: FieldMapping[] = [
  { field: 'phone', label: 'Phone', kind: 'text', required: false, candidates: [{ by: 'id', value: 'phone' }] },
  { field: 'firstName', label: 'First Name', kind: 'text', required: true, candidates: [{ by: 'id', value: 'first_name' }] },
  { field: 'email', label: 'Email', kind: 'text', required: true, candidates: [{ by: 'id', value: 'email' }] },
  { field: 'resume', label: 'Resume/CV', kind: 'file', required: true, candidates: [{ by: 'id', value: 'resume' }] },
  { field: 'country', label: 'Country', kind: 'combobox', required: false, candidates: [{ by: 'id', value: 'country' }] },
  { field: 'website', label: 'Website', kind: 'select', required: false, candidates: [{ by: 'id', value: 'website' }] },
];

const input: ApplicationInput = {
  firstName: 'Ada',
  lastName: 'Lovelace',
  email: 'ada@example.com',
  resumePath: '/tmp/resume.pdf',
  jobUrl: 'https://boards.greenhouse.io/acme/jobs/1',
};

function createFiller(page: FakeFormPage, list: FieldMapping[] = mappings) {
  const navigator = new FormNavigator(page, {
    elementTimeoutMs: 1000,
    lookup: { intervalMs: 0, maxAttempts: 2 },
    sleep: noSleep,
  });
  return new FieldFiller(page, navigator, list, { sleep: noSleep });
}

function requiredPage() {
  const page = new FakeFormPage();
  const firstName = page.add('[id="first_name"]');
  const email = page.add('[id="email"]');
  const resume = page.add('[id="resume"]');
  return { page, firstName, email, resume };
}

describe('FieldFiller', () => {
  test('fills required fields before optional ones', async () => {
    const { page, firstName, email, resume } = requiredPage();
    const phone = page.add('[id="phone"]');

    const report = await createFiller(page).fillAll({ ...input, phone: '555-0100' });

    expect(report.filled).toEqual(['firstName', 'email', 'resume', 'phone']);
    expect(report.skipped).toEqual([]);
    expect(firstName.value).toBe('Ada');
    expect(email.value).toBe('ada@example.com');
    expect(resume.files).toEqual(['/tmp/resume.pdf']);
    expect(phone.value).toBe('555-0100');
  });

  test('skips fields the input leaves empty', async () => {
    const { page } = requiredPage();

    const report = await createFiller(page).fillAll(input);

    expect(report.filled).toEqual(['firstName', 'email', 'resume']);
    expect(page.queries).not.toContain('[id="phone"]');
  });

  test('records an optional field with no match without failing', async () => {
    const { page } = requiredPage();

    const report = await createFiller(page).fillAll({ ...input, phone: '555-0100' });

    expect(report.skipped).toEqual([
      { field: 'phone', label: 'Phone', reason: 'no candidate selector matched' },
    ]);
  });

  test('records an optional field whose interaction fails', async () => {
    const { page } = requiredPage();
    page.add('[id="phone"]', new FakeElement({ failWith: new Error('Element is detached') }));

    const report = await createFiller(page).fillAll({ ...input, phone: '555-0100' });

    expect(report.skipped).toEqual([{ field: 'phone', label: 'Phone', reason: 'Element is detached' }]);
  });

  test('aborts when a required field is missing', async () => {
    const page = new FakeFormPage();
    page.add('[id="first_name"]');

    const error = await createFiller(page).fillAll(input).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FieldNotFoundError);
    expect(error).toHaveProperty('field', 'email');
  });

  test('wraps driver failures on required fields', async () => {
    const { page } = requiredPage();
    page.remove('[id="email"]');
    page.add('[id="email"]', new FakeElement({ failWith: new Error('Timeout 20000ms exceeded') }));

    const error = await createFiller(page).fillAll(input).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExternalServiceError);
    expect(error).toHaveProperty('message', 'Failed to fill Email: Timeout 20000ms exceeded');
  });

  test('picks the matching combobox option', async () => {
    const { page } = requiredPage();
    const country = page.add('[id="country"]');
    page.add(COMBOBOX_OPTION_SELECTOR, new FakeElement({ text: 'United States' }));
    const uk = page.add(COMBOBOX_OPTION_SELECTOR, new FakeElement({ text: 'United Kingdom' }));

    await createFiller(page).fillAll({ ...input, country: 'united kingdom' });

    expect(country.typed).toEqual(['united kingdom']);
    expect(uk.clicks).toBe(1);
    expect(country.pressed).toEqual([]);
  });

  test('presses Enter when no combobox option matches', async () => {
    const { page } = requiredPage();
    const country = page.add('[id="country"]');

    await createFiller(page).fillAll({ ...input, country: 'Atlantis' });

    expect(country.pressed).toEqual(['Enter']);
  });

  test('selects by label, then by value', async () => {
    const { page } = requiredPage();
    const select = page.add(
      '[id="website"]',
      new FakeElement({ options: [{ label: 'Personal site', value: 'https://ada.example.com' }] })
    );

    const report = await createFiller(page).fillAll({ ...input, website: 'https://ada.example.com' });

    expect(select.value).toBe('https://ada.example.com');
    expect(report.filled).toContain('website');
  });
});
