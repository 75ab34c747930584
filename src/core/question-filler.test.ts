import { describe, expect, test, vi } from 'vitest';
import { FakeElement, FakeFormPage, noSleep } from '../browser/testing';
import type { AIProvider, ApplicationInput } from '../types';
import { findPresetAnswer, QuestionFiller } from './question-filler';

const input: ApplicationInput = {
  firstName: 'Ada',
  lastName: 'Lovelace',
  email: 'ada@example.com',
  resumePath: '/tmp/resume.pdf',
  jobUrl: 'https://boards.greenhouse.io/acme/jobs/1',
  answers: { sponsorship: 'No', 'how did you hear': 'Referral' },
};

function pageWithQuestions() {
  const page = new FakeFormPage();
  page.questions = [
    { selector: '[q="0"]', label: 'Will you now or in the future require Sponsorship?', type: 'select', options: ['Yes', 'No'] },
    { selector: '[q="1"]', label: 'How did you hear about us?', type: 'text', options: [] },
    { selector: '[q="2"]', label: 'Why Acme?', type: 'textarea', options: [] },
  ];
  const sponsorship = page.add('[q="0"]', new FakeElement({ options: [{ label: 'Yes', value: '1' }, { label: 'No', value: '0' }] }));
  const source = page.add('[q="1"]');
  const why = page.add('[q="2"]');
  return { page, sponsorship, source, why };
}

describe('findPresetAnswer', () => {
  test('matches a fragment case-insensitively', () => {
    expect(findPresetAnswer({ SPONSOR: 'No' }, 'Do you require sponsorship?')).toBe('No');
  });

  test('returns undefined without answers', () => {
    expect(findPresetAnswer(undefined, 'Anything')).toBeUndefined();
  });
});

describe('QuestionFiller', () => {
  test('uses preset answers and reports what is left', async () => {
    const { page, sponsorship, source, why } = pageWithQuestions();

    const report = await new QuestionFiller(page, { sleep: noSleep }).fillAll(input);

    expect(sponsorship.value).toBe('0');
    expect(source.value).toBe('Referral');
    expect(why.value).toBe('');
    expect(report).toEqual({
      answered: ['Will you now or in the future require Sponsorship?', 'How did you hear about us?'],
      unanswered: ['Why Acme?'],
    });
  });

  test('asks the AI provider only about questions without a preset', async () => {
    const { page, why } = pageWithQuestions();
    const generateText = vi.fn(async (_prompt: string, _systemPrompt?: string) =>
      JSON.stringify([{ id: '[q="2"]', answer: 'I like engines.' }])
    );
    const provider: AIProvider = { name: 'openai', generateText };

    const report = await new QuestionFiller(page, { provider, sleep: noSleep }).fillAll(input);

    expect(why.value).toBe('I like engines.');
    expect(report.unanswered).toEqual([]);
    const prompt = generateText.mock.calls[0]?.[0] ?? '';
    expect(prompt).toContain('Why Acme?');
    expect(prompt).not.toContain('Sponsorship?');
  });

  test('keeps going when the AI provider fails', async () => {
    const { page } = pageWithQuestions();
    const provider: AIProvider = {
      name: 'anthropic',
      generateText: async () => {
        throw new Error('401 Unauthorized');
      },
    };

    const report = await new QuestionFiller(page, { provider, sleep: noSleep }).fillAll(input);

    expect(report.unanswered).toEqual(['Why Acme?']);
  });

  test('ticks a checkbox for an affirmative answer', async () => {
    const page = new FakeFormPage();
    page.questions = [{ selector: '[q="0"]', label: 'I agree to the privacy policy', type: 'checkbox', options: [] }];
    const box = page.add('[q="0"]');

    const report = await new QuestionFiller(page).fillAll({ ...input, answers: { privacy: 'yes' } });

    expect(box.clicks).toBe(1);
    expect(report.answered).toEqual(['I agree to the privacy policy']);
  });

  test('does nothing when every required question is answered', async () => {
    const report = await new QuestionFiller(new FakeFormPage()).fillAll(input);

    expect(report).toEqual({ answered: [], unanswered: [] });
  });
});
