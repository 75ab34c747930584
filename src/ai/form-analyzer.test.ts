import { describe, expect, test, vi } from 'vitest';
import type { UnansweredQuestion } from '../browser/page';
import type { AIProvider, ApplicationInput } from '../types';
import { answerQuestions } from './form-analyzer';

const input: ApplicationInput = {
  firstName: 'Ada',
  lastName: 'Lovelace',
  email: 'ada@example.com',
  resumePath: '/tmp/resume.pdf',
  jobUrl: 'https://boards.greenhouse.io/acme/jobs/1',
};

const questions: UnansweredQuestion[] = [
  { selector: '[q="0"]', label: 'Are you authorized to work?', type: 'select', options: ['Yes', 'No'] },
  { selector: '[q="1"]', label: 'Favourite colour', type: 'text', options: [] },
];

function stubProvider(response: string) {
  const generateText = vi.fn(async (_prompt: string, _systemPrompt?: string) => response);
  const provider: AIProvider = { name: 'openai', generateText };
  return { provider, generateText };
}

describe('answerQuestions', () => {
  test('maps answers back to question selectors', async () => {
    const { provider } = stubProvider('```json\n[{"id":"[q=\\"0\\"]","answer":"Yes"},{"id":"unknown","answer":"x"}]\n```');

    const answers = await answerQuestions(provider, input, questions);

    expect([...answers]).toEqual([['[q="0"]', 'Yes']]);
  });

  test('lists the options in the prompt', async () => {
    const { provider, generateText } = stubProvider('[]');

    await answerQuestions(provider, input, questions);

    const prompt = generateText.mock.calls[0]?.[0];
    expect(prompt).toContain('Options: Yes, No');
    expect(prompt).toContain('Name: Ada Lovelace');
  });

  test('does not call the provider without questions', async () => {
    const { provider, generateText } = stubProvider('[]');

    await answerQuestions(provider, input, []);

    expect(generateText).not.toHaveBeenCalled();
  });

  test('rejects a response that is not JSON', async () => {
    await expect(answerQuestions(stubProvider('Sure! Yes.').provider, input, questions)).rejects.toThrow(
      'AI response is not JSON: Sure! Yes.'
    );
  });
});
