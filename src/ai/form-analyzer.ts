import { z } from 'zod';
import type { UnansweredQuestion } from '../browser/page';
import type { AIProvider, ApplicationInput } from '../types';

const FORM_ANALYZER_PROMPT = `You help fill job application forms. Given a candidate's details and unanswered required questions, provide the best answers.

Rules:
- For text fields: provide concise, appropriate text
- For select/dropdown fields: choose the EXACT option from the provided options list
- For checkboxes asking for consent/acknowledgment: answer "check"
- For demographic questions (gender, race, veteran, disability): choose "Decline" or "Prefer not to say" options
- If you cannot answer a question from the details given, leave it out

Return ONLY valid JSON array: [{"id": "field_id", "answer": "value"}, ...]`;

const AnswerListSchema = z.array(
  z.object({
    id: z.string(),
    answer: z.string(),
  })
);

function describeCandidate(input: ApplicationInput): string {
  const lines = [
    `Name: ${input.firstName} ${input.lastName}`,
    `Preferred first name: ${input.preferredFirstName ?? input.firstName}`,
    `Email: ${input.email}`,
    `Phone: ${input.phone ?? 'Not provided'}`,
    `Country: ${input.country ?? 'Not provided'}`,
    `LinkedIn: ${input.linkedinProfile ?? 'Not provided'}`,
    `Website: ${input.website ?? 'Not provided'}`,
  ];
  for (const [label, answer] of Object.entries(input.answers ?? {})) {
    lines.push(`${label}: ${answer}`);
  }
  return lines.join('\n');
}

/**
 * Asks the provider for answers to the given questions. Keys of the result
 * are question selectors; questions the model skipped are absent.
 */
export async function answerQuestions(
  provider: AIProvider,
  input: ApplicationInput,
  questions: UnansweredQuestion[]
): Promise<Map<string, string>> {
  if (questions.length === 0) return new Map();

  const fieldsDescription = questions
    .map((q) => {
      let desc = `- ID: "${q.selector}", Label: "${q.label}", Type: ${q.type}`;
      if (q.options.length > 0) {
        desc += `\n  Options: ${q.options.join(', ')}`;
      }
      return desc;
    })
    .join('\n');

  const prompt = `Answer these required application questions for the candidate:

## Candidate
${describeCandidate(input)}

## Unanswered Questions
${fieldsDescription}

For select/dropdown, use EXACTLY one of the provided options.`;

  const response = await provider.generateText(prompt, FORM_ANALYZER_PROMPT);
  const cleaned = response.replace(/```json?\n?/g, '').replace(/```/g, '').trim();

  let data: unknown;
  try {
    data = JSON.parse(cleaned);
  } catch {
    throw new Error(`AI response is not JSON: ${cleaned.slice(0, 80)}`);
  }

  const parsed = AnswerListSchema.safeParse(data);
  if (!parsed.success) {
    throw new Error('AI response does not match the expected answer list');
  }

  const known = new Set(questions.map((q) => q.selector));
  const results = new Map<string, string>();
  for (const item of parsed.data) {
    if (known.has(item.id) && item.answer.trim()) {
      results.set(item.id, item.answer.trim());
    }
  }
  return results;
}
