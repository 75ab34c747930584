import type { FormPage, UnansweredQuestion } from '../browser/page';
import { answerQuestions } from '../ai/form-analyzer';
import type { AIProvider, ApplicationInput } from '../types';
import { silentLogger, type Logger } from '../utils/logger';
import { describeError } from './errors';
import { chooseComboboxOption, selectOption } from './form-filler';
import { sleep, type Sleep } from './retry';

const CHECK_ANSWER = /^(check|checked|yes|true|agree|i agree)$/i;

export interface QuestionReport {
  answered: string[];
  unanswered: string[];
}

export interface QuestionFillerOptions {
  provider?: AIProvider;
  logger?: Logger;
  sleep?: Sleep;
}

/** Case-insensitive: the first answer key contained in the label wins. */
export function findPresetAnswer(answers: Record<string, string> | undefined, label: string): string | undefined {
  const haystack = label.toLowerCase();
  for (const [fragment, answer] of Object.entries(answers ?? {})) {
    if (haystack.includes(fragment.toLowerCase())) return answer;
  }
  return undefined;
}

/**
 * Answers required questions the field mapping does not cover. Preset
 * answers come first, the AI provider covers the rest. Never throws.
 */
export class QuestionFiller {
  private logger: Logger;
  private wait: Sleep;

  constructor(private page: FormPage, private options: QuestionFillerOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.wait = options.sleep ?? sleep;
  }

  async fillAll(input: ApplicationInput): Promise<QuestionReport> {
    const report: QuestionReport = { answered: [], unanswered: [] };

    let questions: UnansweredQuestion[];
    try {
      questions = await this.page.findUnansweredQuestions();
    } catch (error) {
      this.logger.warning(`Could not scan for custom questions: ${describeError(error)}`);
      return report;
    }
    if (questions.length === 0) return report;
    this.logger.debug(`Found ${questions.length} unanswered required question(s)`);

    const answers = new Map<string, string>();
    for (const question of questions) {
      const preset = findPresetAnswer(input.answers, question.label);
      if (preset !== undefined) answers.set(question.selector, preset);
    }

    const remaining = questions.filter((q) => !answers.has(q.selector));
    if (remaining.length > 0 && this.options.provider) {
      try {
        const generated = await answerQuestions(this.options.provider, input, remaining);
        for (const [selector, answer] of generated) answers.set(selector, answer);
      } catch (error) {
        this.logger.warning(`AI could not answer custom questions: ${describeError(error)}`);
      }
    }

    for (const question of questions) {
      const answer = answers.get(question.selector);
      if (answer !== undefined && (await this.answer(question, answer))) {
        report.answered.push(question.label);
      } else {
        report.unanswered.push(question.label);
      }
    }

    if (report.unanswered.length > 0) {
      this.logger.warning(`Unanswered required questions: ${report.unanswered.join('; ')}`);
    }
    return report;
  }

  private async answer(question: UnansweredQuestion, answer: string): Promise<boolean> {
    try {
      const element = await this.page.query(question.selector);
      if (!element) return false;

      switch (question.type) {
        case 'text':
        case 'textarea':
          await element.fill(answer);
          break;
        case 'select':
          await selectOption(element, answer, this.logger);
          break;
        case 'combobox':
          await chooseComboboxOption(this.page, element, answer, this.wait);
          break;
        case 'checkbox':
          if (!CHECK_ANSWER.test(answer.trim())) return false;
          await element.click();
          break;
      }
      this.logger.debug(`Answered "${question.label}"`);
      return true;
    } catch (error) {
      this.logger.debug(`Could not answer "${question.label}": ${describeError(error)}`);
      return false;
    }
  }
}
