import { z } from 'zod';
import {
  ApplicationInputSchema,
  REQUIRED_INPUT_FIELDS,
  type ApplicationInput,
} from '../types';
import { checkAttachment } from '../utils/attachment';
import { parseJobUrl, resolveGreenhouseUrl } from '../utils/url-parser';
import { ValidationError } from './errors';

const OPTIONAL_TEXT_FIELDS = [
  'preferredFirstName',
  'phone',
  'country',
  'coverLetterPath',
  'linkedinProfile',
  'website',
] as const;

const EmailSchema = z.string().email();

function readString(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new ValidationError(key, `Field ${key} must be a string`);
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Normalizes a raw application record. Throws `ValidationError` naming the
 * first offending field. Touches nothing but the attachment files.
 */
export async function validateApplicationInput(raw: unknown): Promise<ApplicationInput> {
  if (!isRecord(raw)) {
    throw new ValidationError('input', 'Application input must be a JSON object');
  }

  const normalized: Record<string, unknown> = {};

  for (const field of REQUIRED_INPUT_FIELDS) {
    const value = readString(raw, field);
    if (value === undefined) {
      throw new ValidationError(field, `Missing required field: ${field}`);
    }
    normalized[field] = value;
  }

  for (const field of OPTIONAL_TEXT_FIELDS) {
    const value = readString(raw, field);
    if (value !== undefined) normalized[field] = value;
  }

  if (raw.answers !== undefined) {
    const answers = z.record(z.string()).safeParse(raw.answers);
    if (!answers.success) {
      throw new ValidationError('answers', 'Field answers must map question labels to strings');
    }
    const cleaned = Object.fromEntries(
      Object.entries(answers.data)
        .map(([label, answer]) => [label.trim(), answer.trim()] as const)
        .filter(([label, answer]) => label.length > 0 && answer.length > 0)
    );
    if (Object.keys(cleaned).length > 0) normalized.answers = cleaned;
  }

  const input = ApplicationInputSchema.parse(normalized);

  if (!EmailSchema.safeParse(input.email).success) {
    throw new ValidationError('email', `Invalid email address: ${input.email}`);
  }

  const url = parseJobUrl(input.jobUrl);
  if (!url.isValid) {
    throw new ValidationError('jobUrl', `Invalid job URL: ${url.error}`);
  }
  input.jobUrl = resolveGreenhouseUrl(input.jobUrl);

  const resume = await checkAttachment(input.resumePath);
  if (!resume.success) {
    throw new ValidationError('resumePath', resume.error ?? 'Invalid resume file');
  }
  input.resumePath = resume.filePath;

  if (input.coverLetterPath) {
    const coverLetter = await checkAttachment(input.coverLetterPath);
    if (!coverLetter.success) {
      throw new ValidationError('coverLetterPath', coverLetter.error ?? 'Invalid cover letter file');
    }
    input.coverLetterPath = coverLetter.filePath;
  }

  return input;
}
