import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import {
  FieldMappingListSchema,
  type ApplicationInput,
  type FieldMapping,
  type LogicalField,
  type Matcher,
} from '../types';
import { ValidationError } from './errors';

export const DEFAULT_FIELD_MAPPING_PATH = fileURLToPath(new URL('./fields/greenhouse.json', import.meta.url));

function quote(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

/** Compiles a typed matcher into a Playwright selector string. */
export function toSelector(matcher: Matcher): string {
  const tag = matcher.tag ?? '';
  switch (matcher.by) {
    case 'css':
      return matcher.value;
    case 'id':
      return `${tag}[id=${quote(matcher.value)}]`;
    case 'name':
      return `${tag}[name=${quote(matcher.value)}]`;
    case 'placeholder':
      return `${tag}[placeholder*=${quote(matcher.value)} i]`;
    case 'aria-label':
      return `${tag}[aria-label*=${quote(matcher.value)} i]`;
    case 'xpath':
      return `xpath=${matcher.value}`;
  }
}

export function parseFieldMappings(data: unknown, source = 'field mapping'): FieldMapping[] {
  const result = FieldMappingListSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new ValidationError('fieldMapping', `Invalid ${source}${where}: ${issue?.message ?? 'unknown error'}`);
  }
  return result.data;
}

export async function loadFieldMappings(path: string = DEFAULT_FIELD_MAPPING_PATH): Promise<FieldMapping[]> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch {
    throw new ValidationError('fieldMapping', `Field mapping file not found: ${path}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch {
    throw new ValidationError('fieldMapping', `Field mapping file is not valid JSON: ${path}`);
  }
  return parseFieldMappings(data, `field mapping ${path}`);
}

/** The value the input supplies for a logical field, if any. */
export function valueFor(input: ApplicationInput, field: LogicalField): string | undefined {
  switch (field) {
    case 'resume':
      return input.resumePath;
    case 'coverLetter':
      return input.coverLetterPath;
    default:
      return input[field];
  }
}
