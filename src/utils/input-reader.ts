import { readFile } from 'fs/promises';
import { ValidationError } from '../core/errors';

export type TextStream = AsyncIterable<string | Buffer>;

async function readStream(stream: TextStream): Promise<string> {
  const chunks: string[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? chunk : chunk.toString('utf-8'));
  }
  return chunks.join('');
}

/**
 * Reads the application record as JSON from `source`, or from `stdin` when
 * the source is `-` or missing. The record itself is checked later by the
 * validator.
 */
export async function readApplicationInput(
  source: string | undefined,
  stdin: TextStream = process.stdin
): Promise<unknown> {
  const fromStdin = !source || source === '-';

  let content: string;
  if (fromStdin) {
    content = await readStream(stdin);
  } else {
    try {
      content = await readFile(source, 'utf-8');
    } catch {
      throw new ValidationError('input', `Input file not found: ${source}`);
    }
  }

  if (!content.trim()) {
    throw new ValidationError('input', fromStdin ? 'No input on stdin' : `Input file is empty: ${source}`);
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ValidationError('input', `Input is not valid JSON: ${reason}`);
  }
}
