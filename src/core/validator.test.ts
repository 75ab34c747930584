import { afterAll, beforeAll, describe, expect, test } from 'vitest';
import { mkdtemp, mkdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { isAbsolute, join, relative } from 'path';
import { ValidationError } from './errors';
import { validateApplicationInput } from './validator';

describe('validateApplicationInput', () => {
  let dir: string;
  let resumePath: string;
  let coverLetterPath: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'greenhouse-apply-validator-'));
    resumePath = join(dir, 'resume.pdf');
    coverLetterPath = join(dir, 'cover.docx');
    await writeFile(resumePath, 'resume');
    await writeFile(coverLetterPath, 'cover');
    await writeFile(join(dir, 'notes.png'), 'png');
    await mkdir(join(dir, 'folder.pdf'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function baseInput(): Record<string, unknown> {
    return {
      firstName: 'Ada',
      lastName: 'Lovelace',
      email: 'ada@example.com',
      resumePath,
      jobUrl: 'https://boards.greenhouse.io/acme/jobs/12345',
    };
  }

  async function expectValidationError(raw: unknown, field: string): Promise<ValidationError> {
    const error = await validateApplicationInput(raw).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ValidationError);
    if (!(error instanceof ValidationError)) throw error;
    expect(error.field).toBe(field);
    return error;
  }

  test('accepts a minimal valid record', async () => {
    const input = await validateApplicationInput(baseInput());

    expect(input).toEqual({
      firstName: 'Ada',
      lastName: 'Lovelace',
      email: 'ada@example.com',
      resumePath,
      jobUrl: 'https://boards.greenhouse.io/acme/jobs/12345',
    });
  });

  test('resolves relative attachment paths to absolute ones', async () => {
    const relativeResume = relative(process.cwd(), resumePath);
    expect(isAbsolute(relativeResume)).toBe(false);

    const input = await validateApplicationInput({
      ...baseInput(),
      resumePath: relativeResume,
      coverLetterPath: `./${relative(process.cwd(), dir)}/sub/../cover.docx`,
    });

    expect(input.resumePath).toBe(resumePath);
    expect(input.coverLetterPath).toBe(coverLetterPath);
  });

  test('trims strings and drops blank optionals', async () => {
    const input = await validateApplicationInput({
      ...baseInput(),
      firstName: '  Ada ',
      phone: '   ',
      country: ' United Kingdom ',
    });

    expect(input.firstName).toBe('Ada');
    expect(input.phone).toBeUndefined();
    expect(input.country).toBe('United Kingdom');
  });

  test('names a missing email', async () => {
    const raw = baseInput();
    delete raw.email;

    const error = await expectValidationError(raw, 'email');
    expect(error.message).toBe('Missing required field: email');
  });

  test('treats a blank required field as missing', async () => {
    const error = await expectValidationError({ ...baseInput(), lastName: '  ' }, 'lastName');
    expect(error.message).toBe('Missing required field: lastName');
  });

  test('reports the first missing field in declaration order', async () => {
    await expectValidationError({ jobUrl: 'https://boards.greenhouse.io/acme/jobs/1' }, 'firstName');
  });

  test('rejects a malformed email', async () => {
    await expectValidationError({ ...baseInput(), email: 'ada-at-example' }, 'email');
  });

  test('rejects a non-http job URL', async () => {
    await expectValidationError({ ...baseInput(), jobUrl: 'file:///etc/passwd' }, 'jobUrl');
  });

  test('rewrites gh_jid company pages to the Greenhouse embed form', async () => {
    const input = await validateApplicationInput({
      ...baseInput(),
      jobUrl: 'https://acme.example.com/careers?gh_jid=777',
    });

    expect(input.jobUrl).toBe('https://boards.greenhouse.io/embed/job_app?token=777');
  });

  test('rejects a resume that does not exist', async () => {
    const error = await expectValidationError({ ...baseInput(), resumePath: join(dir, 'missing.pdf') }, 'resumePath');
    expect(error.message).toBe(`File not found: ${join(dir, 'missing.pdf')}`);
  });

  test('rejects a directory in place of a file', async () => {
    await expectValidationError({ ...baseInput(), resumePath: join(dir, 'folder.pdf') }, 'resumePath');
  });

  test('rejects an unsupported attachment type', async () => {
    const error = await expectValidationError(
      { ...baseInput(), coverLetterPath: join(dir, 'notes.png') },
      'coverLetterPath'
    );
    expect(error.message).toBe('Unsupported file type: .png. Supported: .pdf, .doc, .docx, .txt, .rtf');
  });

  test('normalizes the cover letter path', async () => {
    const input = await validateApplicationInput({ ...baseInput(), coverLetterPath });
    expect(input.coverLetterPath).toBe(coverLetterPath);
  });

  test('keeps non-blank custom answers', async () => {
    const input = await validateApplicationInput({
      ...baseInput(),
      answers: { ' Sponsorship ': 'No', blank: ' ' },
    });

    expect(input.answers).toEqual({ Sponsorship: 'No' });
  });

  test('rejects a non-object record', async () => {
    await expectValidationError('nope', 'input');
  });

  test('rejects a non-string field', async () => {
    await expectValidationError({ ...baseInput(), phone: 42 }, 'phone');
  });
});
