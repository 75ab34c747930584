/**
 * Attachment checks for the files uploaded with an application
 */

import { constants } from 'fs';
import { access, stat } from 'fs/promises';
import { extname, resolve } from 'path';
import { ACCEPTED_ATTACHMENT_EXTENSIONS } from '../types';

export type AttachmentExtension = (typeof ACCEPTED_ATTACHMENT_EXTENSIONS)[number];

export interface AttachmentCheck {
  success: boolean;
  filePath: string;
  error?: string;
}

export function isSupportedExtension(filePath: string): boolean {
  const ext = extname(filePath).toLowerCase();
  return ACCEPTED_ATTACHMENT_EXTENSIONS.some((accepted) => accepted === ext);
}

/**
 * Resolves `filePath` and checks that it names a readable regular file with
 * an accepted extension.
 */
export async function checkAttachment(filePath: string): Promise<AttachmentCheck> {
  const absolutePath = resolve(filePath);

  let info;
  try {
    info = await stat(absolutePath);
  } catch {
    return { success: false, filePath: absolutePath, error: `File not found: ${filePath}` };
  }

  if (!info.isFile()) {
    return { success: false, filePath: absolutePath, error: `Not a regular file: ${filePath}` };
  }

  try {
    await access(absolutePath, constants.R_OK);
  } catch {
    return { success: false, filePath: absolutePath, error: `File is not readable: ${filePath}` };
  }

  if (!isSupportedExtension(absolutePath)) {
    const ext = extname(absolutePath).toLowerCase() || '(none)';
    return {
      success: false,
      filePath: absolutePath,
      error: `Unsupported file type: ${ext}. Supported: ${ACCEPTED_ATTACHMENT_EXTENSIONS.join(', ')}`,
    };
  }

  return { success: true, filePath: absolutePath };
}
