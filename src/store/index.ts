import { homedir } from 'os';
import { join } from 'path';
import { mkdirSync, existsSync } from 'fs';

const DEFAULT_APP_DIR = join(homedir(), '.greenhouse-apply');

export function getAppDir(): string {
  return process.env.GREENHOUSE_APPLY_HOME || DEFAULT_APP_DIR;
}

export function ensureAppDir(dir: string = getAppDir()): string {
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  return dir;
}

export function getScreenshotsDir(): string {
  return ensureAppDir(join(getAppDir(), 'screenshots'));
}
