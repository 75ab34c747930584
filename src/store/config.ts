import { join, dirname } from 'path';
import { readFileSync, writeFileSync, existsSync } from 'fs';
import { AppConfigSchema, DEFAULT_CONFIG, type AppConfig } from '../types';
import { ValidationError } from '../core/errors';
import { ensureAppDir, getAppDir } from './index';

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(base: JsonRecord, overrides: JsonRecord): JsonRecord {
  const merged: JsonRecord = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    const current = merged[key];
    merged[key] = isRecord(current) && isRecord(value) ? deepMerge(current, value) : value;
  }
  return merged;
}

function readPath(root: unknown, parts: string[]): unknown {
  let current = root;
  for (const part of parts) {
    if (!isRecord(current)) return undefined;
    current = current[part];
  }
  return current;
}

function parseValue(value: string): unknown {
  try {
    return JSON.parse(value);
  } catch {
    return value;
  }
}

/** JSON config file merged over the defaults. */
export class ConfigRepository {
  constructor(private file: string = join(getAppDir(), 'config.json')) {}

  get path(): string {
    return this.file;
  }

  loadAppConfig(): AppConfig {
    return this.validate(deepMerge(DEFAULT_CONFIG, this.loadOverrides()));
  }

  saveAppConfig(config: AppConfig): void {
    ensureAppDir(dirname(this.file));
    writeFileSync(this.file, JSON.stringify(config, null, 2));
  }

  updateAppConfig(updates: JsonRecord): AppConfig {
    const updated = this.validate(deepMerge(this.loadAppConfig(), updates));
    this.saveAppConfig(updated);
    return updated;
  }

  /** Sets a dotted key. Values are parsed as JSON when they parse, else kept as strings. */
  setConfigValue(path: string, value: string): AppConfig {
    const parts = path.split('.').filter(Boolean);
    if (parts.length === 0) {
      throw new ValidationError('config', 'Config key is empty');
    }

    const update: JsonRecord = {};
    let cursor = update;
    parts.forEach((part, index) => {
      if (index === parts.length - 1) {
        cursor[part] = parseValue(value);
      } else {
        const next: JsonRecord = {};
        cursor[part] = next;
        cursor = next;
      }
    });

    const updated = this.validate(deepMerge(this.loadAppConfig(), update));
    if (readPath(updated, parts) === undefined) {
      throw new ValidationError('config', `Unknown config key: ${path}`);
    }
    this.saveAppConfig(updated);
    return updated;
  }

  getConfigValue(path: string): unknown {
    return readPath(this.loadAppConfig(), path.split('.'));
  }

  resetAppConfig(): AppConfig {
    this.saveAppConfig(DEFAULT_CONFIG);
    return DEFAULT_CONFIG;
  }

  private loadOverrides(): JsonRecord {
    if (!existsSync(this.file)) return {};

    let data: unknown;
    try {
      data = JSON.parse(readFileSync(this.file, 'utf-8'));
    } catch {
      throw new ValidationError('config', `Config file is not valid JSON: ${this.file}`);
    }
    if (!isRecord(data)) {
      throw new ValidationError('config', `Config file must hold a JSON object: ${this.file}`);
    }
    return data;
  }

  private validate(data: JsonRecord): AppConfig {
    const result = AppConfigSchema.safeParse(data);
    if (!result.success) {
      const issue = result.error.issues[0];
      const key = issue?.path.join('.') || 'config';
      throw new ValidationError('config', `Invalid config value for ${key}: ${issue?.message ?? 'unknown error'}`);
    }
    return result.data;
  }
}

export const configRepository = new ConfigRepository();
