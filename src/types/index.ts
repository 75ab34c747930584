import { z } from 'zod';

// ============ Platform ============
export const GREENHOUSE_HOSTS = /(^|\.)greenhouse\.io$/;

export const GREENHOUSE_EMBED_URL = 'https://boards.greenhouse.io/embed/job_app';

export const ACCEPTED_ATTACHMENT_EXTENSIONS = ['.pdf', '.doc', '.docx', '.txt', '.rtf'] as const;

// ============ Application Input ============
export const ApplicationInputSchema = z.object({
  firstName: z.string(),
  lastName: z.string(),
  email: z.string(),
  resumePath: z.string(),
  jobUrl: z.string(),
  preferredFirstName: z.string().optional(),
  phone: z.string().optional(),
  country: z.string().optional(),
  coverLetterPath: z.string().optional(),
  linkedinProfile: z.string().optional(),
  website: z.string().optional(),
  answers: z.record(z.string()).optional(),
});

export type ApplicationInput = z.infer<typeof ApplicationInputSchema>;

export const REQUIRED_INPUT_FIELDS = ['firstName', 'lastName', 'email', 'resumePath', 'jobUrl'] as const;

// ============ Field Mapping ============
export const LOGICAL_FIELDS = [
  'firstName',
  'lastName',
  'email',
  'resume',
  'preferredFirstName',
  'phone',
  'country',
  'coverLetter',
  'linkedinProfile',
  'website',
] as const;

export type LogicalField = (typeof LOGICAL_FIELDS)[number];

export const MatcherSchema = z.object({
  by: z.enum(['css', 'id', 'name', 'placeholder', 'aria-label', 'xpath']),
  value: z.string().min(1),
  tag: z.string().optional(),
});

export const FieldMappingSchema = z.object({
  field: z.enum(LOGICAL_FIELDS),
  label: z.string(),
  kind: z.enum(['text', 'file', 'select', 'combobox']),
  required: z.boolean().default(false),
  candidates: z.array(MatcherSchema).min(1),
});

export const FieldMappingListSchema = z.array(FieldMappingSchema).min(1);

export type Matcher = z.infer<typeof MatcherSchema>;
export type FieldMapping = z.infer<typeof FieldMappingSchema>;

// ============ Run Result ============
export type ErrorKind =
  | 'validation'
  | 'field-not-found'
  | 'otp-timeout'
  | 'submission-rejected'
  | 'submission-ambiguous'
  | 'external-service';

export interface RunResult {
  status: 'success' | 'failure';
  message: string;
  artifact?: string;
  errorKind?: ErrorKind;
  recoverable?: boolean;
}

// ============ AI Provider Types ============
export type AIProviderType = 'openai' | 'anthropic' | 'ollama';

export interface AIProvider {
  name: AIProviderType;
  generateText(prompt: string, systemPrompt?: string): Promise<string>;
}

// ============ Configuration ============
export const RetrySettingsSchema = z.object({
  pollIntervalMs: z.number().int().nonnegative(),
  maxAttempts: z.number().int().positive(),
});

export const AppConfigSchema = z.object({
  browser: z.object({
    headless: z.boolean(),
    timeout: z.number().int().positive(),
    slowMo: z.number().int().nonnegative(),
    storageState: z.string().optional(),
  }),
  form: z.object({
    fieldMappingPath: z.string().optional(),
    lookupAttempts: z.number().int().positive(),
    lookupIntervalMs: z.number().int().nonnegative(),
  }),
  submission: RetrySettingsSchema.extend({
    saveScreenshots: z.boolean(),
  }),
  captcha: RetrySettingsSchema,
  mail: RetrySettingsSchema.extend({
    enabled: z.boolean(),
    credentialsPath: z.string().optional(),
    tokenPath: z.string().optional(),
    recencyWindowMinutes: z.number().positive(),
    fromFilter: z.string().optional(),
  }),
  ai: z.object({
    enabled: z.boolean(),
    provider: z.enum(['openai', 'anthropic', 'ollama']),
    model: z.string(),
    baseUrl: z.string().optional(),
    temperature: z.number().min(0).max(2).optional(),
  }),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type AIConfig = AppConfig['ai'];

export const DEFAULT_CONFIG: AppConfig = {
  browser: {
    headless: false,
    timeout: 20000,
    slowMo: 0,
  },
  form: {
    lookupAttempts: 3,
    lookupIntervalMs: 500,
  },
  submission: {
    pollIntervalMs: 1000,
    maxAttempts: 30,
    saveScreenshots: true,
  },
  captcha: {
    pollIntervalMs: 5000,
    maxAttempts: 60,
  },
  mail: {
    enabled: false,
    pollIntervalMs: 10000,
    maxAttempts: 30,
    recencyWindowMinutes: 10,
  },
  ai: {
    enabled: false,
    provider: 'openai',
    model: 'gpt-4o',
    temperature: 0.7,
  },
};

// ============ CLI Types ============
export interface ApplyOptions {
  headless?: boolean;
  timeout?: string;
  gmail?: boolean;
  dryRun?: boolean;
}
