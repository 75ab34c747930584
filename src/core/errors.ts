import type { ErrorKind, LogicalField, RunResult } from '../types';

export type ExternalService = 'browser' | 'mail' | 'ai';

export abstract class ApplyError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly recoverable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad input. Raised before any browser session opens. */
export class ValidationError extends ApplyError {
  readonly kind = 'validation' as const;
  readonly recoverable = false;

  constructor(readonly field: string, message: string) {
    super(message);
  }
}

export class FieldNotFoundError extends ApplyError {
  readonly kind = 'field-not-found' as const;
  readonly recoverable = false;

  constructor(readonly field: LogicalField, label: string) {
    super(`Required field not found: ${label}`);
  }
}

export class OTPTimeoutError extends ApplyError {
  readonly kind = 'otp-timeout' as const;
  readonly recoverable = true;

  constructor(readonly attempts: number, message?: string) {
    super(message ?? `No verification code arrived after ${attempts} mailbox check(s)`);
  }
}

export class SubmissionRejectedError extends ApplyError {
  readonly kind = 'submission-rejected' as const;
  readonly recoverable = false;
}

export class SubmissionAmbiguousError extends ApplyError {
  readonly kind = 'submission-ambiguous' as const;
  readonly recoverable = true;

  constructor(message: string, readonly artifact?: string) {
    super(message);
  }
}

/** Browser driver, mail API or AI provider failure. The collaborator's message is kept verbatim. */
export class ExternalServiceError extends ApplyError {
  readonly kind = 'external-service' as const;
  readonly recoverable = false;

  constructor(readonly service: ExternalService, context: string, cause?: unknown) {
    super(cause === undefined ? context : `${context}: ${describeError(cause)}`, { cause });
  }
}

/** Not thrown: the record kept for an optional field that could not be filled. */
export interface OptionalFieldSkipped {
  field: LogicalField;
  label: string;
  reason: string;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toRunResult(error: unknown, artifact?: string): RunResult {
  if (error instanceof ApplyError) {
    const ownArtifact = error instanceof SubmissionAmbiguousError ? error.artifact : undefined;
    const result: RunResult = {
      status: 'failure',
      message: error.message,
      errorKind: error.kind,
      recoverable: error.recoverable,
    };
    const chosen = ownArtifact ?? artifact;
    if (chosen) {
      result.artifact = chosen;
    }
    return result;
  }

  const result: RunResult = {
    status: 'failure',
    message: `Unexpected error: ${describeError(error)}`,
    errorKind: 'external-service',
    recoverable: false,
  };
  if (artifact) {
    result.artifact = artifact;
  }
  return result;
}
