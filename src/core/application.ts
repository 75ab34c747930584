import { join } from 'path';
import type { BrowserSession } from '../browser/page';
import type { AIProvider, AppConfig, ApplicationInput, FieldMapping, RunResult } from '../types';
import { getScreenshotsDir } from '../store';
import { silentLogger, type Logger } from '../utils/logger';
import {
  describeError,
  ExternalServiceError,
  OTPTimeoutError,
  SubmissionAmbiguousError,
  SubmissionRejectedError,
  toRunResult,
} from './errors';
import { loadFieldMappings } from './field-mapping';
import { FieldFiller } from './form-filler';
import { FormNavigator } from './navigator';
import type { CodeSource } from './otp/resolver';
import { QuestionFiller } from './question-filler';
import { sleep, toRetryPolicy, type Sleep } from './retry';
import { SubmissionController, type SubmissionOutcome } from './submission';
import { validateApplicationInput } from './validator';

export const DRY_RUN_MESSAGE = 'Dry run: form filled, not submitted';

export interface RunDependencies {
  config: AppConfig;
  openSession: () => Promise<BrowserSession>;
  /** Overrides the mapping file named in the config. */
  mappings?: FieldMapping[];
  /** Where verification codes come from; without one an OTP challenge fails the run. */
  codeSource?: CodeSource;
  /** Builds the code source once the input is valid, before the browser opens. */
  loadCodeSource?: () => Promise<CodeSource | undefined>;
  aiProvider?: AIProvider;
  logger?: Logger;
  sleep?: Sleep;
  artifactPath?: (label: string) => string;
  now?: () => Date;
}

export interface RunOptions {
  dryRun?: boolean;
}

function defaultArtifactPath(label: string): string {
  return join(getScreenshotsDir(), `${label}-${new Date().toISOString().replace(/[:.]/g, '-')}.png`);
}

/**
 * One application attempt, start to finish. Never throws: every failure
 * becomes a `RunResult`. The browser session is always closed.
 */
export async function runApplication(
  rawInput: unknown,
  deps: RunDependencies,
  options: RunOptions = {}
): Promise<RunResult> {
  const logger = deps.logger ?? silentLogger;
  const wait = deps.sleep ?? sleep;
  const now = deps.now ?? (() => new Date());
  const { config } = deps;

  let input: ApplicationInput;
  let mappings: FieldMapping[];
  let codeSource: CodeSource | undefined;
  try {
    input = await validateApplicationInput(rawInput);
    mappings = deps.mappings ?? (await loadFieldMappings(config.form.fieldMappingPath));
    codeSource = deps.codeSource ?? (await deps.loadCodeSource?.());
  } catch (error) {
    return toRunResult(error);
  }

  let session: BrowserSession;
  try {
    session = await deps.openSession();
  } catch (error) {
    return toRunResult(new ExternalServiceError('browser', 'Could not launch the browser', error));
  }

  const page = session.page;
  const capture = async (label: string): Promise<string | undefined> => {
    if (!config.submission.saveScreenshots) return undefined;
    const path = (deps.artifactPath ?? defaultArtifactPath)(label);
    try {
      await page.screenshot(path);
      logger.debug(`Screenshot saved to ${path}`);
      return path;
    } catch (error) {
      logger.warning(`Could not save screenshot: ${describeError(error)}`);
      return undefined;
    }
  };

  try {
    const navigator = new FormNavigator(page, {
      elementTimeoutMs: config.browser.timeout,
      lookup: { intervalMs: config.form.lookupIntervalMs, maxAttempts: config.form.lookupAttempts },
      sleep: wait,
      logger,
    });

    logger.info(`Opening ${input.jobUrl}`);
    await navigator.open(input.jobUrl);

    const filler = new FieldFiller(page, navigator, mappings, { logger, sleep: wait });
    const report = await filler.fillAll(input);
    logger.info(`Filled ${report.filled.length} field(s), skipped ${report.skipped.length} optional field(s)`);

    await new QuestionFiller(page, { provider: deps.aiProvider, logger, sleep: wait }).fillAll(input);

    if (options.dryRun) {
      const artifact = await capture('dry-run');
      const result: RunResult = { status: 'success', message: DRY_RUN_MESSAGE };
      if (artifact) result.artifact = artifact;
      return result;
    }

    const controller = new SubmissionController(page, {
      policy: toRetryPolicy(config.submission),
      captchaPolicy: toRetryPolicy(config.captcha),
      interactive: !session.headless,
      sleep: wait,
      logger,
    });

    await controller.passCaptcha();
    logger.info('Submitting application');
    let outcome = await controller.submit();

    if (outcome.state === 'otp-required') {
      outcome = await resolveChallenge(controller, codeSource, now(), logger);
    }

    return await finish(outcome, capture);
  } catch (error) {
    const artifact = error instanceof SubmissionAmbiguousError ? undefined : await capture('failure');
    return toRunResult(error, artifact);
  } finally {
    await closeSession(session, logger);
  }
}

async function resolveChallenge(
  controller: SubmissionController,
  source: CodeSource | undefined,
  challengeStartedAt: Date,
  logger: Logger
): Promise<SubmissionOutcome> {
  if (!source) {
    throw new OTPTimeoutError(0, 'A verification code is required but no mailbox is configured');
  }
  logger.info('Greenhouse sent a verification code; waiting for it');
  return controller.completeOTPChallenge(source, challengeStartedAt);
}

async function finish(
  outcome: SubmissionOutcome,
  capture: (label: string) => Promise<string | undefined>
): Promise<RunResult> {
  switch (outcome.state) {
    case 'confirmed':
      return { status: 'success', message: outcome.message };
    case 'rejected':
      throw new SubmissionRejectedError(outcome.message);
    case 'otp-required':
      throw new SubmissionAmbiguousError('Verification is still pending', await capture('otp-pending'));
    case 'ambiguous':
      throw new SubmissionAmbiguousError(outcome.message, await capture('ambiguous'));
  }
}

async function closeSession(session: BrowserSession, logger: Logger): Promise<void> {
  try {
    await session.close();
  } catch (error) {
    logger.warning(`Could not close the browser: ${describeError(error)}`);
  }
}
