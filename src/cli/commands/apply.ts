import { Command } from 'commander';
import { createAIProvider } from '../../ai/provider';
import type { BrowserSession } from '../../browser/page';
import { launchBrowserSession } from '../../browser/session';
import { runApplication } from '../../core/application';
import { describeError, toRunResult, ValidationError } from '../../core/errors';
import { PromptCodeSource } from '../../core/otp/prompt';
import { OTPResolver, type CodeSource } from '../../core/otp/resolver';
import { toRetryPolicy } from '../../core/retry';
import { GmailMailbox } from '../../mail/gmail';
import { configRepository } from '../../store/config';
import type { AppConfig, ApplyOptions, RunResult } from '../../types';
import { readApplicationInput } from '../../utils/input-reader';
import { createSpinner, logger } from '../../utils/logger';
import { createGmailAuthorizer } from './login';

let activeSession: BrowserSession | undefined;

/** Closes the browser of a run cut short by a signal. */
export async function closeActiveSession(): Promise<void> {
  const session = activeSession;
  activeSession = undefined;
  if (!session) return;
  try {
    await session.close();
  } catch (error) {
    logger.debug(`Could not close the browser: ${describeError(error)}`);
  }
}

export function withOverrides(config: AppConfig, options: ApplyOptions): AppConfig {
  let timeout = config.browser.timeout;
  if (options.timeout !== undefined) {
    timeout = Number(options.timeout);
    if (!Number.isInteger(timeout) || timeout <= 0) {
      throw new ValidationError('timeout', `Timeout must be a positive number of milliseconds: ${options.timeout}`);
    }
  }

  return {
    ...config,
    browser: { ...config.browser, headless: options.headless ?? config.browser.headless, timeout },
    mail: { ...config.mail, enabled: options.gmail ?? config.mail.enabled },
  };
}

async function createCodeSource(config: AppConfig): Promise<CodeSource | undefined> {
  if (config.mail.enabled) {
    const spinner = createSpinner('Authorizing Gmail...').start();
    try {
      const client = await createGmailAuthorizer(config.mail).authorize();
      spinner.succeed('Gmail authorized');
      return new OTPResolver(new GmailMailbox(client), {
        policy: toRetryPolicy(config.mail),
        recencyWindowMinutes: config.mail.recencyWindowMinutes,
        fromFilter: config.mail.fromFilter,
        logger,
      });
    } catch (error) {
      spinner.fail('Gmail authorization failed');
      throw error;
    }
  }

  if (process.stdin.isTTY) {
    return new PromptCodeSource();
  }
  logger.debug('No mailbox configured and stdin is not a terminal; verification codes cannot be fetched');
  return undefined;
}

async function apply(source: string | undefined, options: ApplyOptions): Promise<RunResult> {
  let config: AppConfig;
  let rawInput: unknown;
  try {
    config = withOverrides(configRepository.loadAppConfig(), options);
    rawInput = await readApplicationInput(source);
  } catch (error) {
    return toRunResult(error);
  }

  const result = await runApplication(
    rawInput,
    {
      config,
      loadCodeSource: () => createCodeSource(config),
      aiProvider: config.ai.enabled ? createAIProvider(config.ai) : undefined,
      logger,
      openSession: async () => {
        activeSession = await launchBrowserSession(config.browser);
        return activeSession;
      },
    },
    { dryRun: options.dryRun }
  );
  activeSession = undefined;
  return result;
}

export const applyCommand = new Command('apply')
  .description('Fill in and submit a Greenhouse job application')
  .argument('[input]', 'Application JSON file, or - to read it from stdin')
  .option('--headless', 'Run the browser without a window')
  .option('--no-headless', 'Show the browser window')
  .option('-t, --timeout <ms>', 'How long to wait for the form to appear')
  .option('--gmail', 'Read verification codes from Gmail')
  .option('-d, --dry-run', 'Fill in the form without submitting it')
  .action(async (source: string | undefined, options: ApplyOptions) => {
    const result = await apply(source, options);

    if (result.status === 'success') {
      logger.success(result.message);
    } else {
      logger.error(result.message);
    }
    console.log(JSON.stringify(result, null, 2));
    process.exitCode = result.status === 'success' ? 0 : 1;
  });
