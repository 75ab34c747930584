import { Command } from 'commander';
import { join } from 'path';
import { GmailAuthorizer } from '../../mail/auth';
import { describeError } from '../../core/errors';
import { getAppDir } from '../../store';
import { configRepository } from '../../store/config';
import { defaultTokenPath, FileCredentialStore } from '../../store/credentials';
import type { AppConfig } from '../../types';
import { createSpinner, logger } from '../../utils/logger';

export function createGmailAuthorizer(mail: AppConfig['mail']): GmailAuthorizer {
  const store = new FileCredentialStore(mail.tokenPath ?? defaultTokenPath());
  return new GmailAuthorizer(store, mail.credentialsPath ?? join(getAppDir(), 'credentials.json'));
}

export const loginCommand = new Command('login')
  .description('Authorize read-only Gmail access for verification codes')
  .option('--logout', 'Forget the stored Gmail token')
  .action(async (options: { logout?: boolean }) => {
    const config = configRepository.loadAppConfig();
    const authorizer = createGmailAuthorizer(config.mail);

    if (options.logout) {
      await authorizer.logout();
      configRepository.updateAppConfig({ mail: { enabled: false } });
      logger.success('Gmail token removed');
      return;
    }

    logger.info('Complete the Google consent screen in your browser.');
    const spinner = createSpinner('Waiting for Gmail authorization...').start();
    try {
      await authorizer.login();
      spinner.succeed('Gmail authorized');
    } catch (error) {
      spinner.fail('Gmail authorization failed');
      logger.error(describeError(error));
      process.exitCode = 1;
      return;
    }

    configRepository.updateAppConfig({ mail: { enabled: true } });
    logger.info('Verification codes will now be read from Gmail.');
  });
