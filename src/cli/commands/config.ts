import { Command } from 'commander';
import { confirm } from '@inquirer/prompts';
import { describeError } from '../../core/errors';
import { configRepository } from '../../store/config';
import { chalk, logger } from '../../utils/logger';

function formatValue(value: unknown): string {
  return typeof value === 'object' && value !== null ? JSON.stringify(value, null, 2) : String(value);
}

export const configCommand = new Command('config').description('Manage configuration');

configCommand
  .command('set <key> <value>')
  .description('Set a configuration value (e.g., browser.headless true)')
  .action((key: string, value: string) => {
    try {
      configRepository.setConfigValue(key, value);
      logger.success(`Set ${key} = ${value}`);
    } catch (error) {
      logger.error(`Failed to set config: ${describeError(error)}`);
      process.exitCode = 1;
    }
  });

configCommand
  .command('get <key>')
  .description('Get a configuration value')
  .action((key: string) => {
    const value = configRepository.getConfigValue(key);
    if (value === undefined) {
      logger.error(`Config key "${key}" not found`);
      process.exitCode = 1;
    } else {
      console.log(formatValue(value));
    }
  });

configCommand
  .command('list')
  .description('List all configuration')
  .action(() => {
    const config = configRepository.loadAppConfig();

    logger.header('Configuration');
    logger.keyValue('File', configRepository.path);

    for (const [section, values] of Object.entries(config)) {
      logger.newline();
      console.error(chalk.bold(`${section}:`));
      for (const [key, value] of Object.entries(values)) {
        logger.keyValue(`  ${key}`, formatValue(value));
      }
    }
  });

configCommand
  .command('reset')
  .description('Reset configuration to defaults')
  .option('-y, --yes', 'Skip the confirmation')
  .action(async (options: { yes?: boolean }) => {
    const confirmed =
      options.yes ||
      (await confirm({
        message: 'Reset all configuration to defaults?',
        default: false,
      }));

    if (confirmed) {
      configRepository.resetAppConfig();
      logger.success('Configuration reset to defaults');
    }
  });
