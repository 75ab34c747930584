import chalk from 'chalk';
import ora, { type Ora } from 'ora';

let _verbose = false;

export function setVerbose(enabled: boolean) {
  _verbose = enabled;
}

export function isVerbose(): boolean {
  return _verbose || !!process.env.DEBUG;
}

// stdout carries the run result, so diagnostics go to stderr
export const logger = {
  info: (message: string) => console.error(chalk.blue('ℹ'), message),
  success: (message: string) => console.error(chalk.green('✔'), message),
  warning: (message: string) => console.error(chalk.yellow('⚠'), message),
  error: (message: string) => console.error(chalk.red('✖'), message),
  debug: (message: string) => {
    if (isVerbose()) {
      console.error(chalk.gray('⚙'), message);
    }
  },

  keyValue: (key: string, value: string) => {
    console.error(`  ${chalk.gray(key + ':')} ${value}`);
  },

  newline: () => console.error(),

  header: (text: string) => {
    console.error();
    console.error(chalk.bold.underline(text));
    console.error();
  },
};

/** The subset of the logger the core modules depend on. */
export type Logger = Pick<typeof logger, 'info' | 'success' | 'warning' | 'error' | 'debug'>;

export const silentLogger: Logger = {
  info: () => {},
  success: () => {},
  warning: () => {},
  error: () => {},
  debug: () => {},
};

export function createSpinner(text: string): Ora {
  return ora({ text, color: 'cyan', stream: process.stderr });
}

export { chalk };
