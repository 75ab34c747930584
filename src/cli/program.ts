import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { Command } from 'commander';
import { z } from 'zod';
import { applyCommand } from './commands/apply';
import { configCommand } from './commands/config';
import { loginCommand } from './commands/login';
import { setVerbose } from '../utils/logger';

const PACKAGE_JSON_PATH = fileURLToPath(new URL('../../package.json', import.meta.url));

export function packageVersion(): string {
  const pkg = z.object({ version: z.string() }).parse(JSON.parse(readFileSync(PACKAGE_JSON_PATH, 'utf-8')));
  return pkg.version;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('greenhouse-apply')
    .description('Fill in and submit Greenhouse job applications from a JSON record')
    .version(packageVersion())
    .option('-v, --verbose', 'Enable verbose output for debugging');

  program.hook('preAction', (thisCommand) => {
    const opts = thisCommand.optsWithGlobals();
    if (opts.verbose) {
      setVerbose(true);
    }
  });

  // Register commands
  program.addCommand(applyCommand);
  program.addCommand(loginCommand);
  program.addCommand(configCommand);

  return program;
}
