#!/usr/bin/env tsx
import { closeActiveSession } from './commands/apply';
import { createProgram } from './program';

const program = createProgram();

// Close the browser before exiting on a signal
const shutdown = (code: number) => () => {
  void closeActiveSession().finally(() => process.exit(code));
};

process.on('SIGINT', shutdown(130));
process.on('SIGTERM', shutdown(143));

// Show help if no command provided
if (!process.argv.slice(2).length) {
  program.outputHelp();
} else {
  program.parseAsync(process.argv).catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
}
