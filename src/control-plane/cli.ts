import { Command } from 'commander';
import { createInstallCommand } from './commands/install.js';
import { createStartCommand } from './commands/start.js';
import { createStatusCommand } from './commands/status.js';
import { createUninstallCommand } from './commands/uninstall.js';

const VERSION = '0.1.0';

/**
 * Create and configure the CLI program.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('bgtask')
    .description('Install the assistant as a hidden background task started at logon')
    .version(VERSION, '-v, --version', 'Output the current version');

  // Add commands
  program.addCommand(createInstallCommand());
  program.addCommand(createStartCommand());
  program.addCommand(createStatusCommand());
  program.addCommand(createUninstallCommand());

  // Error handling
  program.exitOverride();

  return program;
}

/**
 * Run the CLI program.
 */
export async function runCli(args: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(args);
  } catch (error) {
    // Commander throws an error on --help and --version
    // We don't want to treat these as errors
    if (
      error instanceof Error &&
      'code' in error &&
      (error.code === 'commander.helpDisplayed' ||
        error.code === 'commander.version')
    ) {
      return;
    }

    // Re-throw other errors
    throw error;
  }
}

export { createInstallCommand } from './commands/install.js';
export { createStartCommand } from './commands/start.js';
export { createStatusCommand } from './commands/status.js';
export { createUninstallCommand } from './commands/uninstall.js';
