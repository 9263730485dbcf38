import { Command } from 'commander';
import { BackgroundTaskInstaller } from '../../installer/installer.js';
import { createServices, type CommandServices } from '../services.js';
import { taskNameOptionsSchema, validate } from '../validators.js';
import {
  print,
  printError,
  formatError,
  formatInfo,
  formatSuccess,
  formatValidationErrors,
} from '../formatter.js';

/**
 * Create the uninstall command.
 */
export function createUninstallCommand(): Command {
  const command = new Command('uninstall')
    .description('Remove the background task')
    .option('--name <name>', 'Scheduled task name')
    .action(async (options: Record<string, unknown>) => {
      try {
        await executeUninstall(options, createServices());
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

/**
 * Execute the uninstall command.
 */
export async function executeUninstall(
  rawOptions: Record<string, unknown>,
  services: CommandServices
): Promise<void> {
  const optionsResult = validate(taskNameOptionsSchema, rawOptions);
  if (!optionsResult.success) {
    printError(formatValidationErrors(optionsResult.error));
    process.exitCode = 1;
    return;
  }

  const name = optionsResult.data.name ?? services.config.taskName;
  const installer = new BackgroundTaskInstaller(services.scheduler, services.host);

  if (await installer.uninstall(name)) {
    print(formatSuccess(`Task "${name}" removed`));
  } else {
    print(formatInfo(`Task "${name}" is not installed`));
  }
}
