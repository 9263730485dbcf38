import { Command } from 'commander';
import { BackgroundTaskInstaller } from '../../installer/installer.js';
import { createServices, type CommandServices } from '../services.js';
import { taskNameOptionsSchema, validate } from '../validators.js';
import {
  print,
  printError,
  formatError,
  formatSuccess,
  formatValidationErrors,
} from '../formatter.js';

/**
 * Create the start command.
 */
export function createStartCommand(): Command {
  const command = new Command('start')
    .description('Run the installed task now')
    .option('--name <name>', 'Scheduled task name')
    .action(async (options: Record<string, unknown>) => {
      try {
        await executeStart(options, createServices());
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

/**
 * Execute the start command.
 */
export async function executeStart(
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

  const result = await installer.startNow(name);
  if (!result.success) {
    printError(formatError(result.error.message));
    process.exitCode = 1;
    return;
  }

  await services.sleep(services.config.startSettleMs);
  print(formatSuccess(`Task "${name}" started`));
}
