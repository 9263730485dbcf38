import { Command } from 'commander';
import { BackgroundTaskInstaller } from '../../installer/installer.js';
import { createServices, type CommandServices } from '../services.js';
import { taskNameOptionsSchema, validate } from '../validators.js';
import {
  print,
  printError,
  bold,
  cyan,
  formatError,
  formatTaskState,
  formatValidationErrors,
} from '../formatter.js';

/**
 * Create the status command.
 */
export function createStatusCommand(): Command {
  const command = new Command('status')
    .description('Show whether the task is installed and running')
    .option('--name <name>', 'Scheduled task name')
    .action(async (options: Record<string, unknown>) => {
      try {
        await executeStatus(options, createServices());
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

/**
 * Execute the status command.
 */
export async function executeStatus(
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
  const state = await installer.status(name);

  print(`${bold('Task:')} ${cyan(name)}`);
  print(`${bold('State:')} ${formatTaskState(state)}`);
}
