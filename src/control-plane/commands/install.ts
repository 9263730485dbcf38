import { Command } from 'commander';
import { BackgroundTaskInstaller } from '../../installer/installer.js';
import { resolveExecutionTarget } from '../../installer/resolver.js';
import { buildSpecification } from '../../installer/specification.js';
import { RegistrationFailedError, TargetScriptMissingError } from '../../installer/errors.js';
import { TaskVisibility } from '../../types/index.js';
import { createServices, type CommandServices } from '../services.js';
import { installCommandOptionsSchema, validate } from '../validators.js';
import { parentDirectory, resolveTargetPath } from '../paths.js';
import {
  print,
  printError,
  formatError,
  formatInfo,
  formatSuccess,
  formatWarning,
  formatTaskSpecification,
  formatValidationErrors,
} from '../formatter.js';

/**
 * Create the install command.
 */
export function createInstallCommand(): Command {
  const command = new Command('install')
    .description('Install the assistant as a hidden background task started at logon')
    .option('--name <name>', 'Scheduled task name')
    .option('--script <path>', 'Script the interpreter runs')
    .option('--working-dir <dir>', 'Working directory (default: the script directory)')
    .option('--start', 'Start the task right after installing')
    .option('--no-start', 'Do not start the task or ask about it')
    .action(async (options: Record<string, unknown>) => {
      try {
        await executeInstall(options, createServices());
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

/**
 * Execute the install command.
 */
export async function executeInstall(
  rawOptions: Record<string, unknown>,
  services: CommandServices
): Promise<void> {
  const optionsResult = validate(installCommandOptionsSchema, rawOptions);
  if (!optionsResult.success) {
    printError(formatValidationErrors(optionsResult.error));
    process.exitCode = 1;
    return;
  }

  const options = optionsResult.data;
  const { config, host, scheduler } = services;

  // Advisory only: the registration call is what decides
  if (!(await host.isElevated())) {
    print(formatWarning('Not running as Administrator. Registration may be rejected.'));
  }

  const target = await resolveExecutionTarget(host, {
    primary: config.runtime,
    windowless: config.windowlessRuntime,
  });
  if (!target.success) {
    printError(formatError(target.error.message));
    process.exitCode = 1;
    return;
  }

  const scriptPath = resolveTargetPath(options.script ?? config.scriptPath);
  if (!host.fileExists(scriptPath)) {
    printError(formatError(new TargetScriptMissingError(scriptPath).message));
    process.exitCode = 1;
    return;
  }

  const workingDirectory = resolveTargetPath(
    options.workingDir ?? config.workingDirectory ?? parentDirectory(scriptPath)
  );

  const spec = buildSpecification(target.data, scriptPath, workingDirectory, {
    name: options.name ?? config.taskName,
    description: config.taskDescription,
    wakeFlag: config.wakeFlag,
    restartPolicy: {
      maxRestarts: config.maxRestarts,
      restartIntervalMinutes: config.restartIntervalMinutes,
    },
    runLevel: config.runLevel,
  });

  if (spec.visibility === TaskVisibility.VISIBLE) {
    print(
      formatWarning(`${config.windowlessRuntime} not found; the task will open a console window.`)
    );
  }

  const installer = new BackgroundTaskInstaller(scheduler, host);
  const result = await installer.install(spec);

  if (!result.success) {
    printError(formatError(result.error.message));
    if (result.error instanceof RegistrationFailedError) {
      printError(formatInfo(result.error.hint));
    }
    process.exitCode = 1;
    return;
  }

  print(formatSuccess(`Task "${spec.name}" installed`));
  print('');
  print(formatTaskSpecification(spec));
  print('');

  const shouldStart = options.start ?? (await services.confirm('Start the task now?'));
  if (!shouldStart) {
    print(formatInfo('The task will start at next logon.'));
    return;
  }

  const started = await installer.startNow(spec.name);
  if (!started.success) {
    print(formatWarning(started.error.message));
    print(formatInfo('The task stays installed and will start at next logon.'));
    return;
  }

  // Give the process a moment to come up before confirming
  await services.sleep(config.startSettleMs);
  print(formatSuccess(`Task "${spec.name}" started`));
}
