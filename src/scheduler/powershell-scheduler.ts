/**
 * PowerShell Task Scheduler
 *
 * Registers, removes, starts and inspects tasks through the Windows
 * ScheduledTasks cmdlets.
 */

import type { Logger } from 'pino';
import { TaskState } from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { runPowerShell, type PowerShellResult } from '../utils/powershell.js';
import { SchedulerCommandError } from './errors.js';
import {
  ABSENT_MARKER,
  REMOVED_MARKER,
  renderQueryScript,
  renderRegisterScript,
  renderStartScript,
  renderUnregisterScript,
} from './scripts.js';
import type { RegisterOptions, ScheduledTaskDefinition, TaskScheduler } from './types.js';

export class PowerShellTaskScheduler implements TaskScheduler {
  private readonly logger: Logger;

  constructor(private readonly shell: string = 'powershell.exe') {
    this.logger = createLogger('scheduler:powershell');
  }

  async unregister(name: string): Promise<boolean> {
    const result = await this.run('unregister', renderUnregisterScript(name));
    const removed = result.stdout.trim() === REMOVED_MARKER;

    this.logger.debug({ name, removed }, 'Unregister completed');
    return removed;
  }

  async register(definition: ScheduledTaskDefinition, options: RegisterOptions): Promise<void> {
    await this.run('register', renderRegisterScript(definition, options.force));

    this.logger.info(
      { name: definition.name, execute: definition.action.execute, force: options.force },
      'Task registered'
    );
  }

  async start(name: string): Promise<void> {
    await this.run('start', renderStartScript(name));
    this.logger.info({ name }, 'Task started');
  }

  async query(name: string): Promise<TaskState> {
    const result = await this.run('query', renderQueryScript(name));
    return parseTaskState(result.stdout);
  }

  private async run(operation: string, script: string): Promise<PowerShellResult> {
    const result = await runPowerShell(this.shell, script);

    if (result.exitCode !== 0) {
      this.logger.warn(
        { operation, exitCode: result.exitCode, stderr: result.stderr },
        'Scheduler command failed'
      );
      throw new SchedulerCommandError(operation, result.exitCode, result.stderr);
    }

    return result;
  }
}

/**
 * Map the host's task state names onto installer task states.
 * Ready, Queued, Disabled and Unknown all mean a registration exists.
 */
export function parseTaskState(output: string): TaskState {
  const state = output.trim();

  if (state === '' || state === ABSENT_MARKER) {
    return TaskState.ABSENT;
  }
  if (state === 'Running') {
    return TaskState.RUNNING;
  }
  return TaskState.REGISTERED;
}
