/**
 * Background Task Installer
 *
 * Idempotently installs a logon-triggered task. Installing again under the
 * same name replaces the earlier registration; removal and registration are
 * separate host calls and no rollback spans them.
 */

import type { Logger } from 'pino';
import type { HostEnvironment } from '../host/types.js';
import { createTaskDefinition } from '../scheduler/definition.js';
import type { TaskScheduler } from '../scheduler/types.js';
import { err, ok, type Result, type TaskSpecification, type TaskState } from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import {
  ExecutableNotFoundError,
  RegistrationFailedError,
  StartFailedError,
  TargetScriptMissingError,
  type InstallError,
  type StartError,
} from './errors.js';

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class BackgroundTaskInstaller {
  private readonly logger: Logger;

  constructor(
    private readonly scheduler: TaskScheduler,
    private readonly host: Pick<HostEnvironment, 'fileExists'>
  ) {
    this.logger = createLogger('installer');
  }

  async install(spec: TaskSpecification): Promise<Result<void, InstallError>> {
    // Preconditions are checked before anything on the host changes
    if (!this.host.fileExists(spec.executablePath)) {
      return err(new ExecutableNotFoundError([spec.executablePath]));
    }
    if (!this.host.fileExists(spec.scriptPath)) {
      return err(new TargetScriptMissingError(spec.scriptPath));
    }

    try {
      const removed = await this.scheduler.unregister(spec.name);
      this.logger.debug({ name: spec.name, removed }, 'Prior registration removal');
    } catch (error) {
      // Force registration below overwrites whatever remains
      this.logger.warn(
        { name: spec.name, error: errorMessage(error) },
        'Could not remove prior registration'
      );
    }

    const definition = createTaskDefinition(spec);

    try {
      await this.scheduler.register(definition, { force: true });
    } catch (error) {
      this.logger.error({ name: spec.name, error: errorMessage(error) }, 'Registration failed');
      return err(new RegistrationFailedError(spec.name, errorMessage(error)));
    }

    this.logger.info(
      {
        name: spec.name,
        executable: spec.executablePath,
        visibility: spec.visibility,
        runLevel: spec.runLevel,
      },
      'Task installed'
    );
    return ok(undefined);
  }

  /**
   * Run the task now. A failure leaves the registration untouched.
   */
  async startNow(name: string): Promise<Result<void, StartError>> {
    try {
      await this.scheduler.start(name);
      return ok(undefined);
    } catch (error) {
      this.logger.warn({ name, error: errorMessage(error) }, 'Immediate start failed');
      return err(new StartFailedError(name, errorMessage(error)));
    }
  }

  /**
   * @returns false when no task was registered under the name
   */
  async uninstall(name: string): Promise<boolean> {
    const removed = await this.scheduler.unregister(name);
    this.logger.info({ name, removed }, 'Task uninstall completed');
    return removed;
  }

  status(name: string): Promise<TaskState> {
    return this.scheduler.query(name);
  }
}
