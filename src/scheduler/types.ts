/**
 * Scheduler Types
 *
 * Host-level objects a scheduled task is registered from, and the port
 * through which the installer reaches the host's task scheduler.
 */

import type { TaskState } from '../types/index.js';

/**
 * What the task runs.
 */
export interface TaskAction {
  /** Executable path */
  execute: string;
  /** Windows command-line argument string */
  argument: string;
  workingDirectory: string;
}

/**
 * When the task runs. Only logon of the registering user is supported.
 */
export interface TaskTriggerDefinition {
  kind: 'logon';
}

/**
 * Scheduler settings governing visibility, power and restarts.
 */
export interface TaskSettings {
  hidden: boolean;
  allowStartIfOnBatteries: boolean;
  dontStopIfGoingOnBatteries: boolean;
  startWhenAvailable: boolean;
  restartCount: number;
  restartIntervalMinutes: number;
  /** Zero means no limit */
  executionTimeLimitSeconds: number;
}

/**
 * Host run level names as the scheduler spells them.
 */
export type PrincipalRunLevel = 'Highest' | 'Limited';

/**
 * Identity and privilege the task runs under.
 */
export interface TaskPrincipal {
  logonType: 'Interactive';
  runLevel: PrincipalRunLevel;
}

/**
 * Everything needed to register one task.
 */
export interface ScheduledTaskDefinition {
  name: string;
  description: string;
  action: TaskAction;
  trigger: TaskTriggerDefinition;
  settings: TaskSettings;
  principal: TaskPrincipal;
}

export interface RegisterOptions {
  /** Overwrite a task that already exists under the same name */
  force: boolean;
}

/**
 * Port onto the host's task-scheduling facility.
 */
export interface TaskScheduler {
  /**
   * Remove the named task.
   * @returns false when no task was registered under the name
   */
  unregister(name: string): Promise<boolean>;
  register(definition: ScheduledTaskDefinition, options: RegisterOptions): Promise<void>;
  /** Run the named task now, independent of its trigger */
  start(name: string): Promise<void>;
  query(name: string): Promise<TaskState>;
}
