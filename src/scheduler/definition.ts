/**
 * Builds the host-level action, trigger, settings and principal objects
 * implied by a task specification.
 */

import { RunLevel, TaskVisibility, type TaskSpecification } from '../types/index.js';
import type {
  ScheduledTaskDefinition,
  TaskAction,
  TaskPrincipal,
  TaskSettings,
  TaskTriggerDefinition,
} from './types.js';

/**
 * Quote one argument so CommandLineToArgvW splits it back unchanged.
 */
export function quoteWindowsArgument(arg: string): string {
  if (arg !== '' && !/[\s"]/.test(arg)) {
    return arg;
  }

  let quoted = '"';
  let backslashes = 0;

  for (const char of arg) {
    if (char === '\\') {
      backslashes++;
      continue;
    }
    if (char === '"') {
      // Backslashes before a quote are doubled, then the quote is escaped
      quoted += '\\'.repeat(backslashes * 2 + 1) + '"';
    } else {
      quoted += '\\'.repeat(backslashes) + char;
    }
    backslashes = 0;
  }

  // Trailing backslashes would otherwise escape the closing quote
  return quoted + '\\'.repeat(backslashes * 2) + '"';
}

export function formatCommandLine(args: readonly string[]): string {
  return args.map(quoteWindowsArgument).join(' ');
}

export function createAction(spec: TaskSpecification): TaskAction {
  return {
    execute: spec.executablePath,
    argument: formatCommandLine(spec.arguments),
    workingDirectory: spec.workingDirectory,
  };
}

export function createTrigger(_spec: TaskSpecification): TaskTriggerDefinition {
  return { kind: 'logon' };
}

export function createSettings(spec: TaskSpecification): TaskSettings {
  return {
    hidden: spec.visibility === TaskVisibility.HIDDEN,
    allowStartIfOnBatteries: spec.powerPolicy.runOnBattery,
    dontStopIfGoingOnBatteries: spec.powerPolicy.continueOnBatteryTransition,
    startWhenAvailable: true,
    restartCount: spec.restartPolicy.maxRestarts,
    restartIntervalMinutes: spec.restartPolicy.restartIntervalMinutes,
    executionTimeLimitSeconds: 0,
  };
}

export function createPrincipal(spec: TaskSpecification): TaskPrincipal {
  return {
    logonType: 'Interactive',
    runLevel: spec.runLevel === RunLevel.ELEVATED ? 'Highest' : 'Limited',
  };
}

export function createTaskDefinition(spec: TaskSpecification): ScheduledTaskDefinition {
  return {
    name: spec.name,
    description: spec.description,
    action: createAction(spec),
    trigger: createTrigger(spec),
    settings: createSettings(spec),
    principal: createPrincipal(spec),
  };
}
