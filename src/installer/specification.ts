import {
  RunLevel,
  TaskTrigger,
  taskSpecificationSchema,
  type ExecutionTarget,
  type PowerPolicy,
  type RestartPolicy,
  type TaskSpecification,
} from '../types/index.js';

export const DEFAULT_TASK_NAME = 'Jarvis AI Assistant';
export const DEFAULT_WAKE_FLAG = '--wake';

export const DEFAULT_RESTART_POLICY: RestartPolicy = {
  maxRestarts: 3,
  restartIntervalMinutes: 1,
};

export const DEFAULT_POWER_POLICY: PowerPolicy = {
  runOnBattery: true,
  continueOnBatteryTransition: true,
};

export interface SpecificationOptions {
  name?: string;
  description?: string;
  wakeFlag?: string;
  restartPolicy?: RestartPolicy;
  runLevel?: RunLevel;
  powerPolicy?: PowerPolicy;
}

/**
 * Combine a resolved execution target and script into a task specification.
 * Pure: touches neither the filesystem nor the scheduler.
 *
 * @throws ZodError when an override falls outside the allowed bounds
 */
export function buildSpecification(
  target: ExecutionTarget,
  scriptPath: string,
  workingDirectory: string,
  options: SpecificationOptions = {}
): TaskSpecification {
  const name = options.name ?? DEFAULT_TASK_NAME;

  return taskSpecificationSchema.parse({
    name,
    description: options.description ?? `${name} (wake-word mode)`,
    executablePath: target.path,
    scriptPath,
    arguments: [scriptPath, options.wakeFlag ?? DEFAULT_WAKE_FLAG],
    workingDirectory,
    trigger: TaskTrigger.AT_USER_LOGON,
    visibility: target.visibility,
    restartPolicy: options.restartPolicy ?? DEFAULT_RESTART_POLICY,
    runLevel: options.runLevel ?? RunLevel.ELEVATED,
    powerPolicy: options.powerPolicy ?? DEFAULT_POWER_POLICY,
  });
}
