import { z } from 'zod';

// Task Trigger
export const TaskTrigger = {
  AT_USER_LOGON: 'AtUserLogon',
} as const;

export type TaskTrigger = (typeof TaskTrigger)[keyof typeof TaskTrigger];

// Window visibility of the launched process
export const TaskVisibility = {
  HIDDEN: 'hidden',
  VISIBLE: 'visible',
} as const;

export type TaskVisibility = (typeof TaskVisibility)[keyof typeof TaskVisibility];

// Privilege level requested for the launched process
export const RunLevel = {
  STANDARD: 'standard',
  ELEVATED: 'elevated',
} as const;

export type RunLevel = (typeof RunLevel)[keyof typeof RunLevel];

// Task state as observed through the host scheduler
export const TaskState = {
  ABSENT: 'absent',
  REGISTERED: 'registered',
  RUNNING: 'running',
} as const;

export type TaskState = (typeof TaskState)[keyof typeof TaskState];

/**
 * Upper bound on automatic relaunches after a crash.
 */
export const MAX_RESTARTS_LIMIT = 10;

export const restartPolicySchema = z.object({
  maxRestarts: z.number().int().min(0).max(MAX_RESTARTS_LIMIT),
  /** Task Scheduler accepts intervals from 1 minute to 31 days */
  restartIntervalMinutes: z.number().int().min(1).max(44640),
});

export type RestartPolicy = z.infer<typeof restartPolicySchema>;

export const powerPolicySchema = z.object({
  runOnBattery: z.boolean(),
  continueOnBatteryTransition: z.boolean(),
});

export type PowerPolicy = z.infer<typeof powerPolicySchema>;

// Task Specification
export const taskSpecificationSchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  executablePath: z.string().min(1),
  scriptPath: z.string().min(1),
  arguments: z.array(z.string()),
  workingDirectory: z.string().min(1),
  trigger: z.nativeEnum(TaskTrigger),
  visibility: z.nativeEnum(TaskVisibility),
  restartPolicy: restartPolicySchema,
  runLevel: z.nativeEnum(RunLevel),
  powerPolicy: powerPolicySchema,
});

export type TaskSpecification = z.infer<typeof taskSpecificationSchema>;

/**
 * Executable chosen to run the target script, and whether it runs windowless.
 */
export interface ExecutionTarget {
  path: string;
  visibility: TaskVisibility;
}
