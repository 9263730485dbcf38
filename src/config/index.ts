/**
 * Installer Configuration Module
 *
 * Centralizes all configuration reading from environment variables
 * with validation and defaults.
 */

import { z } from 'zod';
import { RunLevel, MAX_RESTARTS_LIMIT } from '../types/index.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config');

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  // Task identity
  taskName: z.string().min(1).default('Jarvis AI Assistant'),
  taskDescription: z
    .string()
    .default('Starts the assistant in wake-word mode at user logon'),

  // Target program
  scriptPath: z.string().min(1).default('main.py'),
  workingDirectory: z.string().min(1).optional(),
  wakeFlag: z.string().min(1).default('--wake'),

  // Interpreter lookup
  runtime: z.string().min(1).default('python.exe'),
  windowlessRuntime: z.string().min(1).default('pythonw.exe'),

  // Restart policy (1 min - 1 day)
  maxRestarts: z.coerce.number().int().min(0).max(MAX_RESTARTS_LIMIT).default(3),
  restartIntervalMinutes: z.coerce.number().int().min(1).max(1440).default(1),

  runLevel: z.nativeEnum(RunLevel).default(RunLevel.ELEVATED),

  // Pause after an immediate start before confirming (0 - 60s)
  startSettleMs: z.coerce.number().int().min(0).max(60000).default(3000),

  powershell: z.string().min(1).default('powershell.exe'),
});

export type InstallerConfig = z.infer<typeof configSchema>;

/**
 * Read a variable, treating an empty value as unset so defaults apply.
 */
function readEnv(key: string): string | undefined {
  const value = process.env[key];
  return value === '' ? undefined : value;
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(): InstallerConfig {
  const raw = {
    taskName: readEnv('BGTASK_TASK_NAME'),
    taskDescription: readEnv('BGTASK_TASK_DESCRIPTION'),
    scriptPath: readEnv('BGTASK_SCRIPT_PATH'),
    workingDirectory: readEnv('BGTASK_WORKING_DIR'),
    wakeFlag: readEnv('BGTASK_WAKE_FLAG'),
    runtime: readEnv('BGTASK_RUNTIME'),
    windowlessRuntime: readEnv('BGTASK_WINDOWLESS_RUNTIME'),
    maxRestarts: readEnv('BGTASK_MAX_RESTARTS'),
    restartIntervalMinutes: readEnv('BGTASK_RESTART_INTERVAL_MINUTES'),
    runLevel: readEnv('BGTASK_RUN_LEVEL'),
    startSettleMs: readEnv('BGTASK_START_SETTLE_MS'),
    powershell: readEnv('BGTASK_POWERSHELL'),
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    log.error({ errors: result.error.errors }, 'Invalid configuration');
    throw new Error(`Configuration validation failed: ${result.error.message}`);
  }

  log.debug(
    {
      taskName: result.data.taskName,
      scriptPath: result.data.scriptPath,
      runtime: result.data.runtime,
      maxRestarts: result.data.maxRestarts,
      runLevel: result.data.runLevel,
    },
    'Configuration loaded'
  );

  return result.data;
}

/**
 * Singleton configuration instance
 */
let configInstance: InstallerConfig | null = null;

/**
 * Get the configuration singleton
 */
export function getConfig(): InstallerConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset configuration (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}
