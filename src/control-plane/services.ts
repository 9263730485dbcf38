import { setTimeout as delay } from 'node:timers/promises';
import { getConfig, type InstallerConfig } from '../config/index.js';
import { NodeHostEnvironment } from '../host/node-host.js';
import type { HostEnvironment } from '../host/types.js';
import { PowerShellTaskScheduler } from '../scheduler/powershell-scheduler.js';
import type { TaskScheduler } from '../scheduler/types.js';
import { confirm } from './prompt.js';

/**
 * Collaborators the commands act through.
 */
export interface CommandServices {
  config: InstallerConfig;
  host: HostEnvironment;
  scheduler: TaskScheduler;
  confirm: (question: string) => Promise<boolean>;
  sleep: (ms: number) => Promise<void>;
}

export function createServices(): CommandServices {
  const config = getConfig();

  return {
    config,
    host: new NodeHostEnvironment(config.powershell),
    scheduler: new PowerShellTaskScheduler(config.powershell),
    confirm,
    sleep: (ms) => delay(ms),
  };
}
