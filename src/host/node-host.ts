import { existsSync } from 'node:fs';
import { execa } from 'execa';
import { createLogger } from '../utils/logger.js';
import { runPowerShell } from '../utils/powershell.js';
import type { HostEnvironment } from './types.js';

const log = createLogger('host');

const ELEVATION_SCRIPT =
  '([Security.Principal.WindowsPrincipal][Security.Principal.WindowsIdentity]::GetCurrent())' +
  '.IsInRole([Security.Principal.WindowsBuiltInRole]::Administrator)';

/**
 * Host environment backed by the local machine.
 */
export class NodeHostEnvironment implements HostEnvironment {
  constructor(
    private readonly shell: string = 'powershell.exe',
    private readonly platform: NodeJS.Platform = process.platform
  ) {}

  fileExists(path: string): boolean {
    return existsSync(path);
  }

  async findExecutable(name: string): Promise<string | null> {
    const locator = this.platform === 'win32' ? 'where' : 'which';
    const result = await execa(locator, [name], { reject: false, windowsHide: true });

    if (result.exitCode !== 0) {
      log.debug({ name, locator }, 'Executable not on PATH');
      return null;
    }

    const first = result.stdout
      .split(/\r?\n/)
      .map((line) => line.trim())
      .find((line) => line !== '');

    return first ?? null;
  }

  async isElevated(): Promise<boolean> {
    if (this.platform !== 'win32') {
      return process.getuid?.() === 0;
    }

    const result = await runPowerShell(this.shell, ELEVATION_SCRIPT);
    if (result.exitCode !== 0) {
      log.warn({ stderr: result.stderr }, 'Could not determine elevation');
      return false;
    }
    return result.stdout.trim() === 'True';
  }
}
