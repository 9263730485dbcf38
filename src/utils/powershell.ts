/**
 * Runs PowerShell snippets through execa.
 */

import { execa } from 'execa';
import { createLogger } from './logger.js';

const log = createLogger('powershell');

export interface PowerShellResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Embed a value as a single-quoted PowerShell literal.
 */
export function quotePowerShell(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * Run a script with `-Command`. Never rejects on a non-zero exit; callers
 * inspect the exit code.
 */
export async function runPowerShell(shell: string, script: string): Promise<PowerShellResult> {
  log.debug({ shell, lines: script.split('\n').length }, 'Running PowerShell script');

  const result = await execa(
    shell,
    ['-NoProfile', '-NonInteractive', '-ExecutionPolicy', 'Bypass', '-Command', script],
    {
      reject: false,
      windowsHide: true,
    }
  );

  // Spawn failures (missing shell, EACCES) have no exit code or stderr
  if (typeof result.exitCode !== 'number') {
    const reason =
      'shortMessage' in result && typeof result.shortMessage === 'string'
        ? result.shortMessage
        : `Failed to run ${shell}`;
    log.warn({ shell, reason }, 'PowerShell could not be started');
    return { exitCode: 1, stdout: result.stdout ?? '', stderr: reason };
  }

  return {
    exitCode: result.exitCode,
    stdout: result.stdout ?? '',
    stderr: result.stderr ?? '',
  };
}
