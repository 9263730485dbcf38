/**
 * PowerShell Runner Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { execa } from 'execa';
import { quotePowerShell, runPowerShell } from '../src/utils/powershell.js';

const execaResult = vi.hoisted(() => ({
  exitCode: 0 as number | undefined,
  failed: false,
  shortMessage: '',
  stdout: '',
  stderr: '',
}));

vi.mock('execa', () => ({
  execa: vi.fn(() => Promise.resolve(execaResult)),
}));

describe('runPowerShell', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    execaResult.exitCode = 0;
    execaResult.failed = false;
    execaResult.shortMessage = '';
    execaResult.stdout = '';
    execaResult.stderr = '';
  });

  it('should pass the script with -Command and return its output', async () => {
    execaResult.stdout = 'Ready';

    const result = await runPowerShell('powershell.exe', 'Get-Date');

    expect(result).toEqual({ exitCode: 0, stdout: 'Ready', stderr: '' });
    expect(execa).toHaveBeenCalledWith(
      'powershell.exe',
      ['-NoProfile', '-NonInteractive', '-ExecutionPolicy', 'Bypass', '-Command', 'Get-Date'],
      { reject: false, windowsHide: true }
    );
  });

  it('should keep a non-zero exit code and its stderr', async () => {
    execaResult.exitCode = 1;
    execaResult.failed = true;
    execaResult.shortMessage = 'Command failed with exit code 1: powershell.exe';
    execaResult.stderr = 'Access is denied.';

    const result = await runPowerShell('powershell.exe', 'Get-Date');

    expect(result).toEqual({ exitCode: 1, stdout: '', stderr: 'Access is denied.' });
  });

  it('should report why the shell could not be started', async () => {
    execaResult.exitCode = undefined;
    execaResult.failed = true;
    execaResult.shortMessage = 'Command failed with ENOENT: pwsh';

    const result = await runPowerShell('pwsh', 'Get-Date');

    expect(result).toEqual({
      exitCode: 1,
      stdout: '',
      stderr: 'Command failed with ENOENT: pwsh',
    });
  });
});

describe('quotePowerShell', () => {
  it('should double embedded single quotes', () => {
    expect(quotePowerShell("O'Brien's task")).toBe("'O''Brien''s task'");
  });
});
