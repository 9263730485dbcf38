/**
 * PowerShell scripts driving the ScheduledTasks module.
 */

import { quotePowerShell as q } from '../utils/powershell.js';
import type { ScheduledTaskDefinition, TaskSettings } from './types.js';

const PREAMBLE = "$ErrorActionPreference = 'Stop'";

/** Folder every task is registered in */
export const ROOT_TASK_PATH = '\\';

/** Printed by the unregister script when a task was removed */
export const REMOVED_MARKER = 'removed';
/** Printed by the unregister and query scripts when no task exists */
export const ABSENT_MARKER = 'Absent';

function renderSettingsArguments(settings: TaskSettings): string {
  const args: string[] = [];

  if (settings.allowStartIfOnBatteries) {
    args.push('-AllowStartIfOnBatteries');
  }
  if (settings.dontStopIfGoingOnBatteries) {
    args.push('-DontStopIfGoingOnBatteries');
  }
  if (settings.startWhenAvailable) {
    args.push('-StartWhenAvailable');
  }
  if (settings.hidden) {
    args.push('-Hidden');
  }
  // RestartInterval is rejected without a positive RestartCount
  if (settings.restartCount > 0) {
    args.push(
      `-RestartCount ${settings.restartCount}`,
      `-RestartInterval (New-TimeSpan -Minutes ${settings.restartIntervalMinutes})`
    );
  }
  args.push(`-ExecutionTimeLimit (New-TimeSpan -Seconds ${settings.executionTimeLimitSeconds})`);

  return args.join(' ');
}

export function renderRegisterScript(definition: ScheduledTaskDefinition, force: boolean): string {
  const { action, settings, principal } = definition;

  const actionArgs = [`-Execute ${q(action.execute)}`];
  if (action.argument !== '') {
    actionArgs.push(`-Argument ${q(action.argument)}`);
  }
  actionArgs.push(`-WorkingDirectory ${q(action.workingDirectory)}`);

  const register = [
    `Register-ScheduledTask -TaskPath ${q(ROOT_TASK_PATH)} -TaskName ${q(definition.name)}`,
    `-Description ${q(definition.description)}`,
    '-Action $action -Trigger $trigger -Settings $settings -Principal $principal',
  ];
  if (force) {
    register.push('-Force');
  }

  return [
    PREAMBLE,
    '$user = "$env:USERDOMAIN\\$env:USERNAME"',
    `$action = New-ScheduledTaskAction ${actionArgs.join(' ')}`,
    '$trigger = New-ScheduledTaskTrigger -AtLogOn -User $user',
    `$settings = New-ScheduledTaskSettingsSet ${renderSettingsArguments(settings)}`,
    `$principal = New-ScheduledTaskPrincipal -UserId $user -LogonType ${principal.logonType} -RunLevel ${principal.runLevel}`,
    `${register.join(' ')} | Out-Null`,
  ].join('\n');
}

/**
 * Exact, root-folder lookup. `-TaskName` treats `*`, `?` and `[...]` as
 * wildcards and searches every folder, while registration always writes to `\`.
 */
function renderLookup(name: string): string {
  return `$task = Get-ScheduledTask -TaskPath ${q(ROOT_TASK_PATH)} -ErrorAction SilentlyContinue | Where-Object TaskName -eq ${q(name)}`;
}

export function renderUnregisterScript(name: string): string {
  return [
    PREAMBLE,
    renderLookup(name),
    `if ($null -eq $task) { Write-Output '${ABSENT_MARKER}'; exit 0 }`,
    '$task | Unregister-ScheduledTask -Confirm:$false',
    `Write-Output '${REMOVED_MARKER}'`,
  ].join('\n');
}

export function renderStartScript(name: string): string {
  return [
    PREAMBLE,
    renderLookup(name),
    `if ($null -eq $task) { throw ${q(`Task ${name} not found`)} }`,
    '$task | Start-ScheduledTask',
  ].join('\n');
}

export function renderQueryScript(name: string): string {
  return [
    PREAMBLE,
    renderLookup(name),
    `if ($null -eq $task) { Write-Output '${ABSENT_MARKER}' } else { Write-Output $task.State }`,
  ].join('\n');
}
