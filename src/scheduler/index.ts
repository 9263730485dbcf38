export {
  type TaskScheduler,
  type ScheduledTaskDefinition,
  type RegisterOptions,
  type TaskAction,
  type TaskTriggerDefinition,
  type TaskSettings,
  type TaskPrincipal,
  type PrincipalRunLevel,
} from './types.js';

export {
  quoteWindowsArgument,
  formatCommandLine,
  createAction,
  createTrigger,
  createSettings,
  createPrincipal,
  createTaskDefinition,
} from './definition.js';

export {
  renderRegisterScript,
  renderUnregisterScript,
  renderStartScript,
  renderQueryScript,
} from './scripts.js';

export { PowerShellTaskScheduler, parseTaskState } from './powershell-scheduler.js';
export { SchedulerCommandError } from './errors.js';
