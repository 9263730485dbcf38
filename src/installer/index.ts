export { BackgroundTaskInstaller } from './installer.js';
export { resolveExecutionTarget, type RuntimeNames } from './resolver.js';
export {
  buildSpecification,
  DEFAULT_TASK_NAME,
  DEFAULT_WAKE_FLAG,
  DEFAULT_RESTART_POLICY,
  DEFAULT_POWER_POLICY,
  type SpecificationOptions,
} from './specification.js';
export {
  InstallerErrorCode,
  InstallerError,
  ExecutableNotFoundError,
  TargetScriptMissingError,
  RegistrationFailedError,
  StartFailedError,
  ELEVATION_HINT,
  type InstallError,
  type StartError,
} from './errors.js';
