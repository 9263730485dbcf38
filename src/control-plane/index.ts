// Validators
export {
  validate,
  taskNameOptionsSchema,
  installCommandOptionsSchema,
  type ValidationError,
  type TaskNameOptions,
  type InstallCommandOptions,
} from './validators.js';

// Formatter
export {
  bold,
  dim,
  red,
  green,
  yellow,
  blue,
  cyan,
  padRight,
  formatTaskState,
  formatTaskSpecification,
  formatSuccess,
  formatError,
  formatWarning,
  formatInfo,
  formatValidationErrors,
  print,
  printError,
} from './formatter.js';

// Prompt
export { confirm, parseConfirmation } from './prompt.js';

// Services
export { createServices, type CommandServices } from './services.js';

// CLI
export {
  createProgram,
  runCli,
  createInstallCommand,
  createStartCommand,
  createStatusCommand,
  createUninstallCommand,
} from './cli.js';

export { executeInstall } from './commands/install.js';
export { executeStart } from './commands/start.js';
export { executeStatus } from './commands/status.js';
export { executeUninstall } from './commands/uninstall.js';
