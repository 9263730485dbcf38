/**
 * Background Task Installer Library API
 *
 * Exports all public modules for programmatic usage.
 */

// Types
export * from './types/index.js';

// Installer (main entry point)
export {
  BackgroundTaskInstaller,
  resolveExecutionTarget,
  buildSpecification,
  type RuntimeNames,
  type SpecificationOptions,
} from './installer/index.js';

// Installer errors
export * as errors from './installer/errors.js';

// Host scheduler
export * as scheduler from './scheduler/index.js';

// Host environment
export * as host from './host/index.js';

// Logging and PowerShell helpers
export * as utils from './utils/index.js';

// Configuration
export { loadConfig, getConfig, resetConfig, type InstallerConfig } from './config/index.js';

// Command-line surface
export * as cli from './control-plane/index.js';
