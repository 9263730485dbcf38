export { logger, createLogger } from './logger.js';
export { quotePowerShell, runPowerShell, type PowerShellResult } from './powershell.js';
