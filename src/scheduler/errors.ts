/**
 * Error thrown when a scheduler command exits unsuccessfully.
 */
export class SchedulerCommandError extends Error {
  override readonly name = 'SchedulerCommandError';
  readonly operation: string;
  readonly exitCode: number;
  readonly stderr: string;

  constructor(operation: string, exitCode: number, stderr: string) {
    const detail = stderr.trim() || `exit code ${exitCode}`;
    super(`Scheduler ${operation} failed: ${detail}`);
    this.operation = operation;
    this.exitCode = exitCode;
    this.stderr = stderr;
    Object.setPrototypeOf(this, SchedulerCommandError.prototype);
  }
}
