import { formatCommandLine } from '../scheduler/definition.js';
import { TaskState, type TaskSpecification } from '../types/index.js';

/**
 * ANSI color codes for terminal output.
 */
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',

  // Foreground colors
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

/**
 * Check if colors should be enabled.
 */
function useColors(): boolean {
  // Respect NO_COLOR environment variable
  if (process.env['NO_COLOR'] !== undefined) {
    return false;
  }
  // Respect FORCE_COLOR environment variable
  if (process.env['FORCE_COLOR'] !== undefined) {
    return true;
  }
  // Default: use colors if stdout is a TTY
  return process.stdout.isTTY ?? false;
}

/**
 * Apply color to text if colors are enabled.
 */
function colorize(text: string, color: keyof typeof colors): string {
  if (!useColors()) {
    return text;
  }
  return `${colors[color]}${text}${colors.reset}`;
}

/**
 * Format helper functions.
 */
export function bold(text: string): string {
  return colorize(text, 'bold');
}

export function dim(text: string): string {
  return colorize(text, 'dim');
}

export function red(text: string): string {
  return colorize(text, 'red');
}

export function green(text: string): string {
  return colorize(text, 'green');
}

export function yellow(text: string): string {
  return colorize(text, 'yellow');
}

export function blue(text: string): string {
  return colorize(text, 'blue');
}

export function cyan(text: string): string {
  return colorize(text, 'cyan');
}

/**
 * Pad string to the right.
 */
export function padRight(text: string, length: number): string {
  if (text.length >= length) {
    return text;
  }
  return text + ' '.repeat(length - text.length);
}

/**
 * Format a task state with appropriate color.
 */
export function formatTaskState(state: TaskState): string {
  const stateColors: Record<TaskState, (text: string) => string> = {
    [TaskState.ABSENT]: dim,
    [TaskState.REGISTERED]: yellow,
    [TaskState.RUNNING]: green,
  };

  return stateColors[state](state.toUpperCase());
}

/**
 * Format the details of a task specification.
 */
export function formatTaskSpecification(spec: TaskSpecification): string {
  const { restartPolicy } = spec;
  const restarts =
    restartPolicy.maxRestarts === 0
      ? 'disabled'
      : `${restartPolicy.maxRestarts} every ${restartPolicy.restartIntervalMinutes} min`;

  const rows: Array<[string, string]> = [
    ['Name:', cyan(spec.name)],
    ['Executable:', spec.executablePath],
    ['Arguments:', formatCommandLine(spec.arguments)],
    ['Working dir:', spec.workingDirectory],
    ['Trigger:', 'at user logon'],
    ['Window:', spec.visibility],
    ['Run level:', spec.runLevel],
    ['Restarts:', restarts],
  ];

  return rows.map(([label, value]) => `  ${bold(padRight(label, 12))} ${value}`).join('\n');
}

/**
 * Format success message.
 */
export function formatSuccess(message: string): string {
  return `${green('✓')} ${message}`;
}

/**
 * Format error message.
 */
export function formatError(message: string): string {
  return `${red('✗')} ${red(message)}`;
}

/**
 * Format warning message.
 */
export function formatWarning(message: string): string {
  return `${yellow('!')} ${yellow(message)}`;
}

/**
 * Format info message.
 */
export function formatInfo(message: string): string {
  return `${blue('i')} ${message}`;
}

/**
 * Print to stdout.
 */
export function print(text: string): void {
  // eslint-disable-next-line no-console -- CLI output function
  console.log(text);
}

/**
 * Print error to stderr.
 */
export function printError(text: string): void {
  // eslint-disable-next-line no-console -- CLI error output function
  console.error(text);
}

/**
 * Format and print validation errors.
 */
export function formatValidationErrors(
  errors: Array<{ path: string; message: string }>
): string {
  const lines = errors.map(e => {
    const path = e.path ? `${bold(e.path)}: ` : '';
    return `  ${red('•')} ${path}${e.message}`;
  });

  return [formatError('Validation failed:'), ...lines].join('\n');
}
