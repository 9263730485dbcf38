/**
 * Host Task Definition Tests
 */

import { describe, it, expect } from 'vitest';
import {
  createPrincipal,
  createSettings,
  createTaskDefinition,
  formatCommandLine,
  quoteWindowsArgument,
} from '../src/scheduler/definition.js';
import { buildSpecification } from '../src/installer/specification.js';
import { RunLevel, TaskVisibility } from '../src/types/index.js';

const hiddenSpec = buildSpecification(
  { path: 'C:\\Py\\pythonw.exe', visibility: TaskVisibility.HIDDEN },
  'C:\\App\\main.py',
  'C:\\App'
);

describe('quoteWindowsArgument', () => {
  it('should leave plain arguments alone', () => {
    expect(quoteWindowsArgument('C:\\App\\main.py')).toBe('C:\\App\\main.py');
    expect(quoteWindowsArgument('--wake')).toBe('--wake');
  });

  it('should quote arguments containing spaces', () => {
    expect(quoteWindowsArgument('C:\\My App\\main.py')).toBe('"C:\\My App\\main.py"');
  });

  it('should quote the empty argument', () => {
    expect(quoteWindowsArgument('')).toBe('""');
  });

  it('should escape embedded quotes', () => {
    expect(quoteWindowsArgument('say "hi"')).toBe('"say \\"hi\\""');
  });

  it('should double trailing backslashes inside quotes', () => {
    expect(quoteWindowsArgument('C:\\My Dir\\')).toBe('"C:\\My Dir\\\\"');
  });
});

describe('formatCommandLine', () => {
  it('should join quoted arguments with spaces', () => {
    expect(formatCommandLine(['C:\\My App\\main.py', '--wake'])).toBe(
      '"C:\\My App\\main.py" --wake'
    );
  });
});

describe('createSettings', () => {
  it('should map visibility, power and restart policy', () => {
    expect(createSettings(hiddenSpec)).toEqual({
      hidden: true,
      allowStartIfOnBatteries: true,
      dontStopIfGoingOnBatteries: true,
      startWhenAvailable: true,
      restartCount: 3,
      restartIntervalMinutes: 1,
      executionTimeLimitSeconds: 0,
    });
  });
});

describe('createPrincipal', () => {
  it('should request the highest run level for elevated tasks', () => {
    expect(createPrincipal(hiddenSpec)).toEqual({ logonType: 'Interactive', runLevel: 'Highest' });
  });

  it('should request the limited run level for standard tasks', () => {
    const spec = { ...hiddenSpec, runLevel: RunLevel.STANDARD };
    expect(createPrincipal(spec).runLevel).toBe('Limited');
  });
});

describe('createTaskDefinition', () => {
  it('should carry the name and description', () => {
    const definition = createTaskDefinition(hiddenSpec);

    expect(definition.name).toBe('Jarvis AI Assistant');
    expect(definition.description).toBe('Jarvis AI Assistant (wake-word mode)');
    expect(definition.action).toEqual({
      execute: 'C:\\Py\\pythonw.exe',
      argument: 'C:\\App\\main.py --wake',
      workingDirectory: 'C:\\App',
    });
  });
});
