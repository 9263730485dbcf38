/**
 * Task Specification Builder Tests
 */

import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import {
  buildSpecification,
  DEFAULT_POWER_POLICY,
  DEFAULT_RESTART_POLICY,
} from '../src/installer/specification.js';
import { RunLevel, TaskTrigger, TaskVisibility } from '../src/types/index.js';

const target = { path: 'C:\\Py\\pythonw.exe', visibility: TaskVisibility.HIDDEN };

describe('buildSpecification', () => {
  it('should combine the target, script and policy defaults', () => {
    const spec = buildSpecification(target, 'C:\\App\\main.py', 'C:\\App');

    expect(spec).toEqual({
      name: 'Jarvis AI Assistant',
      description: 'Jarvis AI Assistant (wake-word mode)',
      executablePath: 'C:\\Py\\pythonw.exe',
      scriptPath: 'C:\\App\\main.py',
      arguments: ['C:\\App\\main.py', '--wake'],
      workingDirectory: 'C:\\App',
      trigger: TaskTrigger.AT_USER_LOGON,
      visibility: TaskVisibility.HIDDEN,
      restartPolicy: { maxRestarts: 3, restartIntervalMinutes: 1 },
      runLevel: RunLevel.ELEVATED,
      powerPolicy: { runOnBattery: true, continueOnBatteryTransition: true },
    });
  });

  it('should apply overrides', () => {
    const spec = buildSpecification(target, 'D:\\bot\\run.py', 'D:\\bot', {
      name: 'Helper',
      description: 'Helper bot',
      wakeFlag: '--listen',
      restartPolicy: { maxRestarts: 5, restartIntervalMinutes: 2 },
      runLevel: RunLevel.STANDARD,
    });

    expect(spec.name).toBe('Helper');
    expect(spec.description).toBe('Helper bot');
    expect(spec.arguments).toEqual(['D:\\bot\\run.py', '--listen']);
    expect(spec.restartPolicy).toEqual({ maxRestarts: 5, restartIntervalMinutes: 2 });
    expect(spec.runLevel).toBe(RunLevel.STANDARD);
    expect(spec.powerPolicy).toEqual(DEFAULT_POWER_POLICY);
  });

  it('should not share the default policy objects with the result', () => {
    const spec = buildSpecification(target, 'C:\\App\\main.py', 'C:\\App');
    spec.restartPolicy.maxRestarts = 9;

    expect(DEFAULT_RESTART_POLICY.maxRestarts).toBe(3);
  });

  it('should reject an unbounded restart count', () => {
    expect(() =>
      buildSpecification(target, 'C:\\App\\main.py', 'C:\\App', {
        restartPolicy: { maxRestarts: 50, restartIntervalMinutes: 1 },
      })
    ).toThrow(ZodError);
  });
});
