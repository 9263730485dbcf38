/**
 * Execution Target Resolution Tests
 */

import { describe, it, expect } from 'vitest';
import { resolveExecutionTarget } from '../src/installer/resolver.js';
import { ExecutableNotFoundError, InstallerErrorCode } from '../src/installer/errors.js';
import { TaskVisibility } from '../src/types/index.js';
import { FakeHostEnvironment } from './mocks/host-mock.js';

const runtime = { primary: 'python.exe', windowless: 'pythonw.exe' };

describe('resolveExecutionTarget', () => {
  it('should prefer the windowless variant beside the interpreter', async () => {
    const host = new FakeHostEnvironment({
      path: { 'python.exe': 'C:\\Py\\python.exe' },
      files: ['C:\\Py\\python.exe', 'C:\\Py\\pythonw.exe'],
    });

    const result = await resolveExecutionTarget(host, runtime);

    expect(result).toEqual({
      success: true,
      data: { path: 'C:\\Py\\pythonw.exe', visibility: TaskVisibility.HIDDEN },
    });
  });

  it('should fall back to the console interpreter when no windowless variant exists', async () => {
    const host = new FakeHostEnvironment({
      path: { 'python.exe': 'C:\\Py\\python.exe' },
      files: ['C:\\Py\\python.exe'],
    });

    const result = await resolveExecutionTarget(host, runtime);

    expect(result).toEqual({
      success: true,
      data: { path: 'C:\\Py\\python.exe', visibility: TaskVisibility.VISIBLE },
    });
  });

  it('should use a windowless interpreter found on PATH by itself', async () => {
    const host = new FakeHostEnvironment({
      path: { 'pythonw.exe': 'C:\\Tools\\pythonw.exe' },
      files: ['C:\\Tools\\pythonw.exe'],
    });

    const result = await resolveExecutionTarget(host, runtime);

    expect(result).toEqual({
      success: true,
      data: { path: 'C:\\Tools\\pythonw.exe', visibility: TaskVisibility.HIDDEN },
    });
  });

  it('should report ExecutableNotFound when neither variant exists', async () => {
    const host = new FakeHostEnvironment();

    const result = await resolveExecutionTarget(host, runtime);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toBeInstanceOf(ExecutableNotFoundError);
    expect(result.error.code).toBe(InstallerErrorCode.EXECUTABLE_NOT_FOUND);
    expect(result.error.searched).toEqual(['python.exe', 'pythonw.exe']);
    expect(result.error.message).toBe('Executable not found. Searched for: python.exe, pythonw.exe');
  });
});
