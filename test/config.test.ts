/**
 * Configuration Module Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { loadConfig, resetConfig, getConfig } from '../src/config/index.js';

describe('Configuration Module', () => {
  // Store original env for restoration
  const originalEnv = { ...process.env };

  beforeEach(() => {
    resetConfig();
    for (const key of Object.keys(process.env)) {
      if (key.startsWith('BGTASK_')) {
        delete process.env[key];
      }
    }
  });

  afterEach(() => {
    process.env = { ...originalEnv };
    resetConfig();
  });

  describe('loadConfig', () => {
    it('should return correct defaults when no env vars set', () => {
      const config = loadConfig();

      expect(config).toEqual({
        taskName: 'Jarvis AI Assistant',
        taskDescription: 'Starts the assistant in wake-word mode at user logon',
        scriptPath: 'main.py',
        wakeFlag: '--wake',
        runtime: 'python.exe',
        windowlessRuntime: 'pythonw.exe',
        maxRestarts: 3,
        restartIntervalMinutes: 1,
        runLevel: 'elevated',
        startSettleMs: 3000,
        powershell: 'powershell.exe',
      });
    });

    it('should parse numeric and enum variables', () => {
      process.env['BGTASK_MAX_RESTARTS'] = '5';
      process.env['BGTASK_RESTART_INTERVAL_MINUTES'] = '10';
      process.env['BGTASK_RUN_LEVEL'] = 'standard';
      process.env['BGTASK_START_SETTLE_MS'] = '0';

      const config = loadConfig();

      expect(config.maxRestarts).toBe(5);
      expect(config.restartIntervalMinutes).toBe(10);
      expect(config.runLevel).toBe('standard');
      expect(config.startSettleMs).toBe(0);
    });

    it('should read task and script settings', () => {
      process.env['BGTASK_TASK_NAME'] = 'Helper';
      process.env['BGTASK_SCRIPT_PATH'] = 'C:\\bot\\run.py';
      process.env['BGTASK_WORKING_DIR'] = 'C:\\bot';

      const config = loadConfig();

      expect(config.taskName).toBe('Helper');
      expect(config.scriptPath).toBe('C:\\bot\\run.py');
      expect(config.workingDirectory).toBe('C:\\bot');
    });

    it('should fall back to defaults for empty variables', () => {
      process.env['BGTASK_MAX_RESTARTS'] = '';
      process.env['BGTASK_START_SETTLE_MS'] = '';
      process.env['BGTASK_TASK_NAME'] = '';

      const config = loadConfig();

      expect(config.maxRestarts).toBe(3);
      expect(config.startSettleMs).toBe(3000);
      expect(config.taskName).toBe('Jarvis AI Assistant');
    });

    it('should reject a restart count above the limit', () => {
      process.env['BGTASK_MAX_RESTARTS'] = '11';

      expect(() => loadConfig()).toThrow(/Configuration validation failed/);
    });

    it('should reject an unknown run level', () => {
      process.env['BGTASK_RUN_LEVEL'] = 'root';

      expect(() => loadConfig()).toThrow(/Configuration validation failed/);
    });
  });

  describe('getConfig', () => {
    it('should cache until reset', () => {
      const first = getConfig();
      expect(getConfig()).toBe(first);

      resetConfig();
      expect(getConfig()).not.toBe(first);
    });
  });
});
