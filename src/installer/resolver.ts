/**
 * Locates the interpreter that will run the target script, preferring its
 * windowless variant.
 */

import { win32 } from 'node:path';
import type { HostEnvironment } from '../host/types.js';
import { err, ok, TaskVisibility, type ExecutionTarget, type Result } from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { ExecutableNotFoundError } from './errors.js';

const log = createLogger('resolver');

export interface RuntimeNames {
  /** Console executable, e.g. python.exe */
  primary: string;
  /** Windowless executable, e.g. pythonw.exe */
  windowless: string;
}

export async function resolveExecutionTarget(
  host: HostEnvironment,
  runtime: RuntimeNames
): Promise<Result<ExecutionTarget, ExecutableNotFoundError>> {
  const primary = await host.findExecutable(runtime.primary);

  if (primary) {
    const sibling = win32.join(win32.dirname(primary), runtime.windowless);
    if (host.fileExists(sibling)) {
      log.debug({ path: sibling }, 'Using windowless runtime');
      return ok({ path: sibling, visibility: TaskVisibility.HIDDEN });
    }

    log.debug({ path: primary }, 'Windowless runtime missing, using console runtime');
    return ok({ path: primary, visibility: TaskVisibility.VISIBLE });
  }

  const windowless = await host.findExecutable(runtime.windowless);
  if (windowless) {
    log.debug({ path: windowless }, 'Using windowless runtime found on PATH');
    return ok({ path: windowless, visibility: TaskVisibility.HIDDEN });
  }

  return err(new ExecutableNotFoundError([runtime.primary, runtime.windowless]));
}
