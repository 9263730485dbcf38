import { dirname, resolve, win32 } from 'node:path';

/**
 * Drive-letter or UNC path, which must keep Windows semantics on any host.
 */
function isWindowsPath(path: string): boolean {
  return /^[a-zA-Z]:[\\/]/.test(path) || path.startsWith('\\\\');
}

export function resolveTargetPath(path: string): string {
  return isWindowsPath(path) ? win32.normalize(path) : resolve(path);
}

export function parentDirectory(path: string): string {
  return isWindowsPath(path) ? win32.dirname(path) : dirname(path);
}
