/**
 * Port onto the host environment: filesystem, PATH lookup and privilege.
 */
export interface HostEnvironment {
  fileExists(path: string): boolean;
  /**
   * Locate an executable on PATH.
   * @returns the first match, or null when none is found
   */
  findExecutable(name: string): Promise<string | null>;
  /** Whether the current process runs with administrator rights */
  isElevated(): Promise<boolean>;
}
