/**
 * Python Path Utilities
 *
 * Centralized utilities for constructing interpreter and installer paths
 * inside a conda prefix, across platforms.
 */

import path from 'path';

/**
 * Platform abstraction: check if running on Windows.
 * Use this instead of checking process.platform directly.
 */
export function isWindows(): boolean {
  return process.platform === 'win32';
}

/**
 * Get the path delimiter for the current platform.
 * Windows uses ';', Unix-like systems use ':'.
 */
export function getPathDelimiter(): string {
  return isWindows() ? ';' : ':';
}

/**
 * Get the Python executable path within a conda environment.
 * Conda environments have python.exe at the root level on Windows.
 */
export function getCondaPythonPath(envPath: string): string {
  if (isWindows()) {
    return path.join(envPath, 'python.exe');
  }
  return path.join(envPath, 'bin', 'python');
}

/**
 * Get the pip executable path within a conda environment.
 * pip is installed as an entry point under Scripts on Windows.
 */
export function getCondaPipPath(envPath: string): string {
  if (isWindows()) {
    return path.join(envPath, 'Scripts', 'pip.exe');
  }
  return path.join(envPath, 'bin', 'pip');
}

/**
 * Directories `conda activate` prepends to PATH for a prefix.
 */
export function getCondaBinDirs(envPath: string): string[] {
  if (isWindows()) {
    return [
      envPath,
      path.join(envPath, 'Library', 'mingw-w64', 'bin'),
      path.join(envPath, 'Library', 'usr', 'bin'),
      path.join(envPath, 'Library', 'bin'),
      path.join(envPath, 'Scripts'),
      path.join(envPath, 'bin'),
    ];
  }
  return [path.join(envPath, 'bin')];
}
