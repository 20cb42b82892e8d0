/**
 * Conda Detector
 *
 * Resolves the conda executable a bootstrap run drives.
 *
 * Resolution order:
 * 1. Explicit path given on the command line (no fallback if it is unusable)
 * 2. CONDA_EXE, exported by an initialised conda shell
 * 3. The first `conda` on PATH
 * 4. OS-specific common installation directories
 *
 * A candidate is only accepted once `conda --version` answers.
 */

import { existsSync, statSync } from 'fs';
import path from 'path';
import os from 'os';
import type {
  CondaDistributionType,
  CondaInstallation,
  CondaSource,
} from '../shared/types/conda';
import { CondaNotFoundError } from './bootstrap-errors';
import { runCommand, type CommandRunner } from './command-runner';
import { getPathDelimiter, isWindows } from './python-path-utils';
import { debugLog } from '../shared/utils/debug-logger';

/**
 * Common installation directories, per platform
 */
function getSearchPaths(): string[] {
  const home = os.homedir();
  const userDirs = ['miniconda3', 'anaconda3', 'miniforge3', 'mambaforge'].map((dir) =>
    path.join(home, dir)
  );

  if (isWindows()) {
    return [
      ...userDirs,
      'C:\\ProgramData\\miniconda3',
      'C:\\ProgramData\\Anaconda3',
      // Only include LOCALAPPDATA path if the env var is defined (prevents relative path search)
      ...(process.env.LOCALAPPDATA ? [path.join(process.env.LOCALAPPDATA, 'miniconda3')] : []),
    ];
  }

  return [...userDirs, '/opt/conda', '/opt/miniconda3', '/opt/anaconda3'];
}

/**
 * Get the path to the conda executable within an installation directory
 */
export function getCondaExecutablePath(condaPath: string): string {
  if (isWindows()) {
    return path.join(condaPath, 'Scripts', 'conda.exe');
  }
  return path.join(condaPath, 'bin', 'conda');
}

/**
 * Installation directory for an executable at <base>/bin/conda,
 * <base>/condabin/conda or <base>\Scripts\conda.exe
 */
export function getInstallationPath(condaExe: string): string {
  return path.dirname(path.dirname(condaExe));
}

/**
 * Determine the type of conda installation from its path
 */
export function determineCondaType(condaPath: string): CondaDistributionType {
  const lowerPath = condaPath.toLowerCase();

  if (lowerPath.includes('mambaforge')) {
    return 'mambaforge';
  }
  if (lowerPath.includes('miniforge')) {
    return 'miniforge';
  }
  if (lowerPath.includes('miniconda')) {
    return 'miniconda';
  }
  if (lowerPath.includes('anaconda')) {
    return 'anaconda';
  }

  return 'unknown';
}

function isFile(filePath: string): boolean {
  try {
    return existsSync(filePath) && statSync(filePath).isFile();
  } catch {
    return false;
  }
}

/**
 * Find the first conda executable on a PATH string
 */
export function findCondaOnPath(pathValue: string): string | null {
  const names = isWindows() ? ['conda.exe', 'conda.bat'] : ['conda'];

  for (const dir of pathValue.split(getPathDelimiter())) {
    if (!dir) continue;
    for (const name of names) {
      const candidate = path.join(dir, name);
      if (isFile(candidate)) {
        return candidate;
      }
    }
  }
  return null;
}

/**
 * Get the version of a conda executable
 *
 * @returns Version string (e.g., "24.1.2") or null if unable to determine
 */
export async function getCondaVersion(
  condaExe: string,
  runner: CommandRunner = runCommand
): Promise<string | null> {
  try {
    const { code, stdout, stderr } = await runner(condaExe, ['--version'], {
      capture: true,
      timeout: 5000,
    });
    if (code !== 0) {
      return null;
    }
    // Output format: "conda 24.1.2"; very old releases printed it on stderr
    const match = `${stdout}\n${stderr}`.match(/conda\s+(\d+\.\d+\.\d+)/i);
    return match ? match[1] : null;
  } catch {
    return null;
  }
}

async function validateCondaExecutable(
  condaExe: string,
  source: CondaSource,
  runner: CommandRunner
): Promise<CondaInstallation | null> {
  const version = await getCondaVersion(condaExe, runner);
  if (!version) {
    debugLog(`[Conda] Rejected ${condaExe} (${source})`);
    return null;
  }

  const installationPath = getInstallationPath(condaExe);
  return {
    path: installationPath,
    condaExe,
    version,
    type: determineCondaType(installationPath),
    source,
  };
}

export interface ResolveCondaOptions {
  explicitPath?: string;
  env?: NodeJS.ProcessEnv;
  runner?: CommandRunner;
}

/**
 * Resolve the conda executable to use for a bootstrap run
 *
 * @throws CondaNotFoundError when no candidate answers `conda --version`
 */
export async function resolveCondaExecutable(
  options: ResolveCondaOptions = {}
): Promise<CondaInstallation> {
  const { explicitPath, env = process.env, runner = runCommand } = options;

  if (explicitPath) {
    const installation = await validateCondaExecutable(explicitPath, 'explicit', runner);
    if (!installation) {
      throw new CondaNotFoundError(`conda executable not usable: ${explicitPath}`);
    }
    return installation;
  }

  const candidates: Array<{ condaExe: string; source: CondaSource }> = [];

  if (env.CONDA_EXE) {
    candidates.push({ condaExe: env.CONDA_EXE, source: 'env' });
  }

  const onPath = findCondaOnPath(env.PATH ?? env.Path ?? '');
  if (onPath) {
    candidates.push({ condaExe: onPath, source: 'path' });
  }

  for (const searchPath of getSearchPaths()) {
    const condaExe = getCondaExecutablePath(searchPath);
    if (isFile(condaExe)) {
      candidates.push({ condaExe, source: 'search' });
    }
  }

  const tried = new Set<string>();
  for (const { condaExe, source } of candidates) {
    if (tried.has(condaExe)) continue;
    tried.add(condaExe);

    const installation = await validateCondaExecutable(condaExe, source, runner);
    if (installation) {
      console.warn(
        `[Conda] Found ${installation.type} at ${installation.path} (v${installation.version})`
      );
      return installation;
    }
  }

  throw new CondaNotFoundError(
    'No conda installation found. Install Miniconda or Anaconda, or pass --conda <path>'
  );
}
