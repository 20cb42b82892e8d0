/**
 * Turns command-line input into a BootstrapConfig
 */

import path from 'path';
import type { BootstrapConfig } from '../shared/types/conda';
import {
  DEFAULT_CHANNEL,
  DEFAULT_ENV_NAME,
  DEFAULT_PYTHON_VERSION,
  DEFAULT_REQUIREMENTS_FILE,
} from '../shared/constants/conda';
import { InvalidEnvironmentNameError } from './bootstrap-errors';

export interface BootstrapOptions {
  python?: string;
  channel?: string;
  requirements?: string;
  projectDir?: string;
  conda?: string;
}

// conda rejects these characters in environment names
const INVALID_NAME_CHARACTERS = /[\s/\\:#]/;

export function validateEnvironmentName(name: string): string {
  if (name.length === 0 || INVALID_NAME_CHARACTERS.test(name)) {
    throw new InvalidEnvironmentNameError(name);
  }
  return name;
}

/**
 * Resolve the run configuration
 *
 * Relative paths are resolved against `cwd`; the manifest defaults to
 * requirements.txt inside the project directory.
 */
export function resolveBootstrapConfig(
  name: string | undefined,
  options: BootstrapOptions,
  cwd: string
): BootstrapConfig {
  const projectDir = path.resolve(cwd, options.projectDir ?? '.');

  return {
    envName: validateEnvironmentName(name ?? DEFAULT_ENV_NAME),
    pythonVersion: options.python ?? DEFAULT_PYTHON_VERSION,
    channel: options.channel ?? DEFAULT_CHANNEL,
    requirementsPath: options.requirements
      ? path.resolve(cwd, options.requirements)
      : path.join(projectDir, DEFAULT_REQUIREMENTS_FILE),
    projectDir,
    condaExe: options.conda ? path.resolve(cwd, options.conda) : undefined,
  };
}
