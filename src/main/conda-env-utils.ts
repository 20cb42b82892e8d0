/**
 * Conda environment helpers
 *
 * Parses `conda info --json` and derives the child-process environment
 * variables that stand in for `conda deactivate` / `conda activate`. A spawned
 * tool cannot change the calling shell, so (de)activation here means handing
 * later commands an environment with the activation state removed or applied.
 */

import { z } from 'zod';
import type { CondaInfo } from '../shared/types/conda';
import { CondaOutputError } from './bootstrap-errors';
import { getCondaBinDirs, getPathDelimiter, isWindows } from './python-path-utils';

const condaInfoSchema = z.object({
  active_prefix: z.string().nullable().optional(),
  active_prefix_name: z.string().nullable().optional(),
  root_prefix: z.string().nullable().optional(),
  envs: z.array(z.string()).default([]),
  conda_version: z.string().nullable().optional(),
});

// Variables `conda activate` exports
const ACTIVATION_VARIABLES = ['CONDA_DEFAULT_ENV', 'CONDA_PROMPT_MODIFIER', 'CONDA_SHLVL'];
const STACKED_PREFIX_VARIABLE = /^CONDA_PREFIX(_\d+)?$/;

/**
 * Parse the output of `conda info --json`
 *
 * @throws CondaOutputError when the output is not the expected document
 */
export function parseCondaInfo(json: string): CondaInfo {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw new CondaOutputError('conda info did not return JSON', { cause: err });
  }

  const parsed = condaInfoSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CondaOutputError(
      `Unexpected conda info output: ${parsed.error.issues.map((i) => i.message).join(', ')}`
    );
  }

  return {
    activePrefix: parsed.data.active_prefix ?? null,
    activePrefixName: parsed.data.active_prefix_name ?? null,
    rootPrefix: parsed.data.root_prefix ?? null,
    envs: parsed.data.envs,
    condaVersion: parsed.data.conda_version ?? null,
  };
}

/**
 * Last path segment of a prefix, accepting either separator
 */
export function prefixBasename(prefix: string): string {
  const segments = prefix.split(/[\\/]+/).filter(Boolean);
  return segments[segments.length - 1] ?? '';
}

function samePrefix(a: string, b: string): boolean {
  const normalize = (p: string) => p.replace(/[\\/]+$/, '');
  return isWindows()
    ? normalize(a).toLowerCase() === normalize(b).toLowerCase()
    : normalize(a) === normalize(b);
}

/**
 * Find the prefix of a named environment
 *
 * The root prefix answers only to "base"; every other prefix answers to its
 * directory name.
 */
export function findEnvironmentPrefix(info: CondaInfo, name: string): string | null {
  const { rootPrefix } = info;

  if (name === 'base') {
    return rootPrefix;
  }

  for (const prefix of info.envs) {
    if (rootPrefix && samePrefix(prefix, rootPrefix)) continue;
    if (prefixBasename(prefix) === name) {
      return prefix;
    }
  }
  return null;
}

/**
 * Whether `name` is the active environment or one conda knows about
 */
export function isEnvironmentKnown(info: CondaInfo, name: string): boolean {
  return info.activePrefixName === name || findEnvironmentPrefix(info, name) !== null;
}

function findPathKey(env: NodeJS.ProcessEnv): string {
  return Object.keys(env).find((key) => key.toUpperCase() === 'PATH') ?? 'PATH';
}

/**
 * Copy of `env` with conda activation removed
 *
 * Drops the CONDA_PREFIX stack and related variables and removes the active
 * prefix's binary directories from PATH. CONDA_EXE and condabin stay so conda
 * itself remains reachable.
 */
export function buildDeactivatedEnv(env: NodeJS.ProcessEnv, info: CondaInfo): NodeJS.ProcessEnv {
  const result: NodeJS.ProcessEnv = {};
  const prefixes = new Set<string>();

  for (const [key, value] of Object.entries(env)) {
    if (STACKED_PREFIX_VARIABLE.test(key)) {
      if (value) prefixes.add(value);
      continue;
    }
    if (ACTIVATION_VARIABLES.includes(key)) continue;
    result[key] = value;
  }

  if (info.activePrefix) {
    prefixes.add(info.activePrefix);
  }

  const binDirs = [...prefixes].flatMap((prefix) => getCondaBinDirs(prefix));
  const pathKey = findPathKey(env);
  const current = env[pathKey];

  if (current !== undefined) {
    const delimiter = getPathDelimiter();
    result[pathKey] = current
      .split(delimiter)
      .filter((entry) => !binDirs.some((dir) => samePrefix(entry, dir)))
      .join(delimiter);
  }

  return result;
}

/**
 * Copy of `env` activated into `prefix`, for commands that run inside the new environment
 */
export function buildActivatedEnv(
  env: NodeJS.ProcessEnv,
  prefix: string,
  name: string
): NodeJS.ProcessEnv {
  const pathKey = findPathKey(env);
  const current = env[pathKey];
  const delimiter = getPathDelimiter();
  const entries = [...getCondaBinDirs(prefix), ...(current ? current.split(delimiter) : [])];

  return {
    ...env,
    [pathKey]: entries.join(delimiter),
    CONDA_PREFIX: prefix,
    CONDA_DEFAULT_ENV: name,
    CONDA_SHLVL: '1',
  };
}
