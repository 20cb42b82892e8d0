/**
 * Conda Environment Bootstrapper
 *
 * Rebuilds a named conda environment from scratch:
 * - Unloads the environment if it is active
 * - Removes any existing instance
 * - Creates it again with a pinned Python version
 * - Registers an extra package channel
 * - Installs the requirements manifest and the local project with pip
 *
 * Uses an async generator for progress reporting. A fatal failure yields a
 * final 'error' event and stops; nothing is rolled back.
 */

import { promises as fsPromises } from 'fs';
import type {
  BootstrapConfig,
  BootstrapStep,
  CommandStep,
  CondaInstallation,
  SetupProgress,
  StepPolicy,
} from '../shared/types/conda';
import { errorMessage, exitCodeOf } from './bootstrap-errors';
import { runCommand, type CommandOptions, type CommandRunner } from './command-runner';
import { resolveCondaExecutable } from './conda-detector';
import {
  buildActivatedEnv,
  buildDeactivatedEnv,
  findEnvironmentPrefix,
  isEnvironmentKnown,
  parseCondaInfo,
} from './conda-env-utils';
import { getCondaPipPath, getCondaPythonPath } from './python-path-utils';
import { debugLog } from '../shared/utils/debug-logger';

/**
 * Whether a failing step stops the run
 *
 * Deactivation and removal are expected to fail on a first run and never
 * stop it. This also hides unexpected failures of those two steps.
 */
export const STEP_POLICIES: Record<CommandStep, StepPolicy> = {
  deactivating: 'suppressed',
  removing: 'suppressed',
  creating: 'fatal',
  activating: 'fatal',
  'configuring-channel': 'fatal',
  'installing-deps': 'fatal',
  'installing-project': 'fatal',
};

const STEP_LABELS: Record<Exclude<BootstrapStep, 'complete' | 'error'>, string> = {
  detecting: 'Conda detection',
  deactivating: 'Deactivation',
  removing: 'Environment removal',
  creating: 'Environment creation',
  activating: 'Environment activation',
  'configuring-channel': 'Channel configuration',
  'installing-deps': 'Dependency installation',
  'installing-project': 'Project installation',
};

export interface BootstrapDependencies {
  runner?: CommandRunner;
  resolveConda?: (explicitPath?: string) => Promise<CondaInstallation>;
  /** Environment the run starts from; defaults to process.env */
  env?: NodeJS.ProcessEnv;
  pathExists?: (filePath: string) => Promise<boolean>;
}

type StepOutcome =
  | { ok: true; stdout: string }
  | { ok: false; exitCode: number; detail?: string };

async function defaultPathExists(filePath: string): Promise<boolean> {
  try {
    await fsPromises.access(filePath);
    return true;
  } catch {
    return false;
  }
}

function progress(
  step: BootstrapStep,
  message: string,
  extra: Partial<SetupProgress> = {}
): SetupProgress {
  return { step, message, ...extra, timestamp: new Date().toISOString() };
}

function failure(
  step: Exclude<BootstrapStep, 'complete' | 'error'>,
  exitCode: number,
  detail?: string
): SetupProgress {
  return progress('error', `${STEP_LABELS[step]} failed`, {
    failedStep: step,
    exitCode,
    detail,
  });
}

/**
 * Bootstrap a conda environment
 *
 * @param config - Resolved run configuration
 * @param deps - Overrides for the command runner, conda lookup and environment
 * @yields SetupProgress updates; the last one is 'complete' or 'error'
 */
export async function* bootstrapEnvironment(
  config: BootstrapConfig,
  deps: BootstrapDependencies = {}
): AsyncGenerator<SetupProgress> {
  const runner = deps.runner ?? runCommand;
  const resolveConda =
    deps.resolveConda ??
    ((explicitPath?: string) => resolveCondaExecutable({ explicitPath, runner }));
  const pathExists = deps.pathExists ?? defaultPathExists;
  const { envName } = config;

  let env: NodeJS.ProcessEnv = { ...(deps.env ?? process.env) };

  /**
   * Run one command for a step. Spawn errors and non-zero exits become a
   * failed outcome; the caller applies the step's policy.
   */
  const execute = async (
    step: CommandStep,
    command: string,
    args: string[],
    options: CommandOptions = {}
  ): Promise<StepOutcome> => {
    try {
      const { code, stdout } = await runner(command, args, { env, ...options });
      if (code !== 0) {
        if (STEP_POLICIES[step] === 'suppressed') {
          debugLog(`[Bootstrap] Ignoring ${step} exit status ${code}`);
        }
        return { ok: false, exitCode: code };
      }
      return { ok: true, stdout };
    } catch (err) {
      if (STEP_POLICIES[step] === 'suppressed') {
        debugLog(`[Bootstrap] Ignoring ${step} error: ${errorMessage(err)}`);
      }
      return { ok: false, exitCode: exitCodeOf(err), detail: errorMessage(err) };
    }
  };

  // Step 1: Locate conda
  yield progress('detecting', 'Locating conda installation', { progress: 0 });

  let conda: CondaInstallation;
  try {
    conda = await resolveConda(config.condaExe);
  } catch (err) {
    yield failure('detecting', exitCodeOf(err), errorMessage(err));
    return;
  }
  const condaExe = conda.condaExe;

  // Step 2: Unload the environment if it is active
  yield progress('deactivating', 'Unloading active environment', { progress: 5 });

  const infoOutcome = await execute('deactivating', condaExe, ['info', '--json'], {
    capture: true,
  });
  if (infoOutcome.ok) {
    try {
      const info = parseCondaInfo(infoOutcome.stdout);
      if (isEnvironmentKnown(info, envName)) {
        env = buildDeactivatedEnv(env, info);
        debugLog(`[Bootstrap] Deactivated ${info.activePrefixName ?? 'no active environment'}`);
      }
    } catch (err) {
      debugLog(`[Bootstrap] Ignoring deactivating error: ${errorMessage(err)}`);
    }
  }

  // Step 3: Remove any existing instance
  yield progress('removing', 'Removing existing instance of environment (if present)', {
    progress: 10,
  });
  await execute('removing', condaExe, ['remove', '-y', '-n', envName, '--all']);

  // Step 4: Create the environment
  yield progress('creating', 'Creating new environment', {
    detail: `${envName} with python=${config.pythonVersion}`,
    progress: 20,
  });

  const created = await execute('creating', condaExe, [
    'create',
    '--yes',
    '--name',
    envName,
    `python=${config.pythonVersion}`,
  ]);
  if (!created.ok) {
    yield failure('creating', created.exitCode, created.detail);
    return;
  }

  // Step 5: Activate it for the remaining commands
  yield progress('activating', `Activating environment ${envName}`, { progress: 50 });

  const lookup = await execute('activating', condaExe, ['info', '--json'], { capture: true });
  if (!lookup.ok) {
    yield failure('activating', lookup.exitCode, lookup.detail);
    return;
  }

  let prefix: string | null;
  try {
    prefix = findEnvironmentPrefix(parseCondaInfo(lookup.stdout), envName);
  } catch (err) {
    yield failure('activating', 1, errorMessage(err));
    return;
  }
  if (!prefix) {
    yield failure('activating', 1, `Environment ${envName} not found after creation`);
    return;
  }

  const pythonExe = getCondaPythonPath(prefix);
  const pipExe = getCondaPipPath(prefix);
  if (!(await pathExists(pythonExe))) {
    yield failure('activating', 1, `Python executable not found in environment: ${pythonExe}`);
    return;
  }
  if (!(await pathExists(pipExe))) {
    yield failure('activating', 1, `pip not found in environment: ${pipExe}`);
    return;
  }
  env = buildActivatedEnv(env, prefix, envName);

  // Step 6: Register the extra channel
  yield progress('configuring-channel', `Adding channel ${config.channel}`, { progress: 60 });

  const channel = await execute('configuring-channel', condaExe, [
    'config',
    '--add',
    'channels',
    config.channel,
  ]);
  if (!channel.ok) {
    yield failure('configuring-channel', channel.exitCode, channel.detail);
    return;
  }

  // Step 7: Install the manifest. A missing or empty file is pip's call, not ours.
  yield progress('installing-deps', 'Installing requirements', {
    detail: `From: ${config.requirementsPath}`,
    progress: 70,
  });

  const requirements = await execute(
    'installing-deps',
    pipExe,
    ['install', '-r', config.requirementsPath],
    { cwd: config.projectDir }
  );
  if (!requirements.ok) {
    yield failure('installing-deps', requirements.exitCode, requirements.detail);
    return;
  }

  // Step 8: Install the local project
  yield progress('installing-project', `Installing project from ${config.projectDir}`, {
    progress: 85,
  });

  const project = await execute('installing-project', pipExe, ['install', '.'], {
    cwd: config.projectDir,
  });
  if (!project.ok) {
    yield failure('installing-project', project.exitCode, project.detail);
    return;
  }

  // Step 9: Complete
  yield progress('complete', `Installation complete. Use 'conda activate ${envName}' !`, {
    detail: `Environment created at ${prefix}`,
    progress: 100,
  });
}
