import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  bootstrapEnvironment,
  STEP_POLICIES,
  type BootstrapDependencies,
} from '../conda-env-bootstrapper';
import { CommandError, CondaNotFoundError } from '../bootstrap-errors';
import type { BootstrapConfig, SetupProgress } from '../../shared/types/conda';
import {
  CONDA_EXE,
  CONDA_INSTALLATION,
  ROOT_PREFIX,
  createFakeConda,
  prefixOf,
  type FakeConda,
  type FakeCondaOptions,
} from './fake-conda';

const CONFIG: BootstrapConfig = {
  envName: 'testenv',
  pythonVersion: '3.7',
  channel: 'bioconda',
  requirementsPath: '/project/requirements.txt',
  projectDir: '/project',
};

const BASE_ENV: NodeJS.ProcessEnv = {
  PATH: `${ROOT_PREFIX}/bin:${ROOT_PREFIX}/condabin:/usr/bin`,
  CONDA_EXE,
  CONDA_PREFIX: ROOT_PREFIX,
  CONDA_DEFAULT_ENV: 'base',
  CONDA_SHLVL: '1',
};

async function collect(generator: AsyncGenerator<SetupProgress>): Promise<SetupProgress[]> {
  const updates: SetupProgress[] = [];
  for await (const update of generator) {
    updates.push(update);
  }
  return updates;
}

function setup(options: FakeCondaOptions = {}, overrides: BootstrapDependencies = {}) {
  const fake = createFakeConda(options);
  const deps: BootstrapDependencies = {
    runner: fake.runner,
    resolveConda: async () => CONDA_INSTALLATION,
    env: BASE_ENV,
    pathExists: async () => true,
    ...overrides,
  };
  return { fake, run: (config: BootstrapConfig = CONFIG) => collect(bootstrapEnvironment(config, deps)) };
}

function lastOf(updates: SetupProgress[]): SetupProgress {
  const last = updates[updates.length - 1];
  if (!last) {
    throw new Error('bootstrapper yielded nothing');
  }
  return last;
}

function callFor(fake: FakeConda, line: string) {
  const index = fake.commandLines().indexOf(line);
  return index === -1 ? undefined : fake.calls[index];
}

describe('bootstrapEnvironment', () => {
  const originalPlatform = process.platform;

  beforeEach(() => {
    Object.defineProperty(process, 'platform', { value: 'linux' });
  });

  afterEach(() => {
    Object.defineProperty(process, 'platform', { value: originalPlatform });
    vi.restoreAllMocks();
  });

  describe('successful run', () => {
    it('should issue the bootstrap commands in order', async () => {
      const { fake, run } = setup();

      await run();

      expect(fake.commandLines()).toEqual([
        'conda info --json',
        'conda remove -y -n testenv --all',
        'conda create --yes --name testenv python=3.7',
        'conda info --json',
        'conda config --add channels bioconda',
        'pip install -r /project/requirements.txt',
        'pip install .',
      ]);
    });

    it('should run pip from the new environment', async () => {
      const { fake, run } = setup();

      await run();

      const pipCalls = fake.calls.filter((call) => call.args[0] === 'install');
      expect(pipCalls.map((call) => call.command)).toEqual([
        `${prefixOf('testenv')}/bin/pip`,
        `${prefixOf('testenv')}/bin/pip`,
      ]);
    });

    it('should report progress messages and finish with the activation hint', async () => {
      const { run } = setup();

      const updates = await run();

      expect(updates.map((u) => u.step)).toEqual([
        'detecting',
        'deactivating',
        'removing',
        'creating',
        'activating',
        'configuring-channel',
        'installing-deps',
        'installing-project',
        'complete',
      ]);
      expect(updates.map((u) => u.message)).toEqual([
        'Locating conda installation',
        'Unloading active environment',
        'Removing existing instance of environment (if present)',
        'Creating new environment',
        'Activating environment testenv',
        'Adding channel bioconda',
        'Installing requirements',
        'Installing project from /project',
        "Installation complete. Use 'conda activate testenv' !",
      ]);
      expect(lastOf(updates).detail).toBe(`Environment created at ${prefixOf('testenv')}`);
    });

    it('should leave exactly one environment with the name and register the channel', async () => {
      const { fake, run } = setup();

      await run();

      expect([...fake.envs]).toEqual(['testenv']);
      expect(fake.channels).toEqual(['bioconda', 'defaults']);
    });

    it('should replace an existing environment rather than merge into it', async () => {
      const { fake, run } = setup({ existing: ['testenv', 'other'] });

      const updates = await run();

      expect(lastOf(updates).step).toBe('complete');
      expect(fake.commandLines().slice(1, 3)).toEqual([
        'conda remove -y -n testenv --all',
        'conda create --yes --name testenv python=3.7',
      ]);
      expect([...fake.envs].sort()).toEqual(['other', 'testenv']);
    });

    it('should succeed when run twice with the same name', async () => {
      const { fake, run } = setup();

      const first = await run();
      const second = await run();

      expect(lastOf(first).step).toBe('complete');
      expect(lastOf(second).step).toBe('complete');
      expect([...fake.envs]).toEqual(['testenv']);
    });

    it('should pass the configured Python version, channel and manifest', async () => {
      const { fake, run } = setup();

      await run({
        ...CONFIG,
        pythonVersion: '3.9',
        channel: 'conda-forge',
        requirementsPath: '/elsewhere/reqs.txt',
      });

      expect(fake.commandLines()).toContain('conda create --yes --name testenv python=3.9');
      expect(fake.commandLines()).toContain('conda config --add channels conda-forge');
      expect(fake.commandLines()).toContain('pip install -r /elsewhere/reqs.txt');
    });

    it('should run pip in the project directory with the environment activated', async () => {
      const { fake, run } = setup();

      await run();

      const install = callFor(fake, 'pip install .');
      expect(install?.options.cwd).toBe('/project');
      expect(install?.options.env?.CONDA_PREFIX).toBe(prefixOf('testenv'));
      expect(install?.options.env?.CONDA_DEFAULT_ENV).toBe('testenv');
      expect(install?.options.env?.PATH).toBe(
        `${prefixOf('testenv')}/bin:${ROOT_PREFIX}/bin:${ROOT_PREFIX}/condabin:/usr/bin`
      );
    });

    it('should capture conda info output and stream everything else', async () => {
      const { fake, run } = setup();

      await run();

      expect(fake.calls.map((call) => call.options.capture ?? false)).toEqual([
        true,
        false,
        false,
        true,
        false,
        false,
        false,
      ]);
    });
  });

  describe('deactivation', () => {
    it('should deactivate when the environment is active', async () => {
      const env: NodeJS.ProcessEnv = {
        PATH: `${prefixOf('testenv')}/bin:${ROOT_PREFIX}/condabin:/usr/bin`,
        CONDA_EXE,
        CONDA_PREFIX: prefixOf('testenv'),
        CONDA_PREFIX_1: ROOT_PREFIX,
        CONDA_DEFAULT_ENV: 'testenv',
        CONDA_SHLVL: '2',
      };
      const { fake, run } = setup({ existing: ['testenv'], activeEnv: 'testenv' }, { env });

      await run();

      const remove = callFor(fake, 'conda remove -y -n testenv --all');
      expect(remove?.options.env).toEqual({
        PATH: `${ROOT_PREFIX}/condabin:/usr/bin`,
        CONDA_EXE,
      });
    });

    it('should leave the environment alone when the name is unknown', async () => {
      const { fake, run } = setup();

      await run();

      const remove = callFor(fake, 'conda remove -y -n testenv --all');
      expect(remove?.options.env).toEqual(BASE_ENV);
    });

    it('should continue when conda info fails', async () => {
      const { fake, run } = setup({
        override: (line) =>
          line === 'conda info --json' && fake.calls.length === 1
            ? { code: 1, stdout: '', stderr: 'CondaError' }
            : undefined,
      });

      const updates = await run();

      expect(lastOf(updates).step).toBe('complete');
    });

    it('should continue when conda info prints something unexpected', async () => {
      const { fake, run } = setup({
        override: (line) =>
          line === 'conda info --json' && fake.calls.length === 1
            ? { code: 0, stdout: 'not json', stderr: '' }
            : undefined,
      });

      const updates = await run();

      expect(lastOf(updates).step).toBe('complete');
    });
  });

  describe('suppressed failures', () => {
    it('should treat deactivation and removal as best-effort', () => {
      expect(STEP_POLICIES.deactivating).toBe('suppressed');
      expect(STEP_POLICIES.removing).toBe('suppressed');
    });

    it('should continue when removal fails because nothing exists', async () => {
      const { fake, run } = setup();

      const updates = await run();

      // The fake reports EnvironmentLocationNotFound for a missing environment
      expect(fake.commandLines()).toContain('conda create --yes --name testenv python=3.7');
      expect(lastOf(updates).step).toBe('complete');
    });

    it('should continue when removal cannot be started', async () => {
      const { run } = setup({
        override: (line) => {
          if (line.startsWith('conda remove')) {
            throw new CommandError('Failed to run conda: spawn EACCES', CONDA_EXE);
          }
          return undefined;
        },
      });

      const updates = await run();

      expect(updates.some((u) => u.step === 'error')).toBe(false);
      expect(lastOf(updates).step).toBe('complete');
    });
  });

  describe('fatal failures', () => {
    it('should stop after a failed create without configuring or installing', async () => {
      const { fake, run } = setup({
        override: (line) =>
          line.startsWith('conda create')
            ? { code: 1, stdout: '', stderr: 'PackagesNotFoundError: python=2.0' }
            : undefined,
      });

      const updates = await run();

      expect(lastOf(updates)).toMatchObject({
        step: 'error',
        message: 'Environment creation failed',
        failedStep: 'creating',
        exitCode: 1,
      });
      expect(lastOf(updates).detail).toBeUndefined();
      expect(fake.commandLines()).toEqual([
        'conda info --json',
        'conda remove -y -n testenv --all',
        'conda create --yes --name testenv python=3.7',
      ]);
    });

    it('should stop after a failed channel configuration', async () => {
      const { fake, run } = setup({
        override: (line) =>
          line.startsWith('conda config') ? { code: 3, stdout: '', stderr: '' } : undefined,
      });

      const updates = await run();

      expect(lastOf(updates)).toMatchObject({ failedStep: 'configuring-channel', exitCode: 3 });
      expect(fake.commandLines().some((line) => line.startsWith('pip'))).toBe(false);
    });

    it("should pass a missing manifest to pip and report pip's exit status", async () => {
      const { fake, run } = setup({
        override: (line) =>
          line === 'pip install -r /project/missing.txt'
            ? { code: 1, stdout: '', stderr: 'ERROR: Could not open requirements file' }
            : undefined,
      });

      const updates = await run({ ...CONFIG, requirementsPath: '/project/missing.txt' });

      expect(lastOf(updates)).toMatchObject({ failedStep: 'installing-deps', exitCode: 1 });
      expect(fake.commandLines()).not.toContain('pip install .');
    });

    it('should report a failed project install', async () => {
      const { run } = setup({
        override: (line) =>
          line === 'pip install .' ? { code: 1, stdout: '', stderr: 'no setup.py' } : undefined,
      });

      const updates = await run();

      expect(lastOf(updates)).toMatchObject({
        step: 'error',
        message: 'Project installation failed',
        failedStep: 'installing-project',
        exitCode: 1,
      });
      expect(updates[updates.length - 2].step).toBe('installing-project');
    });

    it('should report 127 when pip cannot be started', async () => {
      const { run } = setup({
        override: (line) => {
          if (line.startsWith('pip install -r')) {
            throw new CommandError('Failed to run pip: spawn ENOENT', 'pip');
          }
          return undefined;
        },
      });

      const updates = await run();

      expect(lastOf(updates)).toMatchObject({
        failedStep: 'installing-deps',
        exitCode: 127,
        detail: 'Failed to run pip: spawn ENOENT',
      });
    });
  });

  describe('activation', () => {
    it('should fail when the new environment cannot be found', async () => {
      const { fake, run } = setup({
        override: (line) =>
          line === 'conda info --json' && fake.calls.length > 1
            ? {
                code: 0,
                stdout: JSON.stringify({ root_prefix: ROOT_PREFIX, envs: [ROOT_PREFIX] }),
                stderr: '',
              }
            : undefined,
      });

      const updates = await run();

      expect(lastOf(updates)).toEqual({
        step: 'error',
        message: 'Environment activation failed',
        failedStep: 'activating',
        exitCode: 1,
        detail: 'Environment testenv not found after creation',
        timestamp: expect.any(String),
      });
      expect(fake.commandLines()).not.toContain('conda config --add channels bioconda');
    });

    it('should fail when pip is missing from the new environment', async () => {
      const { run } = setup(
        {},
        { pathExists: async (filePath) => !filePath.endsWith('/bin/pip') }
      );

      const updates = await run();

      expect(lastOf(updates)).toMatchObject({
        failedStep: 'activating',
        exitCode: 1,
        detail: `pip not found in environment: ${prefixOf('testenv')}/bin/pip`,
      });
    });

    it('should fail when Python is missing from the new environment', async () => {
      const { run } = setup(
        {},
        { pathExists: async (filePath) => !filePath.endsWith('/bin/python') }
      );

      const updates = await run();

      expect(lastOf(updates).detail).toBe(
        `Python executable not found in environment: ${prefixOf('testenv')}/bin/python`
      );
    });
  });

  describe('conda detection', () => {
    it('should stop before any command when conda is missing', async () => {
      const { fake, run } = setup(
        {},
        {
          resolveConda: async () => {
            throw new CondaNotFoundError('No conda installation found');
          },
        }
      );

      const updates = await run();

      expect(updates).toHaveLength(2);
      expect(lastOf(updates)).toMatchObject({
        step: 'error',
        failedStep: 'detecting',
        exitCode: 127,
        detail: 'No conda installation found',
      });
      expect(fake.calls).toHaveLength(0);
    });

    it('should pass an explicit conda path to the resolver', async () => {
      const resolveConda = vi.fn(async () => CONDA_INSTALLATION);
      const { run } = setup({}, { resolveConda });

      await run({ ...CONFIG, condaExe: '/custom/bin/conda' });

      expect(resolveConda).toHaveBeenCalledWith('/custom/bin/conda');
    });
  });
});
