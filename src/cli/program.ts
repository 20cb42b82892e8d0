import { Command } from 'commander';
import type { BootstrapConfig } from '../shared/types/conda';
import {
  DEFAULT_CHANNEL,
  DEFAULT_ENV_NAME,
  DEFAULT_PYTHON_VERSION,
  DEFAULT_REQUIREMENTS_FILE,
} from '../shared/constants/conda';
import { resolveBootstrapConfig, type BootstrapOptions } from '../main/bootstrap-config';
import { InvalidEnvironmentNameError } from '../main/bootstrap-errors';

export const INVALID_ARGUMENT_EXIT_CODE = 2;

/**
 * Build the command-line program
 *
 * @param run - Called with the resolved configuration
 * @param cwd - Directory relative paths are resolved against
 */
export function createProgram(
  run: (config: BootstrapConfig) => Promise<void>,
  cwd: string = process.cwd()
): Command {
  const program = new Command();

  program
    .name('conda-env-bootstrap')
    .description(
      'Recreate a conda environment with a pinned Python, then install the project and its requirements into it'
    )
    .argument('[name]', 'environment name', DEFAULT_ENV_NAME)
    .allowExcessArguments(false)
    .option('-p, --python <version>', 'Python version to pin', DEFAULT_PYTHON_VERSION)
    .option('-c, --channel <channel>', 'conda channel to register', DEFAULT_CHANNEL)
    .option(
      '-r, --requirements <file>',
      `pip requirements manifest (default: <project-dir>/${DEFAULT_REQUIREMENTS_FILE})`
    )
    .option('-d, --project-dir <dir>', 'project installed with pip install . (default: current directory)')
    .option('--conda <path>', 'conda executable (default: auto-detect)')
    .action(async (name: string, options: BootstrapOptions) => {
      let config: BootstrapConfig;
      try {
        config = resolveBootstrapConfig(name, options, cwd);
      } catch (err) {
        if (err instanceof InvalidEnvironmentNameError) {
          program.error(err.message, { exitCode: INVALID_ARGUMENT_EXIT_CODE });
        }
        throw err;
      }
      await run(config);
    });

  return program;
}
