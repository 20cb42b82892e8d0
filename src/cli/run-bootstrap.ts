/**
 * Drives the bootstrapper from the command line
 *
 * Progress becomes "INFO - <message>" lines. On failure the tool's own
 * diagnostics have already been streamed, so nothing is added unless the
 * failure has no tool output of its own (conda missing, prefix not found).
 */

import type { BootstrapConfig } from '../shared/types/conda';
import {
  bootstrapEnvironment,
  type BootstrapDependencies,
} from '../main/conda-env-bootstrapper';

export interface BootstrapReporter {
  info(message: string): void;
  error(message: string): void;
}

export const consoleReporter: BootstrapReporter = {
  info: (message) => console.log(`INFO - ${message}`),
  error: (message) => console.error(`[Bootstrap] ${message}`),
};

/**
 * @returns The process exit code for the run
 */
export async function runBootstrap(
  config: BootstrapConfig,
  deps: BootstrapDependencies = {},
  reporter: BootstrapReporter = consoleReporter
): Promise<number> {
  for await (const update of bootstrapEnvironment(config, deps)) {
    if (update.step === 'error') {
      if (update.detail) {
        reporter.error(update.detail);
      }
      return update.exitCode ?? 1;
    }
    reporter.info(update.message);
  }
  return 0;
}
