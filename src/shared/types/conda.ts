/**
 * Conda environment bootstrap types
 */

/**
 * Conda distribution type, derived from the installation path
 */
export type CondaDistributionType =
  | 'miniconda'
  | 'anaconda'
  | 'mambaforge'
  | 'miniforge'
  | 'unknown';

/**
 * Where a conda executable was found
 */
export type CondaSource = 'explicit' | 'env' | 'path' | 'search';

/**
 * A conda installation that answered `conda --version`
 */
export interface CondaInstallation {
  /** Base directory of the installation */
  path: string;
  condaExe: string;
  version: string;
  type: CondaDistributionType;
  source: CondaSource;
}

/**
 * The subset of `conda info --json` the bootstrapper reads
 */
export interface CondaInfo {
  activePrefix: string | null;
  activePrefixName: string | null;
  rootPrefix: string | null;
  envs: string[];
  condaVersion: string | null;
}

/**
 * Resolved configuration for one bootstrap run
 */
export interface BootstrapConfig {
  envName: string;
  pythonVersion: string;
  channel: string;
  /** Absolute path to the pip requirements manifest */
  requirementsPath: string;
  /** Directory installed with `pip install .` */
  projectDir: string;
  /** Explicit conda executable; auto-detected when omitted */
  condaExe?: string;
}

/**
 * Steps of the bootstrap sequence that invoke an external tool
 */
export type CommandStep =
  | 'deactivating'
  | 'removing'
  | 'creating'
  | 'activating'
  | 'configuring-channel'
  | 'installing-deps'
  | 'installing-project';

export type BootstrapStep = 'detecting' | CommandStep | 'complete' | 'error';

/**
 * How a failing step affects the run
 * - suppressed: logged at debug level, the run continues
 * - fatal: the run stops with the step's exit code
 */
export type StepPolicy = 'suppressed' | 'fatal';

/**
 * Progress update yielded by the bootstrapper
 */
export interface SetupProgress {
  step: BootstrapStep;
  message: string;
  detail?: string;
  progress?: number;
  timestamp: string;
  /** Set on 'error' events */
  failedStep?: Exclude<BootstrapStep, 'complete' | 'error'>;
  /** Set on 'error' events; the failing tool's exit status */
  exitCode?: number;
}
