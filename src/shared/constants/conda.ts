/**
 * Bootstrap defaults
 */

export const DEFAULT_ENV_NAME = 'hcpenv';

export const DEFAULT_PYTHON_VERSION = '3.7';

// Needed to resolve some of the bioinformatics dependencies
export const DEFAULT_CHANNEL = 'bioconda';

export const DEFAULT_REQUIREMENTS_FILE = 'requirements.txt';

// Exit status a shell reports when a command cannot be found
export const COMMAND_NOT_FOUND_EXIT_CODE = 127;
