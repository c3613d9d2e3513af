/**
 * esprun - Errors
 *
 * Every error carries the process exit code the CLI should terminate with.
 */

// Exit status for invalid machine/flag combinations
export const CONFIGURATION_EXIT_CODE = 99;

export class EsprunError extends Error {
  constructor(
    readonly code: string,
    message: string,
    readonly exitCode: number = 1,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'EsprunError';
  }
}

// Rejected before any external process runs
export class ConfigurationError extends EsprunError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIGURATION', message, CONFIGURATION_EXIT_CODE, options);
    this.name = 'ConfigurationError';
  }
}

export class DeploymentError extends EsprunError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('DEPLOYMENT_FAILED', message, 1, options);
    this.name = 'DeploymentError';
  }
}

export class LaunchError extends EsprunError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('LAUNCH_FAILED', message, 1, options);
    this.name = 'LaunchError';
  }
}
