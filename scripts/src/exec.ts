/**
 * esprun - Command Executor
 * Wraps execa for consistent command execution with logging
 */

import { execa } from 'execa';
import { stat } from 'fs/promises';
import { logger } from './logger.js';
import type {
  BuildConfig,
  BuildStepResult,
  CommandResult,
  CommandRunner,
  ExecOptions,
  ForegroundResult,
  ToolchainInvocation,
} from './types.js';

// Raw status reported for a process that ended on a signal
export const SIGNALED_STATUS = -1;

/**
 * execa's message for a process that never ran (no exit code, no signal)
 */
function startFailure(result: { failed: boolean; exitCode?: number; signal?: unknown }): string | undefined {
  if (!result.failed || result.exitCode !== undefined || result.signal) {
    return undefined;
  }
  return result instanceof Error ? result.message : 'process could not be started';
}

/**
 * Execute a command and capture its output
 */
export async function exec(
  command: string,
  args: readonly string[],
  options: ExecOptions = {}
): Promise<CommandResult> {
  const result = await execa(command, args, {
    cwd: options.cwd,
    env: { ...process.env, ...options.env },
    stdio: 'pipe',
    reject: false,
  });

  const startError = startFailure(result);

  return {
    stdout: String(result.stdout ?? ''),
    stderr: startError ?? String(result.stderr ?? ''),
    exitCode: result.exitCode ?? SIGNALED_STATUS,
  };
}

/**
 * Execute a command attached to the terminal; only stderr is captured
 */
export async function execForeground(
  command: string,
  args: readonly string[],
  options: ExecOptions = {}
): Promise<ForegroundResult> {
  const result = await execa(command, args, {
    cwd: options.cwd,
    env: { ...process.env, ...options.env },
    stdin: 'inherit',
    stdout: 'inherit',
    stderr: 'pipe',
    reject: false,
  });

  return {
    stderr: String(result.stderr ?? ''),
    exitCode: result.exitCode ?? SIGNALED_STATUS,
    startError: startFailure(result),
  };
}

export const processRunner: CommandRunner = {
  run: exec,
  runForeground: execForeground,
};

/**
 * Describe one toolchain build for a target
 */
export function toolchainInvocation(
  toolchain: string,
  config: BuildConfig,
  options: {
    cwd: string;
    target: string;
    targetPath: string;
    package?: string;
    features?: readonly string[];
  }
): ToolchainInvocation {
  const args = ['build', '--target', options.target];

  if (options.package) {
    args.push('--package', options.package);
  }

  for (const feature of options.features ?? []) {
    args.push('--features', feature);
  }

  args.push(...config.toolchainArgs);

  return {
    command: toolchain,
    target: options.target,
    cwd: options.cwd,
    // Scoped to this invocation only
    env: { RUST_TARGET_PATH: options.targetPath },
    args,
  };
}

/**
 * Run a toolchain invocation; a nonzero exit becomes a failed result
 */
export async function runToolchain(
  runner: CommandRunner,
  invocation: ToolchainInvocation,
  verbose: boolean = false
): Promise<BuildStepResult> {
  const startTime = Date.now();

  const result = await runner.run(invocation.command, invocation.args, {
    cwd: invocation.cwd,
    env: invocation.env,
  });

  const duration = Date.now() - startTime;

  if (result.exitCode !== 0) {
    return {
      success: false,
      duration,
      exitCode: result.exitCode,
      error: result.stderr,
      output: result.stdout,
    };
  }

  if (verbose) {
    logger.passthrough(result.stdout);
    logger.passthrough(result.stderr);
  }

  return {
    success: true,
    duration,
    output: result.stdout,
  };
}

/**
 * Get file size in human-readable format
 */
export async function getFileSize(path: string): Promise<string> {
  try {
    const stats = await stat(path);
    const bytes = stats.size;

    const units = ['B', 'KiB', 'MiB', 'GiB'];
    let size = bytes;
    let unitIndex = 0;

    while (size >= 1024 && unitIndex < units.length - 1) {
      size /= 1024;
      unitIndex++;
    }

    return `${size.toFixed(1)}${units[unitIndex]}`;
  } catch {
    return 'unknown';
  }
}

/**
 * Run one pipeline stage under a spinner and report how long it took
 */
export async function timedStep(
  name: string,
  fn: () => Promise<BuildStepResult>
): Promise<BuildStepResult> {
  logger.beginStage(name);

  try {
    const result = await fn();
    logger.endStage(result.success);
    return result;
  } catch (error) {
    logger.endStage(false);
    throw error;
  }
}
