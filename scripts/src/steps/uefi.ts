/**
 * esprun - UEFI Bootloader Builder
 */

import { logger } from '../logger.js';
import { runToolchain, toolchainInvocation } from '../exec.js';
import type { BuildStepResult, StepContext } from '../types.js';

/**
 * Build the UEFI bootloader against the target descriptors in bootloader/
 */
export async function buildBootloader({ env, config, runner }: StepContext): Promise<BuildStepResult> {
  logger.step('Build bootloader');

  const invocation = toolchainInvocation(env.settings.toolchain, config, {
    cwd: env.bootloaderDir,
    target: env.settings.targets.uefi,
    targetPath: env.bootloaderDir,
    package: env.settings.bootloader.package,
  });

  const result = await runToolchain(runner, invocation, config.verbose);

  if (!result.success) {
    logger.toolFailure('Failed to build bootloader', { stdout: result.output, stderr: result.error });
  }

  return result;
}
