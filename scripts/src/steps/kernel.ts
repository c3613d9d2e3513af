/**
 * esprun - Kernel Builder
 */

import { logger } from '../logger.js';
import { runToolchain, toolchainInvocation } from '../exec.js';
import type { BuildStepResult, StepContext } from '../types.js';

export async function buildKernel({ env, config, runner }: StepContext): Promise<BuildStepResult> {
  logger.step(`Build kernel (${config.buildType})`);

  if (config.kernelFeatures.length > 0) {
    logger.info(`Enabled features: ${config.kernelFeatures.join(',')}`);
  }

  const invocation = toolchainInvocation(env.settings.toolchain, config, {
    cwd: env.kernelDir,
    target: env.settings.targets.kernel,
    targetPath: env.kernelTargetSpecDir,
    features: config.kernelFeatures,
  });

  const result = await runToolchain(runner, invocation, config.verbose);

  if (!result.success) {
    logger.toolFailure('Kernel compilation failed', { stdout: result.output, stderr: result.error });
  }

  return result;
}
