/**
 * esprun - Runtime Library Builder
 * Static runtime support library linked into user-space programs
 */

import { join } from 'path';
import { logger } from '../logger.js';
import { runToolchain, toolchainInvocation } from '../exec.js';
import type { BuildStepResult, StepContext } from '../types.js';

export async function buildRuntimeLibrary({ env, config, runner }: StepContext): Promise<BuildStepResult> {
  const { runtime } = env.settings;
  logger.step(`Build user-space lib ${runtime.name}`);

  // User-space target descriptors live in usr/
  const invocation = toolchainInvocation(env.settings.toolchain, config, {
    cwd: join(env.libDir, runtime.name),
    target: env.settings.targets.user,
    targetPath: env.usrDir,
    features: runtime.features,
  });

  const result = await runToolchain(runner, invocation, config.verbose);

  if (!result.success) {
    logger.toolFailure(`Failed to build ${runtime.name}`, { stdout: result.output, stderr: result.error });
  }

  return result;
}
