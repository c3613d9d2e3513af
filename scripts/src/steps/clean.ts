/**
 * esprun - Clean
 */

import { rm, stat } from 'fs/promises';
import { join } from 'path';
import { logger } from '../logger.js';
import { espDirFor } from '../env.js';
import type { BuildEnvironment, BuildStepResult, BuildType } from '../types.js';

const BUILD_TYPES: BuildType[] = ['debug', 'release'];

/**
 * Remove the ESP trees of both build modes and the kernel copy
 * in the invoking directory. Toolchain outputs are left alone.
 */
export async function cleanDeployment(env: BuildEnvironment): Promise<BuildStepResult> {
  logger.section('Cleaning Deployment');

  const startTime = Date.now();

  for (const buildType of BUILD_TYPES) {
    const espDir = espDirFor(env, buildType);
    logger.step(`Removing ${espDir}`);
    await rm(espDir, { recursive: true, force: true });
  }

  const kernelCopy = join(env.invocationDir, env.settings.kernel.binary);
  const kernelStat = await stat(kernelCopy).catch(() => null);
  if (kernelStat?.isFile()) {
    logger.step(`Removing ${kernelCopy}`);
    await rm(kernelCopy);
  }

  logger.success('Clean complete');

  return {
    success: true,
    duration: Date.now() - startTime,
  };
}
