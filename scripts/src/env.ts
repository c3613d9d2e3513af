/**
 * esprun - Build Environment
 * Resolves source, output and ESP paths for one build mode
 */

import { join, resolve } from 'path';
import type { ArtifactSet, BuildEnvironment, BuildType, ProjectSettings } from './types.js';

function artifactSet(targetDir: string, target: string, buildType: BuildType): ArtifactSet {
  return {
    target,
    buildType,
    dir: join(targetDir, target, buildType),
  };
}

/**
 * Initialize build environment with all paths and settings
 */
export function createBuildEnvironment(
  projectRoot: string,
  settings: ProjectSettings,
  buildType: BuildType,
  invocationDir: string = process.cwd()
): BuildEnvironment {
  const root = resolve(projectRoot);
  const targetDir = join(root, 'target');
  const kernelDir = join(root, 'kernel');

  const outputs = {
    uefi: artifactSet(targetDir, settings.targets.uefi, buildType),
    kernel: artifactSet(targetDir, settings.targets.kernel, buildType),
    user: artifactSet(targetDir, settings.targets.user, buildType),
  };

  return {
    projectRoot: root,
    invocationDir: resolve(invocationDir),
    buildType,
    settings,

    bootloaderDir: join(root, 'bootloader'),
    kernelDir,
    kernelTargetSpecDir: join(kernelDir, 'src', 'arch', settings.arch),
    libDir: join(root, 'lib'),
    usrDir: join(root, 'usr'),
    targetDir,
    sysNetDir: '/sys/class/net',

    outputs,

    espDir: join(outputs.uefi.dir, 'esp'),
  };
}

/**
 * ESP directory for a build mode
 */
export function espDirFor(env: BuildEnvironment, buildType: BuildType): string {
  return join(env.targetDir, env.settings.targets.uefi, buildType, 'esp');
}
