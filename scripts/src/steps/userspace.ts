/**
 * esprun - User-space Module Builder
 */

import { join } from 'path';
import { readFile, readdir } from 'fs/promises';
import { existsSync } from 'fs';
import { parse as parseToml } from '@iarna/toml';
import { logger } from '../logger.js';
import { runToolchain, toolchainInvocation } from '../exec.js';
import { featuresForModule, unmatchedFeatureModules } from '../features.js';
import { isMapping } from '../config.js';
import type { BuildEnvironment, BuildStepResult, StepContext } from '../types.js';

export interface UserModuleInfo {
  name: string;
  package?: string;
  description?: string;
}

/**
 * Build every selected user module that has a source directory under usr/
 */
export async function buildUserModules({ env, config, runner }: StepContext): Promise<BuildStepResult> {
  const startTime = Date.now();

  for (const module of unmatchedFeatureModules(config.userFeatures, config.modules)) {
    logger.info(`Features for module ${module} ignored, it is not part of this build`);
  }

  for (const module of config.modules) {
    const moduleDir = join(env.usrDir, module);

    if (!existsSync(moduleDir)) {
      logger.info(`User module ${module} not found, skipping.`);
      continue;
    }

    logger.step(`Build user-module ${module}`);

    const invocation = toolchainInvocation(env.settings.toolchain, config, {
      cwd: moduleDir,
      target: env.settings.targets.user,
      targetPath: env.usrDir,
      features: featuresForModule(config.userFeatures, module),
    });

    const result = await runToolchain(runner, invocation, config.verbose);

    if (!result.success) {
      logger.toolFailure(`Failed to build ${module}`, { stdout: result.output, stderr: result.error });
      return result;
    }
  }

  return {
    success: true,
    duration: Date.now() - startTime,
  };
}

async function readModuleManifest(manifestPath: string): Promise<Omit<UserModuleInfo, 'name'>> {
  const manifest = parseToml(await readFile(manifestPath, 'utf-8'));
  const pkg = manifest.package;

  if (!isMapping(pkg)) {
    return {};
  }

  return {
    package: typeof pkg.name === 'string' ? pkg.name : undefined,
    description: typeof pkg.description === 'string' ? pkg.description : undefined,
  };
}

/**
 * Discover user modules (directories under usr/ with a Cargo.toml)
 */
export async function findUserModules(env: BuildEnvironment): Promise<UserModuleInfo[]> {
  if (!existsSync(env.usrDir)) {
    return [];
  }

  const entries = await readdir(env.usrDir, { withFileTypes: true });
  const modules: UserModuleInfo[] = [];

  for (const entry of entries) {
    if (!entry.isDirectory()) continue;

    const manifestPath = join(env.usrDir, entry.name, 'Cargo.toml');
    if (!existsSync(manifestPath)) continue;

    try {
      modules.push({ name: entry.name, ...(await readModuleManifest(manifestPath)) });
    } catch (error) {
      logger.warn(`Could not parse ${manifestPath}: ${error instanceof Error ? error.message : String(error)}`);
      modules.push({ name: entry.name });
    }
  }

  return modules.sort((a, b) => a.name.localeCompare(b.name));
}

/**
 * List available user modules
 */
export async function listUserModules(env: BuildEnvironment): Promise<void> {
  const modules = await findUserModules(env);

  if (modules.length === 0) {
    logger.warn(`No user modules found in ${env.usrDir}`);
    return;
  }

  logger.info('Available user modules:');

  const { modules: moduleSettings } = env.settings;
  const rows = modules.map(m => {
    const notes: string[] = [];
    if (moduleSettings.default.includes(m.name)) notes.push('default');
    if (m.name === moduleSettings.multiBinary) notes.push(`multi-binary (*${moduleSettings.multiBinaryExtension})`);
    return [m.name, m.package ?? '-', m.description ?? '', notes.join(', ')];
  });

  logger.table(['Name', 'Package', 'Description', 'Notes'], rows);
}
