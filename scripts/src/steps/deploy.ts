/**
 * esprun - ESP Deployment
 *
 * Rebuilds the EFI System Partition staging tree from scratch:
 *
 *   esp/EFI/Boot/BootX64.efi   bootloader
 *   esp/kernel                 kernel
 *   esp/<module>               user-space binaries
 *   esp/cmdline.in             kernel command line
 */

import { basename, join } from 'path';
import { copyFile, mkdir, rm, stat, writeFile } from 'fs/promises';
import { glob } from 'glob';
import { logger, type SummaryEntry } from '../logger.js';
import { getFileSize } from '../exec.js';
import { DeploymentError } from '../errors.js';
import type { EspLayout, StepContext } from '../types.js';

export const BOOT_ENTRY_PATH = ['EFI', 'Boot', 'BootX64.efi'] as const;
export const KERNEL_FILE = 'kernel';
export const CMDLINE_FILE = 'cmdline.in';

// Path the kernel finds itself under, relative to the ESP root
export const KERNEL_INVOCATION_PATH = `./${KERNEL_FILE}`;

/**
 * Content of cmdline.in; the command line is written without escaping
 */
export function cmdlineDescriptor(cmdline: string): string {
  return `${KERNEL_INVOCATION_PATH} ${cmdline}`;
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

async function requireArtifact(path: string, what: string): Promise<void> {
  if (!(await isFile(path))) {
    throw new DeploymentError(`${what} not found at ${path}`);
  }
}

/**
 * Binaries of the multi-binary module, sorted by name
 */
export async function findMultiBinaries(dir: string, extension: string): Promise<string[]> {
  const matches = await glob(`*${extension}`, { cwd: dir, nodir: true, absolute: true });
  return matches.sort();
}

// Entries at the ESP root that no module binary may replace
export const RESERVED_ESP_NAMES: ReadonlySet<string> = new Set([BOOT_ENTRY_PATH[0], KERNEL_FILE, CMDLINE_FILE]);

interface ModuleCopy {
  source: string;
  name: string;
}

/**
 * Resolve which module binaries get copied, before the old ESP is removed
 */
async function planModuleCopies({ env, config }: StepContext): Promise<ModuleCopy[]> {
  const userDir = env.outputs.user.dir;
  const { multiBinary, multiBinaryExtension } = env.settings.modules;
  const copies: ModuleCopy[] = [];

  for (const module of config.modules) {
    if (module === multiBinary) {
      for (const app of await findMultiBinaries(userDir, multiBinaryExtension)) {
        copies.push({ source: app, name: basename(app) });
      }
      continue;
    }

    const binary = join(userDir, module);
    if (await isFile(binary)) {
      copies.push({ source: binary, name: module });
    }
  }

  for (const { name } of copies) {
    if (RESERVED_ESP_NAMES.has(name)) {
      throw new DeploymentError(`Module binary '${name}' would replace a fixed ESP entry`);
    }
  }

  return copies;
}

/**
 * Deploy everything that got built to the ESP directory
 */
export async function deploy(ctx: StepContext): Promise<EspLayout> {
  const { env, config } = ctx;
  logger.step('Deploy binaries');

  const espDir = env.espDir;
  const bootEntry = join(espDir, ...BOOT_ENTRY_PATH);
  const kernelSrc = join(env.outputs.kernel.dir, env.settings.kernel.binary);
  const loaderSrc = join(env.outputs.uefi.dir, env.settings.bootloader.binary);

  await requireArtifact(kernelSrc, 'Kernel binary');
  await requireArtifact(loaderSrc, 'Bootloader binary');
  const copies = await planModuleCopies(ctx);

  try {
    await rm(espDir, { recursive: true, force: true });
    await mkdir(join(espDir, ...BOOT_ENTRY_PATH.slice(0, -1)), { recursive: true });

    const kernel = join(espDir, KERNEL_FILE);
    await copyFile(kernelSrc, join(env.invocationDir, env.settings.kernel.binary));
    await copyFile(kernelSrc, kernel);
    await copyFile(loaderSrc, bootEntry);

    const cmdline = join(espDir, CMDLINE_FILE);
    await writeFile(cmdline, cmdlineDescriptor(config.cmdline), 'utf-8');

    const modules: string[] = [];
    for (const copy of copies) {
      await copyFile(copy.source, join(espDir, copy.name));
      modules.push(copy.name);
    }

    return { root: espDir, bootEntry, kernel, cmdline, modules };
  } catch (error) {
    throw new DeploymentError(
      `Failed to assemble ESP at ${espDir}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }
}

/**
 * Log the deployed ESP contents with sizes
 */
export async function printDeploySummary(layout: EspLayout): Promise<void> {
  const artifacts: SummaryEntry[] = [
    { name: 'Boot entry', path: layout.bootEntry, size: await getFileSize(layout.bootEntry) },
    { name: 'Kernel', path: layout.kernel, size: await getFileSize(layout.kernel) },
    { name: 'Command line', path: layout.cmdline },
  ];

  for (const module of layout.modules) {
    const path = join(layout.root, module);
    artifacts.push({ name: module, path, size: await getFileSize(path) });
  }

  logger.summary(layout.root, artifacts);
}
