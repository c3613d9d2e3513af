#!/usr/bin/env node
/**
 * esprun - CLI
 * Build the bootloader, kernel and user-space modules, deploy them to an ESP
 * directory and boot it in QEMU.
 */

import { Command, InvalidArgumentError } from 'commander';
import { resolve, dirname } from 'path';
import { existsSync } from 'fs';
import { Pipeline, pipelineExitCode } from './builder.js';
import { BuildConfigBuilder, loadProjectSettings, type RunOptions } from './config.js';
import { createBuildEnvironment } from './env.js';
import { EsprunError } from './errors.js';
import { processRunner } from './exec.js';
import { logger } from './logger.js';
import { cleanDeployment, listUserModules } from './steps/index.js';

interface CliOptions extends RunOptions {
  root?: string;
}

// Find project root (go up until we find kernel/ and bootloader/)
function findProjectRoot(explicit?: string): string {
  if (explicit) {
    return resolve(explicit);
  }

  let dir = process.cwd();

  while (dir !== dirname(dir)) {
    if (existsSync(resolve(dir, 'kernel')) && existsSync(resolve(dir, 'bootloader'))) {
      return dir;
    }
    dir = dirname(dir);
  }

  // Fallback to current directory
  return process.cwd();
}

function parseCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Not a positive integer.');
  }
  return parsed;
}

/**
 * Log an error as one line and return the exit code for it
 */
function reportError(error: unknown, verbose: boolean): number {
  const message = error instanceof Error ? error.message : String(error);
  logger.error(message);

  if (verbose && error instanceof Error && error.stack) {
    console.error(error.stack);
  }

  return error instanceof EsprunError ? error.exitCode : 1;
}

async function runPipeline(options: CliOptions): Promise<number> {
  const projectRoot = findProjectRoot(options.root);
  const verbose = options.verbose ?? false;

  try {
    const settings = await loadProjectSettings(projectRoot);
    const config = BuildConfigBuilder.fromOptions(settings, options).build();
    const env = createBuildEnvironment(projectRoot, settings, config.buildType);

    const pipeline = new Pipeline({ env, config, runner: processRunner });
    return pipelineExitCode(await pipeline.run());
  } catch (error) {
    return reportError(error, verbose);
  }
}

const program = new Command();

program
  .name('esprun')
  .description('Build, deploy and boot a UEFI kernel image in QEMU')
  .version('1.0.0')
  .showHelpAfterError('(use "esprun --help" for available options)')
  .configureOutput({
    outputError: (str, write) => write(`\x1b[31mError:\x1b[0m ${str}`)
  });

program
  .option('--root <dir>', 'OS project root (default: nearest directory with kernel/ and bootloader/)')
  .option('-v, --verbose', 'Increase output verbosity')
  .option('-n, --norun', 'Only build and deploy, don\'t run')
  .option('-r, --release', 'Do a release build')
  .option('-f, --kfeatures <features...>', 'Cargo features to enable in the kernel')
  .option('-u, --ufeatures <features...>', 'Cargo features to enable in user-space (module:feature for a single module)')
  .option('-m, --mods <mods...>', 'User-space modules to build and deploy (default: from config/build.yaml)')
  .option('-c, --cmd <cmdline>', 'Command line passed to the kernel')
  .option('-t, --machine <machine>', 'Machine to run on', 'qemu')
  .option('-q, --qemu-settings <settings>', 'Extra QEMU arguments (replaces the default memory size)')
  .option('-a, --qemu-nodes <n>', 'Number of NUMA nodes (qemu)', parseCount)
  .option('-s, --qemu-cores <n>', 'Number of cores, divided across nodes (qemu)', parseCount)
  .option('-d, --qemu-debug-cpu', 'Debug CPU resets (qemu)')
  .option('-o, --qemu-monitor', 'Launch the QEMU monitor on telnet (qemu)')
  .action(async (options: CliOptions) => {
    process.exit(await runPipeline(options));
  });

program
  .command('modules')
  .description('List user-space modules available under usr/')
  .option('--root <dir>', 'OS project root')
  .action(async (options: { root?: string }) => {
    const projectRoot = findProjectRoot(options.root);
    try {
      const settings = await loadProjectSettings(projectRoot);
      await listUserModules(createBuildEnvironment(projectRoot, settings, 'debug'));
      process.exit(0);
    } catch (error) {
      process.exit(reportError(error, false));
    }
  });

program
  .command('clean')
  .description('Remove deployed ESP directories')
  .option('--root <dir>', 'OS project root')
  .action(async (options: { root?: string }) => {
    const projectRoot = findProjectRoot(options.root);
    try {
      const settings = await loadProjectSettings(projectRoot);
      const result = await cleanDeployment(createBuildEnvironment(projectRoot, settings, 'debug'));
      process.exit(result.success ? 0 : 1);
    } catch (error) {
      process.exit(reportError(error, false));
    }
  });

await program.parseAsync();
