/**
 * esprun - Configuration
 *
 * Project settings come from config/build.yaml under the OS project root; any
 * section present there is merged over DEFAULT_SETTINGS. The per-run
 * BuildConfig is assembled once by BuildConfigBuilder and frozen.
 */

import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { join } from 'path';
import { parse as parseYaml } from 'yaml';
import { ConfigurationError } from './errors.js';
import { parseUserFeatures } from './features.js';
import {
  DEFAULT_MACHINE,
  type BootloaderSettings,
  type BuildConfig,
  type BuildType,
  type KernelSettings,
  type ModuleSettings,
  type ProjectSettings,
  type QemuOptions,
  type QemuSettings,
  type RuntimeSettings,
  type TapSettings,
  type TargetSettings,
} from './types.js';

export const DEFAULT_SETTINGS: ProjectSettings = {
  arch: 'x86_64',
  toolchain: 'xargo',
  targets: {
    uefi: 'x86_64-uefi',
    kernel: 'x86_64-kernel',
    user: 'x86_64-kernel-none',
  },
  kernel: {
    binary: 'kernel-elf',
  },
  bootloader: {
    package: 'bootloader',
    binary: 'bootloader.efi',
  },
  runtime: {
    name: 'vibrio',
    features: ['rumprt'],
  },
  modules: {
    default: ['init'],
    multiBinary: 'rkapps',
    multiBinaryExtension: '.bin',
  },
  qemu: {
    binary: 'qemu-system-x86_64',
    cpu: 'host,migratable=no,+invtsc,+tsc,+x2apic,+fsgsbase',
    memory: 1024,
    tap: {
      name: 'tap0',
      zone: '172.31.0.20/24',
    },
    monitor: 'telnet:127.0.0.1:55555,server,nowait',
  },
};

export function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

type FieldKind = 'string' | 'strings' | 'count' | 'mapping';

const TARGET_FIELDS = { uefi: 'string', kernel: 'string', user: 'string' } satisfies Record<keyof TargetSettings, FieldKind>;
const KERNEL_FIELDS = { binary: 'string' } satisfies Record<keyof KernelSettings, FieldKind>;
const BOOTLOADER_FIELDS = { package: 'string', binary: 'string' } satisfies Record<keyof BootloaderSettings, FieldKind>;
const RUNTIME_FIELDS = { name: 'string', features: 'strings' } satisfies Record<keyof RuntimeSettings, FieldKind>;
const MODULE_FIELDS = {
  default: 'strings',
  multiBinary: 'string',
  multiBinaryExtension: 'string',
} satisfies Record<keyof ModuleSettings, FieldKind>;
const QEMU_FIELDS = {
  binary: 'string',
  cpu: 'string',
  memory: 'count',
  tap: 'mapping',
  monitor: 'string',
} satisfies Record<keyof QemuSettings, FieldKind>;
const TAP_FIELDS = { name: 'string', zone: 'string' } satisfies Record<keyof TapSettings, FieldKind>;

function checkField(key: string, kind: FieldKind, value: unknown): void {
  switch (kind) {
    case 'string':
      if (typeof value !== 'string') {
        throw new ConfigurationError(`config/build.yaml: '${key}' must be a string`);
      }
      return;
    case 'strings':
      if (!Array.isArray(value) || !value.every(item => typeof item === 'string')) {
        throw new ConfigurationError(`config/build.yaml: '${key}' must be a list of strings`);
      }
      return;
    case 'count':
      if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
        throw new ConfigurationError(`config/build.yaml: '${key}' must be a positive integer`);
      }
      return;
    case 'mapping':
      if (!isMapping(value)) {
        throw new ConfigurationError(`config/build.yaml: '${key}' must be a mapping`);
      }
      return;
  }
}

/**
 * Merge one section over its defaults after checking every field it sets
 */
function mergeSection<T extends object>(
  name: string,
  base: T,
  override: unknown,
  fields: Readonly<Record<string, FieldKind>>
): T {
  if (override === undefined || override === null) {
    return base;
  }
  if (!isMapping(override)) {
    throw new ConfigurationError(`config/build.yaml: '${name}' must be a mapping`);
  }

  for (const [key, value] of Object.entries(override)) {
    if (!Object.hasOwn(fields, key)) {
      throw new ConfigurationError(`config/build.yaml: unknown setting '${name}.${key}'`);
    }
    checkField(`${name}.${key}`, fields[key], value);
  }
  return { ...base, ...override };
}

function scalarSetting(name: string, base: string, value: unknown): string {
  if (value === undefined || value === null) {
    return base;
  }
  if (typeof value !== 'string') {
    throw new ConfigurationError(`config/build.yaml: '${name}' must be a string`);
  }
  return value;
}

/**
 * Merge a parsed settings document over the defaults
 */
export function mergeSettings(base: ProjectSettings, document: unknown): ProjectSettings {
  if (document === undefined || document === null) {
    return base;
  }
  if (!isMapping(document)) {
    throw new ConfigurationError('config/build.yaml must contain a mapping');
  }

  const qemu = mergeSection('qemu', base.qemu, document.qemu, QEMU_FIELDS);
  const tapOverride = isMapping(document.qemu) ? document.qemu.tap : undefined;

  return {
    arch: scalarSetting('arch', base.arch, document.arch),
    toolchain: scalarSetting('toolchain', base.toolchain, document.toolchain),
    targets: mergeSection('targets', base.targets, document.targets, TARGET_FIELDS),
    kernel: mergeSection('kernel', base.kernel, document.kernel, KERNEL_FIELDS),
    bootloader: mergeSection('bootloader', base.bootloader, document.bootloader, BOOTLOADER_FIELDS),
    runtime: mergeSection('runtime', base.runtime, document.runtime, RUNTIME_FIELDS),
    modules: mergeSection('modules', base.modules, document.modules, MODULE_FIELDS),
    qemu: {
      ...qemu,
      tap: mergeSection('qemu.tap', base.qemu.tap, tapOverride, TAP_FIELDS),
    },
  };
}

/**
 * Load project settings from config/build.yaml (defaults when absent)
 */
export async function loadProjectSettings(projectRoot: string): Promise<ProjectSettings> {
  const configPath = join(projectRoot, 'config', 'build.yaml');

  if (!existsSync(configPath)) {
    return DEFAULT_SETTINGS;
  }

  const content = await readFile(configPath, 'utf-8');
  let document: unknown;
  try {
    document = parseYaml(content);
  } catch (error) {
    throw new ConfigurationError(`Failed to parse ${configPath}`, { cause: error });
  }
  return mergeSettings(DEFAULT_SETTINGS, document);
}

// =============================================================================
// Build configuration
// =============================================================================

// Options as they come from the command line
export interface RunOptions {
  verbose?: boolean;
  norun?: boolean;
  release?: boolean;
  kfeatures?: string[];
  ufeatures?: string[];
  mods?: string[];
  cmd?: string;
  machine?: string;
  qemuSettings?: string;
  qemuNodes?: number;
  qemuCores?: number;
  qemuDebugCpu?: boolean;
  qemuMonitor?: boolean;
}

const TOOLCHAIN_DEFAULT_ARGS = ['--color', 'always'];

function hasQemuOptions(qemu: QemuOptions): boolean {
  return qemu.settings !== undefined
    || qemu.nodes !== undefined
    || qemu.cores !== undefined
    || qemu.debugCpu
    || qemu.monitor;
}

function checkCount(name: string, value: number | undefined): void {
  if (value !== undefined && (!Number.isInteger(value) || value < 1)) {
    throw new ConfigurationError(`${name} must be a positive integer (got ${value})`);
  }
}

export class BuildConfigBuilder {
  private machine = DEFAULT_MACHINE;
  private buildType: BuildType = 'debug';
  private verbose = false;
  private norun = false;
  private kernelFeatures: string[] = [];
  private userFeatureTokens: string[] = [];
  private modules: string[];
  private cmdline = '';
  private qemu: QemuOptions = { debugCpu: false, monitor: false };

  constructor(private readonly settings: ProjectSettings) {
    this.modules = [...settings.modules.default];
  }

  static fromOptions(settings: ProjectSettings, options: RunOptions): BuildConfigBuilder {
    const builder = new BuildConfigBuilder(settings)
      .withMachine(options.machine ?? DEFAULT_MACHINE)
      .withRelease(options.release ?? false)
      .withVerbose(options.verbose ?? false)
      .withNorun(options.norun ?? false)
      .withKernelFeatures(options.kfeatures ?? [])
      .withUserFeatures(options.ufeatures ?? [])
      .withCmdline(options.cmd ?? '')
      .withQemu({
        settings: options.qemuSettings,
        nodes: options.qemuNodes,
        cores: options.qemuCores,
        debugCpu: options.qemuDebugCpu ?? false,
        monitor: options.qemuMonitor ?? false,
      });

    if (options.mods) {
      builder.withModules(options.mods);
    }
    return builder;
  }

  withMachine(machine: string): this {
    this.machine = machine;
    return this;
  }

  withRelease(release: boolean): this {
    this.buildType = release ? 'release' : 'debug';
    return this;
  }

  withVerbose(verbose: boolean): this {
    this.verbose = verbose;
    return this;
  }

  withNorun(norun: boolean): this {
    this.norun = norun;
    return this;
  }

  withKernelFeatures(features: readonly string[]): this {
    this.kernelFeatures = [...features];
    return this;
  }

  withUserFeatures(tokens: readonly string[]): this {
    this.userFeatureTokens = [...tokens];
    return this;
  }

  withModules(modules: readonly string[]): this {
    this.modules = [...modules];
    return this;
  }

  withCmdline(cmdline: string): this {
    this.cmdline = cmdline;
    return this;
  }

  withQemu(options: QemuOptions): this {
    this.qemu = { ...options };
    return this;
  }

  /**
   * Validate and freeze the configuration
   */
  build(): BuildConfig {
    if (this.machine !== DEFAULT_MACHINE) {
      if (hasQemuOptions(this.qemu)) {
        throw new ConfigurationError(`Can't specify QEMU specific arguments for machine '${this.machine}'`);
      }
      throw new ConfigurationError(`Machine '${this.machine}' not supported`);
    }

    checkCount('qemu-nodes', this.qemu.nodes);
    checkCount('qemu-cores', this.qemu.cores);

    const toolchainArgs = [...TOOLCHAIN_DEFAULT_ARGS];
    if (this.buildType === 'release') {
      toolchainArgs.push('--release');
    }
    if (this.verbose) {
      toolchainArgs.push('--verbose');
    }

    return Object.freeze({
      arch: this.settings.arch,
      machine: this.machine,
      buildType: this.buildType,
      verbose: this.verbose,
      norun: this.norun,
      kernelFeatures: Object.freeze([...new Set(this.kernelFeatures)]),
      userFeatures: parseUserFeatures(this.userFeatureTokens),
      modules: Object.freeze([...new Set(this.modules)]),
      cmdline: this.cmdline,
      qemu: Object.freeze({ ...this.qemu }),
      toolchainArgs: Object.freeze(toolchainArgs),
    });
  }
}
