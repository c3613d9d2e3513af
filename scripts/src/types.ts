/**
 * esprun - Shared Types
 *
 * Project settings are read from config/build.yaml under the OS project root
 * (optional, see config.ts for the defaults). Everything else is resolved once
 * from the command line into a frozen BuildConfig.
 */

// Build type
export type BuildType = 'debug' | 'release';

// The only machine target with a launch implementation
export const DEFAULT_MACHINE = 'qemu';

// =============================================================================
// Project settings (config/build.yaml)
// =============================================================================

export interface TargetSettings {
  uefi: string;
  kernel: string;
  user: string;
}

export interface KernelSettings {
  binary: string;  // file name of the linked kernel in its output directory
}

export interface BootloaderSettings {
  package: string;
  binary: string;
}

export interface RuntimeSettings {
  name: string;    // directory under lib/
  features: string[];
}

export interface ModuleSettings {
  default: string[];
  multiBinary: string;
  multiBinaryExtension: string;
}

export interface TapSettings {
  name: string;
  zone: string;  // address/prefix assigned to the host side
}

export interface QemuSettings {
  binary: string;
  cpu: string;
  memory: number;  // MiB, used when no --qemu-settings override is given
  tap: TapSettings;
  monitor: string;
}

export interface ProjectSettings {
  arch: string;
  toolchain: string;
  targets: TargetSettings;
  kernel: KernelSettings;
  bootloader: BootloaderSettings;
  runtime: RuntimeSettings;
  modules: ModuleSettings;
  qemu: QemuSettings;
}

// =============================================================================
// Resolved build configuration
// =============================================================================

export interface QemuOptions {
  settings?: string;
  nodes?: number;
  cores?: number;
  debugCpu: boolean;
  monitor: boolean;
}

// User-module features: bare tokens apply to every module, `module:feature`
// tokens only to the named module
export interface UserFeatures {
  global: ReadonlySet<string>;
  scoped: ReadonlyMap<string, ReadonlySet<string>>;
}

export interface BuildConfig {
  readonly arch: string;
  readonly machine: string;
  readonly buildType: BuildType;
  readonly verbose: boolean;
  readonly norun: boolean;
  readonly kernelFeatures: readonly string[];
  readonly userFeatures: UserFeatures;
  readonly modules: readonly string[];
  readonly cmdline: string;
  readonly qemu: Readonly<QemuOptions>;
  // Appended to every toolchain invocation (color, release, verbose)
  readonly toolchainArgs: readonly string[];
}

// =============================================================================
// Build environment
// =============================================================================

// Output directory of one target in one mode
export interface ArtifactSet {
  target: string;
  buildType: BuildType;
  dir: string;
}

export interface BuildEnvironment {
  projectRoot: string;
  invocationDir: string;
  buildType: BuildType;
  settings: ProjectSettings;

  bootloaderDir: string;
  kernelDir: string;
  kernelTargetSpecDir: string;
  libDir: string;
  usrDir: string;
  targetDir: string;
  sysNetDir: string;

  outputs: {
    uefi: ArtifactSet;
    kernel: ArtifactSet;
    user: ArtifactSet;
  };

  espDir: string;
}

// =============================================================================
// Process execution
// =============================================================================

// Command execution options
export interface ExecOptions {
  cwd?: string;
  env?: Record<string, string>;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface ForegroundResult {
  stderr: string;
  exitCode: number;
  // Set when the process could not be spawned at all
  startError?: string;
}

export interface CommandRunner {
  // Captures stdout and stderr
  run(command: string, args: readonly string[], options?: ExecOptions): Promise<CommandResult>;
  // Connects stdin/stdout to the terminal, captures stderr
  runForeground(command: string, args: readonly string[], options?: ExecOptions): Promise<ForegroundResult>;
}

export interface ToolchainInvocation {
  command: string;
  target: string;
  cwd: string;
  env: Record<string, string>;
  args: readonly string[];
}

// Build step result
export type BuildStepResult =
  | { success: true; duration: number; output?: string }
  | { success: false; duration: number; exitCode: number; error: string; output?: string };

export interface StepContext {
  env: BuildEnvironment;
  config: BuildConfig;
  runner: CommandRunner;
}

// =============================================================================
// Deployment and launch
// =============================================================================

export interface EspLayout {
  root: string;
  bootEntry: string;
  kernel: string;
  cmdline: string;
  modules: string[];  // file names copied to the ESP root
}

export interface LaunchSpec {
  command: string;
  args: string[];
  firmware: string[];  // checked before the emulator starts
  tap: TapSettings;
}

export type LaunchResult =
  | { kind: 'exited'; status: number; stderr: string; invocation: string }
  | { kind: 'unsupported'; machine: string };
