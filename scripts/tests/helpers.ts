import { mkdtemp, mkdir, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import { DEFAULT_SETTINGS } from '../src/config.js';
import { createBuildEnvironment } from '../src/env.js';
import type {
  BuildConfig,
  BuildEnvironment,
  CommandResult,
  CommandRunner,
  ExecOptions,
  ForegroundResult,
} from '../src/types.js';

export interface RecordedCall {
  command: string;
  args: string[];
  options: ExecOptions;
  foreground: boolean;
}

type Matcher = (call: RecordedCall) => boolean;

/**
 * In-process stand-in for external commands; records every call
 */
export class FakeRunner implements CommandRunner {
  readonly calls: RecordedCall[] = [];
  private readonly responses: { match: Matcher; result: Partial<CommandResult> }[] = [];
  foreground: ForegroundResult = { stderr: '', exitCode: 0 };

  respond(match: Matcher, result: Partial<CommandResult>): this {
    this.responses.push({ match, result });
    return this;
  }

  async run(command: string, args: readonly string[], options: ExecOptions = {}): Promise<CommandResult> {
    const call: RecordedCall = { command, args: [...args], options, foreground: false };
    this.calls.push(call);
    const response = this.responses.find(r => r.match(call));
    return { stdout: '', stderr: '', exitCode: 0, ...response?.result };
  }

  async runForeground(command: string, args: readonly string[], options: ExecOptions = {}): Promise<ForegroundResult> {
    this.calls.push({ command, args: [...args], options, foreground: true });
    return this.foreground;
  }

  callsTo(command: string): RecordedCall[] {
    return this.calls.filter(call => call.command === command);
  }
}

export async function createTmpDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'esprun-test-'));
}

export async function writeFileDeep(path: string, content: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content);
}

/**
 * Project root and invocation directory under a fresh tmpdir
 */
export async function createTestEnvironment(): Promise<BuildEnvironment> {
  const base = await createTmpDir();
  const root = join(base, 'project');
  const invocationDir = join(base, 'cwd');
  await mkdir(root, { recursive: true });
  await mkdir(invocationDir, { recursive: true });

  return {
    ...createBuildEnvironment(root, DEFAULT_SETTINGS, 'debug', invocationDir),
    sysNetDir: join(base, 'sys-class-net'),
  };
}

/**
 * Lay out the artifacts the build stages would produce
 */
export async function writeBuildOutputs(env: BuildEnvironment, userBinaries: string[] = []): Promise<void> {
  await writeFileDeep(join(env.outputs.kernel.dir, env.settings.kernel.binary), 'kernel-image');
  await writeFileDeep(join(env.outputs.uefi.dir, env.settings.bootloader.binary), 'efi-image');
  for (const binary of userBinaries) {
    await writeFileDeep(join(env.outputs.user.dir, binary), `binary:${binary}`);
  }
}

/**
 * Empty stand-ins for the UEFI firmware images next to the bootloader sources
 */
export async function writeFirmware(env: BuildEnvironment): Promise<void> {
  for (const image of ['OVMF_CODE.fd', 'OVMF_VARS.fd']) {
    await writeFileDeep(join(env.bootloaderDir, image), '');
  }
}

export function testConfig(overrides: Partial<BuildConfig> = {}): BuildConfig {
  return {
    arch: 'x86_64',
    machine: 'qemu',
    buildType: 'debug',
    verbose: false,
    norun: false,
    kernelFeatures: [],
    userFeatures: { global: new Set(), scoped: new Map() },
    modules: ['init'],
    cmdline: '',
    qemu: { debugCpu: false, monitor: false },
    toolchainArgs: ['--color', 'always'],
    ...overrides,
  };
}
