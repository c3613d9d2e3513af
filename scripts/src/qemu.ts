/**
 * esprun - QEMU Launch
 * Builds the emulator command line, provisions the tap device and runs one session
 */

import { existsSync } from 'fs';
import { join } from 'path';
import { userInfo } from 'os';
import { logger } from './logger.js';
import { LaunchError } from './errors.js';
import {
  DEFAULT_MACHINE,
  type BuildConfig,
  type BuildEnvironment,
  type CommandRunner,
  type EspLayout,
  type LaunchResult,
  type LaunchSpec,
  type StepContext,
  type TapSettings,
} from './types.js';

// Read-only UEFI firmware images, expected next to the bootloader sources
export const FIRMWARE_IMAGES = ['OVMF_CODE.fd', 'OVMF_VARS.fd'] as const;

// isa-debug-exit port the kernel writes its exit code to
export const DEBUG_EXIT_IOBASE = '0xf4';
export const DEBUG_EXIT_IOSIZE = '0x04';

export function firmwarePaths(env: BuildEnvironment): string[] {
  return FIRMWARE_IMAGES.map(image => join(env.bootloaderDir, image));
}

/**
 * Split a --qemu-settings string on whitespace
 */
export function tokenizeSettings(settings: string): string[] {
  return settings.split(/\s+/).filter(token => token.length > 0);
}

/**
 * Emulator argument vector for one run
 */
export function qemuArgs(env: BuildEnvironment, config: BuildConfig, espDir: string = env.espDir): string[] {
  const qemu = env.settings.qemu;

  const args = ['-no-reboot'];

  // KVM and the guest CPU features the kernel relies on
  args.push('-enable-kvm');
  args.push('-cpu', qemu.cpu);

  // Headless, serial on the terminal
  args.push('-display', 'none', '-serial', 'stdio');

  for (const image of firmwarePaths(env)) {
    args.push('-drive', `if=pflash,format=raw,file=${image},readonly=on`);
  }

  args.push('-device', 'ahci,id=ahci,multifunction=on');
  args.push('-drive', `if=none,format=raw,file=fat:rw:${espDir},id=esp`);
  args.push('-device', 'ide-hd,bus=ahci.0,drive=esp');

  args.push('-device', `isa-debug-exit,iobase=${DEBUG_EXIT_IOBASE},iosize=${DEBUG_EXIT_IOSIZE}`);

  args.push('-net', 'nic,model=e1000,netdev=n0');
  args.push('-netdev', `tap,id=n0,script=no,ifname=${qemu.tap.name}`);

  if (config.qemu.cores !== undefined || config.qemu.nodes !== undefined) {
    const sockets = config.qemu.nodes ?? 1;
    const cores = config.qemu.cores ?? sockets;
    args.push('-smp', `${cores},sockets=${sockets}`);
  }

  if (config.qemu.debugCpu) {
    args.push('-d', 'int,cpu_reset');
  }

  if (config.qemu.monitor) {
    args.push('-monitor', qemu.monitor);
  }

  // An override string replaces the default memory size
  if (config.qemu.settings) {
    args.push(...tokenizeSettings(config.qemu.settings));
  } else {
    args.push('-m', String(qemu.memory));
  }

  return args;
}

export function createLaunchSpec(env: BuildEnvironment, config: BuildConfig, layout: EspLayout): LaunchSpec {
  return {
    command: env.settings.qemu.binary,
    args: qemuArgs(env, config, layout.root),
    firmware: firmwarePaths(env),
    tap: env.settings.qemu.tap,
  };
}

/**
 * Create the tap device if it is absent and (re)assign its address
 */
export async function provisionTap(
  runner: CommandRunner,
  tap: TapSettings,
  sysNetDir: string
): Promise<void> {
  if (existsSync(join(sysNetDir, tap.name))) {
    logger.info(`Reusing tap interface ${tap.name}`);
  } else {
    const user = userInfo().username;
    const group = await runner.run('id', ['-gn']);
    if (group.exitCode !== 0) {
      throw new LaunchError(`Could not determine group of ${user}: ${group.stderr.trim()}`);
    }

    const created = await runner.run('sudo', ['tunctl', '-t', tap.name, '-u', user, '-g', group.stdout.trim()]);
    if (created.exitCode !== 0) {
      throw new LaunchError(`Failed to create tap interface ${tap.name}: ${created.stderr.trim()}`);
    }
  }

  const assigned = await runner.run('sudo', ['ifconfig', tap.name, tap.zone]);
  if (assigned.exitCode !== 0) {
    throw new LaunchError(`Failed to assign ${tap.zone} to ${tap.name}: ${assigned.stderr.trim()}`);
  }
}

/**
 * Run the deployed system on the configured machine
 */
export async function launch({ env, config, runner }: StepContext, layout: EspLayout): Promise<LaunchResult> {
  if (config.machine !== DEFAULT_MACHINE) {
    logger.error(`Machine ${config.machine} not supported`);
    return { kind: 'unsupported', machine: config.machine };
  }

  logger.step('Starting QEMU');

  const spec = createLaunchSpec(env, config, layout);

  const missing = spec.firmware.filter(image => !existsSync(image));
  if (missing.length > 0) {
    throw new LaunchError(`UEFI firmware image not found: ${missing.join(', ')}`);
  }

  await provisionTap(runner, spec.tap, env.sysNetDir);

  const result = await runner.runForeground(spec.command, spec.args, { cwd: env.invocationDir });
  if (result.startError !== undefined) {
    throw new LaunchError(result.startError);
  }

  return {
    kind: 'exited',
    status: result.exitCode,
    stderr: result.stderr,
    invocation: [spec.command, ...spec.args].join(' '),
  };
}
