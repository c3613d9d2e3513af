import { describe, it, expect } from 'vitest';
import { mkdir } from 'fs/promises';
import { join } from 'path';
import {
  buildBootloader,
  buildKernel,
  buildRuntimeLibrary,
  buildUserModules,
  findUserModules,
} from '../src/steps/index.js';
import { parseUserFeatures } from '../src/features.js';
import { toolchainInvocation, runToolchain } from '../src/exec.js';
import { FakeRunner, createTestEnvironment, testConfig, writeFileDeep } from './helpers.js';

describe('toolchainInvocation', () => {
  it('orders target, package, features and default arguments', () => {
    const config = testConfig({ toolchainArgs: ['--color', 'always', '--release'] });
    const invocation = toolchainInvocation('xargo', config, {
      cwd: '/src/bootloader',
      target: 'x86_64-uefi',
      targetPath: '/src/bootloader',
      package: 'bootloader',
      features: ['a', 'b'],
    });

    expect(invocation).toEqual({
      command: 'xargo',
      target: 'x86_64-uefi',
      cwd: '/src/bootloader',
      env: { RUST_TARGET_PATH: '/src/bootloader' },
      args: [
        'build', '--target', 'x86_64-uefi',
        '--package', 'bootloader',
        '--features', 'a', '--features', 'b',
        '--color', 'always', '--release',
      ],
    });
  });
});

describe('runToolchain', () => {
  it('turns a nonzero exit into a failed result carrying the diagnostics', async () => {
    const runner = new FakeRunner().respond(() => true, { exitCode: 101, stderr: 'error[E0425]', stdout: 'Compiling' });
    const invocation = toolchainInvocation('xargo', testConfig(), { cwd: '/k', target: 't', targetPath: '/k' });

    const result = await runToolchain(runner, invocation);

    expect(result).toMatchObject({ success: false, exitCode: 101, error: 'error[E0425]', output: 'Compiling' });
  });
});

describe('build stages', () => {
  it('builds the bootloader in its own directory with its target descriptors', async () => {
    const env = await createTestEnvironment();
    const runner = new FakeRunner();

    const result = await buildBootloader({ env, config: testConfig(), runner });

    expect(result.success).toBe(true);
    expect(runner.calls).toEqual([{
      command: 'xargo',
      args: ['build', '--target', 'x86_64-uefi', '--package', 'bootloader', '--color', 'always'],
      options: { cwd: env.bootloaderDir, env: { RUST_TARGET_PATH: env.bootloaderDir } },
      foreground: false,
    }]);
  });

  it('passes kernel features verbatim and points at the arch target directory', async () => {
    const env = await createTestEnvironment();
    const runner = new FakeRunner();

    await buildKernel({ env, config: testConfig({ kernelFeatures: ['smp', 'test-pfault'] }), runner });

    const [call] = runner.calls;
    expect(call?.args).toEqual([
      'build', '--target', 'x86_64-kernel',
      '--features', 'smp', '--features', 'test-pfault',
      '--color', 'always',
    ]);
    expect(call?.options).toEqual({
      cwd: env.kernelDir,
      env: { RUST_TARGET_PATH: join(env.projectRoot, 'kernel', 'src', 'arch', 'x86_64') },
    });
  });

  it('builds the runtime library with its fixed features against the user target', async () => {
    const env = await createTestEnvironment();
    const runner = new FakeRunner();

    await buildRuntimeLibrary({ env, config: testConfig(), runner });

    expect(runner.calls[0]?.args).toEqual(['build', '--target', 'x86_64-kernel-none', '--features', 'rumprt', '--color', 'always']);
    expect(runner.calls[0]?.options).toEqual({
      cwd: join(env.libDir, 'vibrio'),
      env: { RUST_TARGET_PATH: env.usrDir },
    });
  });

  it('reports the toolchain exit code of a failed stage', async () => {
    const env = await createTestEnvironment();
    const runner = new FakeRunner().respond(() => true, { exitCode: 101, stderr: 'linker failed' });

    const result = await buildKernel({ env, config: testConfig(), runner });

    expect(result).toMatchObject({ success: false, exitCode: 101, error: 'linker failed' });
  });
});

describe('buildUserModules', () => {
  it('skips modules without a source directory', async () => {
    const env = await createTestEnvironment();
    await mkdir(join(env.usrDir, 'init'), { recursive: true });
    const runner = new FakeRunner();

    const result = await buildUserModules({ env, config: testConfig({ modules: ['missing', 'init'] }), runner });

    expect(result.success).toBe(true);
    expect(runner.calls.map(call => call.options.cwd)).toEqual([join(env.usrDir, 'init')]);
  });

  it('applies bare features to every module and scoped ones only to their module', async () => {
    const env = await createTestEnvironment();
    await mkdir(join(env.usrDir, 'init'), { recursive: true });
    await mkdir(join(env.usrDir, 'rkapps'), { recursive: true });
    const runner = new FakeRunner();
    const config = testConfig({
      modules: ['init', 'rkapps'],
      userFeatures: parseUserFeatures(['init:print-test', 'trace', 'ghost:leak']),
    });

    await buildUserModules({ env, config, runner });

    expect(runner.calls.map(call => call.args)).toEqual([
      ['build', '--target', 'x86_64-kernel-none', '--features', 'trace', '--features', 'print-test', '--color', 'always'],
      ['build', '--target', 'x86_64-kernel-none', '--features', 'trace', '--color', 'always'],
    ]);
    expect(runner.calls.flatMap(call => call.args)).not.toContain('leak');
    expect(runner.calls.every(call => call.options.env?.RUST_TARGET_PATH === env.usrDir)).toBe(true);
  });

  it('stops at the first module that fails', async () => {
    const env = await createTestEnvironment();
    await mkdir(join(env.usrDir, 'init'), { recursive: true });
    await mkdir(join(env.usrDir, 'rkapps'), { recursive: true });
    const runner = new FakeRunner().respond(call => call.options.cwd === join(env.usrDir, 'init'), { exitCode: 2 });

    const result = await buildUserModules({ env, config: testConfig({ modules: ['init', 'rkapps'] }), runner });

    expect(result).toMatchObject({ success: false, exitCode: 2 });
    expect(runner.calls).toHaveLength(1);
  });
});

describe('findUserModules', () => {
  it('reads package metadata from each module manifest', async () => {
    const env = await createTestEnvironment();
    await writeFileDeep(
      join(env.usrDir, 'init', 'Cargo.toml'),
      ['[package]', 'name = "init"', 'description = "First user process"', ''].join('\n')
    );
    await writeFileDeep(join(env.usrDir, 'rkapps', 'Cargo.toml'), ['[package]', 'name = "rkapps"', ''].join('\n'));
    await mkdir(join(env.usrDir, 'scratch'), { recursive: true });

    expect(await findUserModules(env)).toEqual([
      { name: 'init', package: 'init', description: 'First user process' },
      { name: 'rkapps', package: 'rkapps', description: undefined },
    ]);
  });

  it('returns nothing when usr/ does not exist', async () => {
    const env = await createTestEnvironment();
    expect(await findUserModules(env)).toEqual([]);
  });
});
