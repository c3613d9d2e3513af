import { describe, it, expect } from 'vitest';
import { mkdir, readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { join } from 'path';
import { BUILD_STAGES, Pipeline, pipelineExitCode } from '../src/builder.js';
import { translateExitStatus } from '../src/exit-codes.js';
import { FakeRunner, createTestEnvironment, testConfig, writeBuildOutputs, writeFirmware } from './helpers.js';

describe('Pipeline', () => {
  it('builds in stage order and stops after deploying with norun', async () => {
    const env = await createTestEnvironment();
    await writeBuildOutputs(env, ['init']);
    await mkdir(join(env.usrDir, 'init'), { recursive: true });
    const runner = new FakeRunner();

    const result = await new Pipeline({ env, config: testConfig({ norun: true, cmdline: 'log=info' }), runner }).run();

    expect(result.kind).toBe('deployed');
    expect(runner.calls.map(call => call.options.cwd)).toEqual([
      env.bootloaderDir,
      env.kernelDir,
      join(env.libDir, 'vibrio'),
      join(env.usrDir, 'init'),
    ]);
    expect(runner.calls.some(call => call.foreground)).toBe(false);
    expect(await readFile(join(env.espDir, 'cmdline.in'), 'utf-8')).toBe('./kernel log=info');
  });

  it('launches after deploying and translates the exit status', async () => {
    const env = await createTestEnvironment();
    await writeBuildOutputs(env);
    await writeFirmware(env);
    await mkdir(join(env.sysNetDir, 'tap0'), { recursive: true });
    const runner = new FakeRunner();
    runner.foreground = { stderr: '', exitCode: 5 };

    const result = await new Pipeline({ env, config: testConfig(), runner }).run();

    expect(result).toMatchObject({ kind: 'ran', outcome: { kind: 'Panic', code: 2 } });
    expect(pipelineExitCode(result)).toBe(2);
    expect(runner.calls.filter(call => call.foreground).map(call => call.command)).toEqual(['qemu-system-x86_64']);
  });

  it('stops at the failing stage without deploying', async () => {
    const env = await createTestEnvironment();
    await writeBuildOutputs(env);
    const runner = new FakeRunner().respond(call => call.options.cwd === env.kernelDir, { exitCode: 101 });

    const result = await new Pipeline({ env, config: testConfig(), runner }).run();

    expect(result).toEqual({ kind: 'build-failed', stage: 'Building kernel', exitCode: 101 });
    expect(runner.calls).toHaveLength(2);
    expect(existsSync(env.espDir)).toBe(false);
  });
});

describe('BUILD_STAGES', () => {
  it('runs bootloader, kernel, runtime and user modules in order', () => {
    expect(BUILD_STAGES.map(stage => stage.name)).toEqual([
      'Building bootloader',
      'Building kernel',
      'Building runtime library',
      'Building user modules',
    ]);
  });
});

describe('pipelineExitCode', () => {
  const layout = { root: '/esp', bootEntry: '/esp/EFI/Boot/BootX64.efi', kernel: '/esp/kernel', cmdline: '/esp/cmdline.in', modules: [] };

  it('mirrors the toolchain exit code of a failed build', () => {
    expect(pipelineExitCode({ kind: 'build-failed', stage: 'Building kernel', exitCode: 101 })).toBe(101);
    expect(pipelineExitCode({ kind: 'build-failed', stage: 'Building kernel', exitCode: -1 })).toBe(1);
  });

  it('exits 0 after a deploy-only run and 99 for an unsupported machine', () => {
    expect(pipelineExitCode({ kind: 'deployed', layout })).toBe(0);
    expect(pipelineExitCode({ kind: 'unsupported', machine: 'baremetal' })).toBe(99);
  });

  it('uses the kernel outcome code after a run', () => {
    expect(pipelineExitCode({ kind: 'ran', layout, outcome: translateExitStatus(1) })).toBe(0);
    expect(pipelineExitCode({ kind: 'ran', layout, outcome: translateExitStatus(13) })).toBe(6);
    expect(pipelineExitCode({ kind: 'ran', layout, outcome: translateExitStatus(-1) })).toBe(1);
  });
});
