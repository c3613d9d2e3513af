/**
 * esprun - Kernel Exit Codes
 *
 * The kernel reports its outcome through QEMU's isa-debug-exit device, which
 * makes QEMU exit with status (code << 1) | 1. Shifting the raw status right
 * by one recovers the kernel's code.
 */

import { logger } from './logger.js';
import type { LaunchResult } from './types.js';

export type KernelOutcome =
  | 'Success'
  | 'ReturnFromMain'
  | 'Panic'
  | 'OutOfMemory'
  | 'UnexpectedInterrupt'
  | 'GeneralProtectionFault'
  | 'PageFault'
  | 'UnexpectedTestExitCode'
  | 'InitException'
  | 'UnrecoverableError';

export interface ExitOutcome {
  kind: KernelOutcome | 'Unknown';
  code: number;
  message: string;
}

const EXIT_CODES = new Map<number, { kind: KernelOutcome; message: string }>([
  [0, { kind: 'Success', message: '[SUCCESS]' }],
  [1, { kind: 'ReturnFromMain', message: '[FAIL] ReturnFromMain: kernel main() returned to the architecture-independent entry.' }],
  [2, { kind: 'Panic', message: '[FAIL] Kernel panic.' }],
  [3, { kind: 'OutOfMemory', message: '[FAIL] Out of memory.' }],
  [4, { kind: 'UnexpectedInterrupt', message: '[FAIL] Unexpected interrupt.' }],
  [5, { kind: 'GeneralProtectionFault', message: '[FAIL] General protection fault.' }],
  [6, { kind: 'PageFault', message: '[FAIL] Unexpected page fault.' }],
  [7, { kind: 'UnexpectedTestExitCode', message: '[FAIL] A user-space test exited with an unexpected code.' }],
  [8, { kind: 'InitException', message: '[FAIL] Exception during kernel initialization.' }],
  [9, { kind: 'UnrecoverableError', message: '[FAIL] Unrecoverable error (machine check or double fault).' }],
]);

/**
 * Map a raw QEMU process status to the kernel outcome
 */
export function translateExitStatus(status: number): ExitOutcome {
  const code = status >> 1;
  const known = EXIT_CODES.get(code);

  if (known) {
    return { kind: known.kind, code, message: known.message };
  }

  return {
    kind: 'Unknown',
    code,
    message: `[FAIL] Kernel exited with unknown error status ${code}; the exit code table needs updating.`,
  };
}

/**
 * Print the outcome; failures also show the invocation and captured stderr
 */
export function reportOutcome(
  outcome: ExitOutcome,
  launch: Extract<LaunchResult, { kind: 'exited' }>
): void {
  if (outcome.kind === 'Success') {
    logger.success(outcome.message);
    return;
  }

  logger.error(outcome.message);
  logger.info(`Invocation was: ${launch.invocation}`);
  if (launch.stderr.length > 0) {
    console.error(`STDERR: ${launch.stderr}`);
  }
}
