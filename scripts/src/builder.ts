/**
 * esprun - Pipeline
 * Build, deploy and run, each stage depending on the previous one
 */

import { logger } from './logger.js';
import { timedStep } from './exec.js';
import { CONFIGURATION_EXIT_CODE } from './errors.js';
import { formatUserFeatures } from './features.js';
import { launch } from './qemu.js';
import { reportOutcome, translateExitStatus, type ExitOutcome } from './exit-codes.js';
import {
  buildBootloader,
  buildKernel,
  buildRuntimeLibrary,
  buildUserModules,
  deploy,
  printDeploySummary,
} from './steps/index.js';
import type { BuildStepResult, EspLayout, StepContext } from './types.js';

interface BuildStage {
  name: string;
  run: (ctx: StepContext) => Promise<BuildStepResult>;
}

// Run strictly in order; there is no parallelism between stages
export const BUILD_STAGES: readonly BuildStage[] = [
  { name: 'Building bootloader', run: buildBootloader },
  { name: 'Building kernel', run: buildKernel },
  { name: 'Building runtime library', run: buildRuntimeLibrary },
  { name: 'Building user modules', run: buildUserModules },
];

export type PipelineResult =
  | { kind: 'build-failed'; stage: string; exitCode: number }
  | { kind: 'deployed'; layout: EspLayout }
  | { kind: 'unsupported'; machine: string }
  | { kind: 'ran'; layout: EspLayout; outcome: ExitOutcome };

/**
 * Process exit code for a pipeline result
 */
export function pipelineExitCode(result: PipelineResult): number {
  switch (result.kind) {
    case 'build-failed':
      return result.exitCode > 0 ? result.exitCode : 1;
    case 'deployed':
      return 0;
    case 'unsupported':
      return CONFIGURATION_EXIT_CODE;
    case 'ran':
      return result.outcome.code >= 0 ? result.outcome.code : 1;
  }
}

export class Pipeline {
  constructor(private readonly ctx: StepContext) {}

  /**
   * Build all components; stops at the first failing stage
   */
  async build(): Promise<{ stage: string; result: BuildStepResult }> {
    const { config } = this.ctx;
    logger.info(`Modules: ${config.modules.join(', ') || '(none)'}`);

    const userFeatures = formatUserFeatures(config.userFeatures);
    if (userFeatures.length > 0) {
      logger.info(`User features: ${userFeatures.join(' ')}`);
    }

    let last: { stage: string; result: BuildStepResult } = {
      stage: 'build',
      result: { success: true, duration: 0 },
    };

    for (const stage of BUILD_STAGES) {
      const result = await timedStep(stage.name, () => stage.run(this.ctx));
      last = { stage: stage.name, result };
      if (!result.success) {
        break;
      }
    }

    return last;
  }

  async deploy(): Promise<EspLayout> {
    const layout = await deploy(this.ctx);
    await printDeploySummary(layout);
    return layout;
  }

  /**
   * Full pipeline: build, deploy and (unless norun) launch
   */
  async run(): Promise<PipelineResult> {
    logger.startRun();

    const built = await this.build();
    if (!built.result.success) {
      return { kind: 'build-failed', stage: built.stage, exitCode: built.result.exitCode };
    }

    const layout = await this.deploy();

    if (this.ctx.config.norun) {
      return { kind: 'deployed', layout };
    }

    const launched = await launch(this.ctx, layout);
    if (launched.kind === 'unsupported') {
      return { kind: 'unsupported', machine: launched.machine };
    }

    const outcome = translateExitStatus(launched.status);
    reportOutcome(outcome, launched);

    return { kind: 'ran', layout, outcome };
  }
}
