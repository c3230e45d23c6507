import { Command } from 'commander';
import { createLoopSpec, expectedUpdates, stepSizeForLoop, validate } from '@parloop/core';
import type { SamplingMode } from '@parloop/core';
import { ErrorHandler } from '../utils/error-handler.js';
import { StepSizeOptionsSchema } from '../utils/command-schemas.js';
import { OutputFormatter } from '../utils/cli-helpers.js';

export interface StepSizeReport {
  totalIterations: number;
  workers: number;
  mode: SamplingMode;
  stepSize: number;
  /** Iterations per reporting unit: the whole loop in global mode, one worker's share otherwise. */
  share: number;
  updatesPerUnit: number;
}

export function describeStepSize(
  totalIterations: number,
  workers: number,
  mode: SamplingMode
): StepSizeReport {
  const loop = createLoopSpec(totalIterations, workers);
  const stepSize = stepSizeForLoop(loop, mode);
  const share = mode === 'global' ? totalIterations : Math.floor(totalIterations / workers);
  return {
    totalIterations,
    workers,
    mode,
    stepSize,
    share,
    updatesPerUnit: expectedUpdates(share, stepSize),
  };
}

export function createStepSizeCommand(): Command {
  return new Command('step-size')
    .description('Show how often reporters send progress for a loop')
    .requiredOption('--iterations <n>', 'Total loop iterations')
    .option('--workers <n>', 'Number of workers', '1')
    .option('--mode <mode>', 'Sampling mode (global, per-worker)', 'per-worker')
    .option('--format <format>', 'Result format (table, json)', 'table')
    .action((options: unknown) => {
      try {
        const validated = validate(StepSizeOptionsSchema, options, 'command options');
        const report = describeStepSize(validated.iterations, validated.workers, validated.mode);
        console.log(OutputFormatter.format(report, validated.format));
      } catch (error) {
        ErrorHandler.handleCliError(error);
      }
    });
}
