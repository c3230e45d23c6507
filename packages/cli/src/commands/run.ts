import { availableParallelism } from 'os';
import { Command } from 'commander';
import { validate } from '@parloop/core';
import { ErrorHandler } from '../utils/error-handler.js';
import { RunOptionsSchema } from '../utils/command-schemas.js';
import type { RunOptions } from '../utils/command-schemas.js';
import { Logger } from '../utils/cli-helpers.js';
import { LineSink } from '../ui/line-sink.js';
import { runLoop } from '../engine/run-loop.js';
import type { RunLoopOptions } from '../engine/run-loop.js';

function toLoopOptions(validated: RunOptions): Omit<RunLoopOptions, 'sink'> {
  return {
    iterations: validated.iterations,
    workers: validated.workers,
    workload: validated.workload,
    showWorkerProgress: validated.showWorkerProgress,
    period: validated.period,
    title: validated.title,
    updatePolicy: validated.updatePolicy,
    samplingMode: validated.samplingMode,
    flushOnClose: validated.flush,
  };
}

/** The Ink app draws its own error, so only the exit code is set here. */
async function runInteractive(loopOptions: Omit<RunLoopOptions, 'sink'>): Promise<void> {
  try {
    const { runRunApp } = await import('./run-app.js');
    await runRunApp(loopOptions);
  } catch (error) {
    process.exitCode = ErrorHandler.getExitCode(error);
  }
}

export function createRunCommand(): Command {
  return new Command('run')
    .description('Run a demonstration loop on worker threads with live progress')
    .requiredOption('--iterations <n>', 'Total loop iterations')
    .option('--workers <n>', 'Worker threads in the pool', String(availableParallelism()))
    .option('--show-worker-progress', 'Draw one bar per worker')
    .option('--period <seconds>', 'Seconds between progress renders')
    .option('--title <text>', 'Title shown above the progress bar')
    .option('--workload <micros>', 'Synthetic work per iteration, in microseconds', '50')
    .option('--update-policy <policy>', 'How stale updates are applied (max, overwrite)')
    .option('--sampling-mode <mode>', 'Sampling mode (per-worker, global)')
    .option('--no-flush', 'Skip the exact-count report when a worker finishes')
    .option('--format <format>', 'Progress display (bars, lines)', 'bars')
    .action(async (options: unknown) => {
      try {
        const validated = validate(RunOptionsSchema, options, 'command options');
        const loopOptions = toLoopOptions(validated);

        if (validated.format === 'lines' || !process.stdout.isTTY) {
          const result = await runLoop({ ...loopOptions, sink: new LineSink() });
          const summary = `${String(result.iterations)} iterations on ${String(result.workers)} workers`;
          Logger.success(`${summary} in ${String(result.elapsedMs)} ms`);
          return;
        }

        await runInteractive(loopOptions);
      } catch (error) {
        ErrorHandler.handleCliError(error);
      }
    });
}
