import { Command } from 'commander';
import { AggregatorServer, encodeDescriptor, validate } from '@parloop/core';
import type { EndpointFactory, ProgressFrame, ProgressSink } from '@parloop/core';
import { ErrorHandler } from '../utils/error-handler.js';
import { ListenOptionsSchema } from '../utils/command-schemas.js';
import type { ListenOptions } from '../utils/command-schemas.js';
import { LineSink } from '../ui/line-sink.js';

export interface ListenIo {
  /** Receives the descriptor line. */
  out?: { write(chunk: string): unknown };
  display?: ProgressSink;
  createEndpoint?: EndpointFactory;
  /** Called once the descriptor is published. */
  onListening?: (server: AggregatorServer) => void;
}

/**
 * Opens an aggregator for reporters in other processes, prints its descriptor
 * on stdout and draws progress on stderr until the loop completes.
 */
export async function listen(options: ListenOptions, io: ListenIo = {}): Promise<AggregatorServer> {
  const out = io.out ?? process.stdout;
  const display: ProgressSink = io.display ?? new LineSink(process.stderr);
  let markComplete = (): void => undefined;
  const complete = new Promise<void>((resolve) => {
    markComplete = resolve;
  });
  const sink: ProgressSink = {
    render(frame: ProgressFrame) {
      display.render(frame);
      if (frame.total >= 1) markComplete();
    },
    finish() {
      display.finish?.();
    },
  };

  const server = await AggregatorServer.open({
    totalIterations: options.iterations,
    pool: { size: options.workers },
    showWorkerProgress: options.showWorkerProgress,
    progressUpdatePeriod: options.period,
    title: options.title,
    updatePolicy: options.updatePolicy,
    samplingMode: options.samplingMode,
    sink,
    createEndpoint: io.createEndpoint,
  });
  out.write(`${encodeDescriptor(server.descriptor)}\n`);
  io.onListening?.(server);

  await complete;
  await server.close();
  return server;
}

export function createListenCommand(): Command {
  return new Command('listen')
    .description('Open a progress aggregator for reporters in other processes')
    .requiredOption('--iterations <n>', 'Total loop iterations')
    .requiredOption('--workers <n>', 'Number of reporting workers')
    .option('--period <seconds>', 'Seconds between progress renders')
    .option('--title <text>', 'Title shown above the progress bar')
    .option('--show-worker-progress', 'Draw one line per worker')
    .option('--update-policy <policy>', 'How stale updates are applied (max, overwrite)')
    .option('--sampling-mode <mode>', 'Sampling mode (per-worker, global)')
    .action(async (options: unknown) => {
      try {
        await listen(validate(ListenOptionsSchema, options, 'command options'));
      } catch (error) {
        ErrorHandler.handleCliError(error);
      }
    });
}
