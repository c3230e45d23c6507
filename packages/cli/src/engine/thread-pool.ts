import { Worker } from 'worker_threads';
import { ParloopError, ErrorCode, encodeDescriptor, debugLog } from '@parloop/core';
import type { ConnectionDescriptor } from '@parloop/core';
import { partitionIterations } from './partition.js';
import type { IterationRange } from './partition.js';
import type { LoopWorkerData } from './loop-body.js';

/** The part of a `worker_threads` Worker the pool relies on. */
export interface PoolWorker {
  once(event: 'exit', listener: (exitCode: number) => void): unknown;
  once(event: 'error', listener: (error: Error) => void): unknown;
}

export interface SpawnOptions {
  workerData: LoopWorkerData;
  execArgv: string[];
}

export type WorkerFactory = (script: URL, options: SpawnOptions) => PoolWorker;

export interface ThreadPoolOptions {
  script: URL;
  size: number;
  descriptor: ConnectionDescriptor;
  totalIterations: number;
  /** Microseconds of synthetic work per iteration. */
  workload: number;
  flushOnClose?: boolean;
  createWorker?: WorkerFactory;
}

export interface ThreadPoolResult {
  ranges: IterationRange[];
}

const spawnWorker: WorkerFactory = (script, options) =>
  new Worker(script, { workerData: options.workerData, execArgv: options.execArgv });

/** Entry script for demonstration workers, as source under tsx or as built output. */
export function defaultLoopWorkerScript(): URL {
  const extension = import.meta.url.endsWith('.ts') ? 'ts' : 'js';
  return new URL(`./loop-worker.${extension}`, import.meta.url);
}

function execArgvFor(script: URL): string[] {
  return script.pathname.endsWith('.ts') ? ['--import', 'tsx'] : [];
}

function waitForExit(worker: PoolWorker, workerId: number): Promise<void> {
  return new Promise((resolve, reject) => {
    worker.once('error', (error) => {
      reject(error);
    });
    worker.once('exit', (exitCode) => {
      if (exitCode === 0) {
        resolve();
      } else {
        reject(new Error(`Worker ${String(workerId)} exited with code ${String(exitCode)}`));
      }
    });
  });
}

/**
 * Runs one worker thread per pool slot, each over its own contiguous range.
 * Worker ids are 1..size. Resolves when every worker exits cleanly.
 */
export async function runThreadPool(options: ThreadPoolOptions): Promise<ThreadPoolResult> {
  const ranges = partitionIterations(options.totalIterations, options.size);
  const descriptor = encodeDescriptor(options.descriptor);
  const create = options.createWorker ?? spawnWorker;
  const execArgv = execArgvFor(options.script);

  const exits = ranges.map((range, idx) => {
    const workerId = idx + 1;
    const worker = create(options.script, {
      workerData: {
        descriptor,
        workerId,
        start: range.start,
        end: range.end,
        workload: options.workload,
        flushOnClose: options.flushOnClose,
      },
      execArgv,
    });
    debugLog('Pool', 'Worker started', { workerId, ...range });
    return waitForExit(worker, workerId);
  });

  const outcomes = await Promise.allSettled(exits);
  const failures = outcomes.flatMap((outcome) =>
    outcome.status === 'rejected'
      ? [outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason)]
      : []
  );
  if (failures.length > 0) {
    throw new ParloopError(
      `${String(failures.length)} of ${String(ranges.length)} workers failed: ${failures.join('; ')}`,
      ErrorCode.WORKER_FAILED,
      `${String(failures.length)} worker thread(s) did not finish`,
      { failed: failures.length, size: ranges.length, firstError: failures[0] }
    );
  }
  return { ranges };
}
