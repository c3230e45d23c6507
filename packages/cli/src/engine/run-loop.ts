import { setTimeout as sleep } from 'timers/promises';
import { performance } from 'perf_hooks';
import { AggregatorServer } from '@parloop/core';
import type {
  AggregatorStats,
  EndpointFactory,
  ProgressSink,
  SamplingMode,
  UpdatePolicy,
} from '@parloop/core';
import { defaultLoopWorkerScript, runThreadPool } from './thread-pool.js';
import type { WorkerFactory } from './thread-pool.js';

export interface RunLoopOptions {
  iterations: number;
  workers: number;
  workload: number;
  sink: ProgressSink;
  showWorkerProgress?: boolean;
  period?: number;
  title?: string;
  updatePolicy?: UpdatePolicy;
  samplingMode?: SamplingMode;
  flushOnClose?: boolean;
  /** How long to wait for in-flight datagrams once every worker has exited. */
  settleMs?: number;
  script?: URL;
  createWorker?: WorkerFactory;
  createEndpoint?: EndpointFactory;
}

export interface RunLoopResult {
  iterations: number;
  workers: number;
  stepSize: number;
  reportedIterations: number;
  elapsedMs: number;
  stats: AggregatorStats;
}

const SETTLE_POLL_MS = 10;

async function settle(
  server: AggregatorServer,
  iterations: number,
  settleMs: number
): Promise<number> {
  const deadline = performance.now() + settleMs;
  const reported = () => server.sampleAggregate().reportedIterations;
  while (reported() < iterations && performance.now() < deadline) {
    await sleep(SETTLE_POLL_MS);
  }
  return reported();
}

/**
 * Opens an aggregator, runs the loop on worker threads against it and closes
 * the aggregator, which draws the completed frame.
 */
export async function runLoop(options: RunLoopOptions): Promise<RunLoopResult> {
  const server = await AggregatorServer.open({
    totalIterations: options.iterations,
    pool: { size: options.workers },
    showWorkerProgress: options.showWorkerProgress,
    progressUpdatePeriod: options.period,
    title: options.title,
    updatePolicy: options.updatePolicy,
    samplingMode: options.samplingMode,
    sink: options.sink,
    createEndpoint: options.createEndpoint,
  });
  const started = performance.now();
  let reportedIterations = 0;
  try {
    await runThreadPool({
      script: options.script ?? defaultLoopWorkerScript(),
      size: options.workers,
      descriptor: server.descriptor,
      totalIterations: options.iterations,
      workload: options.workload,
      flushOnClose: options.flushOnClose,
      createWorker: options.createWorker,
    });
    reportedIterations = await settle(server, options.iterations, options.settleMs ?? 250);
  } finally {
    await server.close();
  }
  return {
    iterations: options.iterations,
    workers: options.workers,
    stepSize: server.stepSize,
    reportedIterations,
    elapsedMs: Math.round(performance.now() - started),
    stats: server.stats(),
  };
}
