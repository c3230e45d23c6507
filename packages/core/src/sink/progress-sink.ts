import type { AggregateState } from '../aggregator/worker-table.js';

/**
 * Rendering abstraction for the aggregator.
 *
 * Library callers pass SilentSink; the CLI passes an Ink-backed or line-based sink.
 */
export interface ProgressFrame {
  title: string;
  /** Aggregate progress in [0, 1]. */
  total: number;
  /** One bar per worker slot; only in per-worker mode. */
  workers?: WorkerFrame[];
}

export interface WorkerFrame {
  label: string;
  fraction: number;
}

export interface ProgressSink {
  render(frame: ProgressFrame): void;
  /** Called once after the final frame. */
  finish?(): void;
}

/** Drops every frame. */
export class SilentSink implements ProgressSink {
  render(_frame: ProgressFrame): void {
    /* noop */
  }
}

export const DEFAULT_PER_WORKER_TITLE = 'Total progress';

export interface FrameOptions {
  title: string;
  showWorkerProgress: boolean;
  workerCount: number;
}

export function workerLabel(workerId: number): string {
  return `Worker ${String(workerId)}`;
}

export function buildFrame(state: AggregateState, options: FrameOptions): ProgressFrame {
  if (!options.showWorkerProgress) {
    return { title: options.title, total: state.totalProgress };
  }
  const fractions = new Map<number, number>();
  for (const worker of state.workers ?? []) {
    fractions.set(worker.workerId, worker.fraction);
  }
  const ids = new Set<number>(fractions.keys());
  for (let id = 1; id <= options.workerCount; id++) ids.add(id);
  const workers = [...ids]
    .sort((a, b) => a - b)
    .map((id) => ({ label: workerLabel(id), fraction: fractions.get(id) ?? 0 }));
  return {
    title: options.title || DEFAULT_PER_WORKER_TITLE,
    total: state.totalProgress,
    workers,
  };
}

/** The frame drawn at close: everything shown as complete. */
export function completedFrame(frame: ProgressFrame): ProgressFrame {
  return {
    title: frame.title,
    total: 1,
    ...(frame.workers && {
      workers: frame.workers.map((worker) => ({ label: worker.label, fraction: 1 })),
    }),
  };
}
