import type { RemoteAddress } from '../transport/datagram-transport.js';

export type UpdatePolicy = 'max' | 'overwrite';

export interface WorkerRecord {
  workerId: number;
  localProgress: number;
  address: RemoteAddress;
  connected: boolean;
}

export interface WorkerProgress {
  workerId: number;
  fraction: number;
  connected: boolean;
}

export interface AggregateState {
  /** Sum of recorded progress over the loop size, clamped to [0, 1]. */
  totalProgress: number;
  reportedIterations: number;
  connectedWorkers: number;
  /** Present only when per-worker progress is enabled. Sorted by worker id. */
  workers?: WorkerProgress[];
}

function clamp01(value: number): number {
  if (!Number.isFinite(value) || value <= 0) return 0;
  return value >= 1 ? 1 : value;
}

/**
 * Per-worker last-known progress, owned by the aggregator.
 *
 * The receive handler and the render timer both run on the event loop, so each
 * call here runs to completion before the other task can observe the table.
 */
export class WorkerTable {
  private readonly records = new Map<number, WorkerRecord>();
  private readonly totalIterations: number;
  private readonly policy: UpdatePolicy;

  constructor(totalIterations: number, policy: UpdatePolicy = 'max') {
    this.totalIterations = totalIterations;
    this.policy = policy;
  }

  get size(): number {
    return this.records.size;
  }

  get updatePolicy(): UpdatePolicy {
    return this.policy;
  }

  /**
   * A registration marks the worker connected. Progress starts at 0 for a new
   * record; a registration that arrives after an update leaves progress alone.
   */
  register(workerId: number, address: RemoteAddress): WorkerRecord {
    const existing = this.records.get(workerId);
    const record: WorkerRecord = {
      workerId,
      localProgress: existing?.localProgress ?? 0,
      address: { ...address },
      connected: true,
    };
    this.records.set(workerId, record);
    return record;
  }

  update(workerId: number, value: number, address: RemoteAddress): WorkerRecord {
    const existing = this.records.get(workerId);
    if (!existing) {
      // Registration lost or overtaken by this update.
      const record: WorkerRecord = {
        workerId,
        localProgress: value,
        address: { ...address },
        connected: false,
      };
      this.records.set(workerId, record);
      return record;
    }
    existing.localProgress =
      this.policy === 'max' ? Math.max(existing.localProgress, value) : value;
    return existing;
  }

  /** Adds `value` to the worker's progress. Used by global-mode reports, which carry deltas. */
  accumulate(workerId: number, value: number, address: RemoteAddress): WorkerRecord {
    const existing = this.records.get(workerId);
    if (!existing) {
      const record: WorkerRecord = {
        workerId,
        localProgress: value,
        address: { ...address },
        connected: false,
      };
      this.records.set(workerId, record);
      return record;
    }
    existing.localProgress += value;
    return existing;
  }

  get(workerId: number): Readonly<WorkerRecord> | undefined {
    return this.records.get(workerId);
  }

  entries(): Readonly<WorkerRecord>[] {
    return [...this.records.values()].sort((a, b) => a.workerId - b.workerId);
  }

  sample(includeWorkers: boolean): AggregateState {
    let reported = 0;
    let connected = 0;
    for (const record of this.records.values()) {
      reported += record.localProgress;
      if (record.connected) connected++;
    }
    const state: AggregateState = {
      totalProgress: clamp01(reported / this.totalIterations),
      reportedIterations: reported,
      connectedWorkers: connected,
    };
    if (includeWorkers) {
      const share = connected > 0 ? this.totalIterations / connected : 0;
      state.workers = this.entries().map((record) => ({
        workerId: record.workerId,
        fraction: share > 0 ? clamp01(record.localProgress / share) : 0,
        connected: record.connected,
      }));
    }
    return state;
  }

  clear(): void {
    this.records.clear();
  }
}
