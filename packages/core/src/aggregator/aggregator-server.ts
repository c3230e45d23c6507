import { hostname } from 'os';
import { z } from 'zod';
import { ParloopError, PoolError, ProtocolError, TransportError } from '../errors.js';
import { decodeMessage } from '../protocol/codec.js';
import type { ProgressMessage } from '../protocol/codec.js';
import { createDescriptor } from '../protocol/descriptor.js';
import type { ConnectionDescriptor } from '../protocol/descriptor.js';
import { SamplingModeSchema, createLoopSpec, stepSizeForLoop } from '../sampling/step-size.js';
import type { LoopSpec, SamplingMode } from '../sampling/step-size.js';
import { SilentSink, buildFrame, completedFrame } from '../sink/progress-sink.js';
import type { ProgressFrame, ProgressSink } from '../sink/progress-sink.js';
import type {
  DatagramEndpoint,
  EndpointFactory,
  RemoteAddress,
} from '../transport/datagram-transport.js';
import { createUdpEndpoint } from '../transport/udp-transport.js';
import { WorkerTable } from './worker-table.js';
import type { AggregateState, UpdatePolicy, WorkerRecord } from './worker-table.js';
import { validate } from '../utils/validation.js';
import { debugLog } from '../utils/debug-log.js';
import { CONFIG, MAX_UPDATE_PERIOD } from '../utils/config.js';

/** Whatever runs the loop iterations. Only its size matters here. */
export interface ExecutionPool {
  readonly size: number;
}

export interface AggregatorOptions {
  totalIterations: number;
  pool?: ExecutionPool | null;
  showWorkerProgress?: boolean;
  /** Seconds between renders. */
  progressUpdatePeriod?: number;
  title?: string;
  host?: string;
  updatePolicy?: UpdatePolicy;
  /**
   * `per-worker` (default): each worker reports its cumulative count.
   * `global`: workers report loop indices against one step for the whole loop.
   */
  samplingMode?: SamplingMode;
  sink?: ProgressSink;
  createEndpoint?: EndpointFactory;
}

export interface AggregatorStats {
  datagrams: number;
  registrations: number;
  updates: number;
  malformed: number;
}

const AggregatorSettingsSchema = z.object({
  totalIterations: z.number().int().positive(),
  showWorkerProgress: z.boolean().default(false),
  progressUpdatePeriod: z
    .number()
    .positive()
    .max(MAX_UPDATE_PERIOD)
    .default(CONFIG.aggregator.updatePeriod),
  title: z.string().default(''),
  host: z.string().min(1).default(CONFIG.aggregator.host),
  updatePolicy: z.enum(['max', 'overwrite']).default(CONFIG.aggregator.updatePolicy),
  samplingMode: SamplingModeSchema.default('per-worker'),
});
type AggregatorSettings = z.infer<typeof AggregatorSettingsSchema>;

const WILDCARD_HOSTS = new Set(['0.0.0.0', '::']);

function checkPool(pool: ExecutionPool | null | undefined): ExecutionPool {
  if (!pool) {
    throw new PoolError('No execution pool is available');
  }
  if (!Number.isInteger(pool.size) || pool.size < 1) {
    throw new PoolError(`Execution pool has no workers (size ${String(pool.size)})`, {
      size: pool.size,
    });
  }
  return pool;
}

/**
 * Receives progress datagrams from every worker and renders the aggregate on a
 * fixed period, independent of how many datagrams arrive.
 */
export class AggregatorServer {
  readonly loop: LoopSpec;
  readonly stepSize: number;
  readonly samplingMode: SamplingMode;
  readonly address: RemoteAddress;
  readonly descriptor: ConnectionDescriptor;
  readonly title: string;
  readonly showWorkerProgress: boolean;
  readonly periodMs: number;
  private readonly table: WorkerTable;
  private readonly endpoint: DatagramEndpoint;
  private readonly sink: ProgressSink;
  private readonly counters: AggregatorStats = {
    datagrams: 0,
    registrations: 0,
    updates: 0,
    malformed: 0,
  };
  private timer?: ReturnType<typeof setTimeout>;
  private closing?: Promise<void>;

  private constructor(
    settings: AggregatorSettings,
    loop: LoopSpec,
    endpoint: DatagramEndpoint,
    address: RemoteAddress,
    sink: ProgressSink
  ) {
    this.loop = loop;
    this.samplingMode = settings.samplingMode;
    this.stepSize = stepSizeForLoop(loop, settings.samplingMode);
    this.title = settings.title;
    this.showWorkerProgress = settings.showWorkerProgress;
    this.periodMs = Math.max(1, Math.round(settings.progressUpdatePeriod * 1000));
    this.table = new WorkerTable(loop.totalIterations, settings.updatePolicy);
    this.endpoint = endpoint;
    this.sink = sink;
    this.address = address;
    this.descriptor = createDescriptor({
      host: WILDCARD_HOSTS.has(address.host) ? hostname() : address.host,
      port: address.port,
      totalIterations: loop.totalIterations,
      workerCount: loop.workerCount,
      stepSize: this.stepSize,
      samplingMode: this.samplingMode,
    });
  }

  /**
   * Validates the options, binds an ephemeral endpoint and starts the render timer.
   * Throws before any socket is opened when there is no usable pool.
   */
  static async open(options: AggregatorOptions): Promise<AggregatorServer> {
    const settings = validate(
      AggregatorSettingsSchema,
      {
        totalIterations: options.totalIterations,
        showWorkerProgress: options.showWorkerProgress,
        progressUpdatePeriod: options.progressUpdatePeriod,
        title: options.title,
        host: options.host,
        updatePolicy: options.updatePolicy,
        samplingMode: options.samplingMode,
      },
      'aggregator options'
    );
    const pool = checkPool(options.pool);
    const loop = createLoopSpec(settings.totalIterations, pool.size);

    const endpoint = (options.createEndpoint ?? createUdpEndpoint)();
    let address: RemoteAddress;
    try {
      address = await endpoint.bind(settings.host);
    } catch (error) {
      await endpoint.close().catch((closeError: unknown) => {
        debugLog('Aggregator', 'Endpoint cleanup after failed bind', {
          message: closeError instanceof Error ? closeError.message : String(closeError),
        });
      });
      throw error instanceof ParloopError
        ? error
        : TransportError.fromSocketError(error, 'bind');
    }

    const server = new AggregatorServer(
      settings,
      loop,
      endpoint,
      address,
      options.sink ?? new SilentSink()
    );
    endpoint.onDatagram((payload, remote) => {
      server.handleDatagram(payload, remote);
    });
    server.scheduleRender(server.periodMs * 2);
    debugLog('Aggregator', 'Listening', {
      ...server.address,
      totalIterations: loop.totalIterations,
      workerCount: loop.workerCount,
      stepSize: server.stepSize,
      samplingMode: server.samplingMode,
    });
    return server;
  }

  get closed(): boolean {
    return this.closing !== undefined;
  }

  get timerActive(): boolean {
    return this.timer !== undefined;
  }

  get updatePolicy(): UpdatePolicy {
    return this.table.updatePolicy;
  }

  handleDatagram(payload: Uint8Array, remote: RemoteAddress): void {
    if (this.closed) return;
    this.counters.datagrams++;
    let message: ProgressMessage;
    try {
      message = decodeMessage(payload);
    } catch (error) {
      if (!(error instanceof ProtocolError)) throw error;
      this.counters.malformed++;
      debugLog('Aggregator', `Unknown datagram from ${remote.host}:${String(remote.port)}`, {
        byteLength: error.byteLength,
      });
      return;
    }

    if (message.kind === 'registration') {
      this.counters.registrations++;
      this.table.register(message.workerId, remote);
      debugLog('Aggregator', 'Worker registered', { workerId: message.workerId, ...remote });
    } else {
      this.counters.updates++;
      if (this.samplingMode === 'global') {
        this.table.accumulate(message.workerId, message.value, remote);
      } else {
        this.table.update(message.workerId, message.value, remote);
      }
    }
  }

  sampleAggregate(): AggregateState {
    return this.table.sample(this.showWorkerProgress);
  }

  worker(workerId: number): Readonly<WorkerRecord> | undefined {
    return this.table.get(workerId);
  }

  workers(): Readonly<WorkerRecord>[] {
    return this.table.entries();
  }

  stats(): AggregatorStats {
    return { ...this.counters };
  }

  /** Samples the table and hands one frame to the sink. */
  render(): AggregateState {
    const state = this.sampleAggregate();
    this.draw(
      buildFrame(state, {
        title: this.title,
        showWorkerProgress: this.showWorkerProgress,
        workerCount: this.loop.workerCount,
      })
    );
    return state;
  }

  close(): Promise<void> {
    this.closing ??= this.shutdown();
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    this.stopTimer();
    try {
      await this.endpoint.close();
    } catch (error) {
      debugLog('Aggregator', 'Endpoint close failed', {
        message: error instanceof Error ? error.message : String(error),
      });
    }
    const last = buildFrame(this.sampleAggregate(), {
      title: this.title,
      showWorkerProgress: this.showWorkerProgress,
      workerCount: this.loop.workerCount,
    });
    this.draw(completedFrame(last));
    try {
      this.sink.finish?.();
    } catch (error) {
      debugLog('Aggregator', 'Sink finish failed', {
        message: error instanceof Error ? error.message : String(error),
      });
    }
    debugLog('Aggregator', 'Closed', { ...this.counters });
    this.table.clear();
  }

  private draw(frame: ProgressFrame): void {
    try {
      this.sink.render(frame);
    } catch (error) {
      debugLog('Aggregator', 'Sink render failed', {
        message: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private scheduleRender(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.tick();
    }, delayMs);
    this.timer.unref();
  }

  private tick(): void {
    this.timer = undefined;
    if (this.closed) return;
    const state = this.render();
    if (!this.showWorkerProgress && state.totalProgress >= 1) {
      debugLog('Aggregator', 'All iterations reported; render timer stopped');
      return;
    }
    this.scheduleRender(this.periodMs);
  }

  private stopTimer(): void {
    if (this.timer !== undefined) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }
}

