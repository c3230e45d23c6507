import { z } from 'zod';
import { encodeMessage, registrationMessage, updateMessage } from '../protocol/codec.js';
import { ConnectionDescriptorSchema } from '../protocol/descriptor.js';
import type { ConnectionDescriptor } from '../protocol/descriptor.js';
import type { DatagramSender, SenderFactory } from '../transport/datagram-transport.js';
import { createUdpSender } from '../transport/udp-transport.js';
import { ErrorCode, ParloopError } from '../errors.js';
import type { TransportError } from '../errors.js';
import { MAX_WIRE_VALUE, globalReportValue } from '../sampling/step-size.js';
import type { SamplingMode } from '../sampling/step-size.js';
import { validate } from '../utils/validation.js';
import { debugLog } from '../utils/debug-log.js';
import { CONFIG } from '../utils/config.js';

export type ReporterState = 'unregistered' | 'registered' | 'reporting' | 'closed';

export interface WorkerReporterOptions {
  /** Send the exact count on close when it is not a multiple of the step size. */
  flushOnClose?: boolean;
  /** Transport override; defaults to UDP. */
  createSender?: SenderFactory;
}

const WorkerIdSchema = z.number().int().min(1).max(MAX_WIRE_VALUE);

/**
 * Worker-side half of the progress protocol.
 *
 * `increment()` only bumps a counter; a datagram goes out once every `stepSize`
 * calls, so the loop body never waits on reporting. Under a global-mode
 * descriptor the loop index decides instead: a report goes out when the index
 * is a multiple of the step or the last index of the loop.
 */
export class WorkerReporter {
  readonly workerId: number;
  readonly descriptor: ConnectionDescriptor;
  private readonly sender: DatagramSender;
  private readonly flushOnClose: boolean;
  private currentState: ReporterState = 'unregistered';
  private counter = 0;
  private lastSentValue = 0;
  private sentCount = 0;
  private sendFailures = 0;
  private closing?: Promise<void>;

  private constructor(
    descriptor: ConnectionDescriptor,
    workerId: number,
    options: WorkerReporterOptions
  ) {
    this.descriptor = descriptor;
    this.workerId = workerId;
    this.flushOnClose = options.flushOnClose ?? CONFIG.reporter.flushOnClose;
    const createSender = options.createSender ?? createUdpSender;
    this.sender = createSender({ host: descriptor.host, port: descriptor.port });
  }

  /** Opens the channel to the aggregator and registers this worker. */
  static connect(
    descriptor: ConnectionDescriptor,
    workerId: number,
    options: WorkerReporterOptions = {}
  ): WorkerReporter {
    const checked = validate(ConnectionDescriptorSchema, descriptor, 'connection descriptor');
    const id = validate(WorkerIdSchema, workerId, 'worker id');
    const reporter = new WorkerReporter(checked, id, options);
    reporter.transmit(encodeMessage(registrationMessage(id)));
    reporter.currentState = 'registered';
    return reporter;
  }

  get state(): ReporterState {
    return this.currentState;
  }

  get count(): number {
    return this.counter;
  }

  get lastSent(): number {
    return this.lastSentValue;
  }

  /** Datagrams handed to the transport, registration included. */
  get messagesSent(): number {
    return this.sentCount;
  }

  get failedSends(): number {
    return this.sendFailures;
  }

  get stepSize(): number {
    return this.descriptor.stepSize;
  }

  get samplingMode(): SamplingMode {
    return this.descriptor.samplingMode ?? 'per-worker';
  }

  /**
   * Records one finished iteration. `iteration` is the 1-based loop index; it
   * is required in global mode and ignored otherwise.
   */
  increment(iteration?: number): void {
    if (this.currentState === 'closed') return;
    if (this.descriptor.samplingMode === 'global') {
      this.reportIteration(iteration);
      return;
    }
    this.currentState = 'reporting';
    this.counter++;
    if (this.counter % this.descriptor.stepSize === 0) {
      this.sendUpdate();
    }
  }

  close(): Promise<void> {
    this.closing ??= this.shutdown();
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    // Global reports carry deltas and the last index already reports the remainder.
    const cumulative = this.samplingMode === 'per-worker';
    if (cumulative && this.flushOnClose && this.counter > this.lastSentValue) {
      this.sendUpdate();
    }
    this.currentState = 'closed';
    await this.sender.close();
    debugLog('Reporter', 'Closed', {
      workerId: this.workerId,
      count: this.counter,
      lastSent: this.lastSentValue,
      messages: this.sentCount,
    });
  }

  private reportIteration(iteration: number | undefined): void {
    const total = this.descriptor.totalIterations;
    if (
      iteration === undefined ||
      !Number.isInteger(iteration) ||
      iteration < 1 ||
      iteration > total
    ) {
      throw new ParloopError(
        `Global progress needs a loop index between 1 and ${String(total)}, got ${String(iteration)}`,
        ErrorCode.INPUT_INVALID,
        'Pass the loop index to increment() when reporting in global mode',
        { workerId: this.workerId, iteration }
      );
    }
    this.currentState = 'reporting';
    this.counter++;
    const value = globalReportValue(iteration, total, this.descriptor.stepSize);
    if (value > 0) {
      this.transmit(encodeMessage(updateMessage(this.workerId, value)));
      this.lastSentValue = value;
    }
  }

  private sendUpdate(): void {
    // The counter can outgrow the wire width only if the worker overruns the loop.
    const value = Math.min(this.counter, MAX_WIRE_VALUE);
    this.transmit(encodeMessage(updateMessage(this.workerId, value)));
    this.lastSentValue = value;
  }

  private transmit(payload: Buffer): void {
    this.sentCount++;
    this.sender.send(payload, (error: TransportError) => {
      this.sendFailures++;
      debugLog('Reporter', 'Dropped progress datagram', {
        workerId: this.workerId,
        code: error.code,
        message: error.message,
      });
    });
  }
}
