import { AggregatorServer } from './aggregator/aggregator-server.js';
import type { AggregatorOptions } from './aggregator/aggregator-server.js';
import type { ConnectionDescriptor } from './protocol/descriptor.js';
import { WorkerReporter } from './reporter/worker-reporter.js';
import type { WorkerReporterOptions } from './reporter/worker-reporter.js';

/** Input that places a monitor on the worker side of the protocol. */
export interface WorkerAttachment extends WorkerReporterOptions {
  descriptor: ConnectionDescriptor;
  workerId: number;
}

export type MonitorInput = AggregatorOptions | WorkerAttachment;

/** A monitor is either the single aggregator or one worker's reporter, fixed at creation. */
export type Monitor =
  | { role: 'aggregator'; server: AggregatorServer; descriptor: ConnectionDescriptor }
  | { role: 'worker'; reporter: WorkerReporter };

function isWorkerAttachment(input: MonitorInput): input is WorkerAttachment {
  return 'descriptor' in input;
}

export async function openMonitor(input: MonitorInput): Promise<Monitor> {
  if (isWorkerAttachment(input)) {
    const { descriptor, workerId, ...options } = input;
    return { role: 'worker', reporter: WorkerReporter.connect(descriptor, workerId, options) };
  }
  const server = await AggregatorServer.open(input);
  return { role: 'aggregator', server, descriptor: server.descriptor };
}

export function closeMonitor(monitor: Monitor): Promise<void> {
  switch (monitor.role) {
    case 'aggregator':
      return monitor.server.close();
    case 'worker':
      return monitor.reporter.close();
  }
}
