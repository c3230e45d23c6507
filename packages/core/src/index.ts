// Sampling
export {
  computeStepSize,
  stepSizeForLoop,
  expectedUpdates,
  globalReportValue,
  createLoopSpec,
  LoopSpecSchema,
  SamplingModeSchema,
  MAX_WIRE_VALUE,
} from './sampling/step-size.js';
export type { LoopSpec, SamplingMode } from './sampling/step-size.js';

// Protocol
export {
  encodeMessage,
  decodeMessage,
  registrationMessage,
  updateMessage,
  MESSAGE_BYTE_LENGTH,
} from './protocol/codec.js';
export type { ProgressMessage, MessageKind } from './protocol/codec.js';
export {
  createDescriptor,
  encodeDescriptor,
  decodeDescriptor,
  ConnectionDescriptorSchema,
} from './protocol/descriptor.js';
export type { ConnectionDescriptor } from './protocol/descriptor.js';

// Transport
export {
  UdpSender,
  UdpEndpoint,
  createUdpSender,
  createUdpEndpoint,
} from './transport/udp-transport.js';
export type {
  DatagramSender,
  DatagramEndpoint,
  RemoteAddress,
  SenderFactory,
  EndpointFactory,
} from './transport/datagram-transport.js';

// Worker side
export { WorkerReporter } from './reporter/worker-reporter.js';
export type { WorkerReporterOptions, ReporterState } from './reporter/worker-reporter.js';

// Aggregator side
export { AggregatorServer } from './aggregator/aggregator-server.js';
export type {
  AggregatorOptions,
  AggregatorStats,
  ExecutionPool,
} from './aggregator/aggregator-server.js';
export { WorkerTable } from './aggregator/worker-table.js';
export type {
  AggregateState,
  UpdatePolicy,
  WorkerProgress,
  WorkerRecord,
} from './aggregator/worker-table.js';

// Rendering
export {
  SilentSink,
  buildFrame,
  completedFrame,
  workerLabel,
  DEFAULT_PER_WORKER_TITLE,
} from './sink/progress-sink.js';
export type { ProgressSink, ProgressFrame, WorkerFrame } from './sink/progress-sink.js';

// Roles
export { openMonitor, closeMonitor } from './monitor.js';
export type { Monitor, MonitorInput, WorkerAttachment } from './monitor.js';

// Config
export { CONFIG, MAX_UPDATE_PERIOD } from './utils/config.js';

// Errors
export {
  ParloopError,
  ConfigurationError,
  PoolError,
  TransportError,
  ProtocolError,
  ErrorCode,
} from './errors.js';

// Validation
export { validate } from './utils/validation.js';
export { debugLog } from './utils/debug-log.js';

// Schemas (re-export for consumers that need them)
export { PackageJsonSchema } from './schemas/package.schema.js';
