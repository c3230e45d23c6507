import { z } from 'zod';
import { ParloopError, ErrorCode } from '../errors.js';
import { validate } from '../utils/validation.js';
import { MAX_WIRE_VALUE, SamplingModeSchema } from '../sampling/step-size.js';

/**
 * Everything a worker needs to start reporting. This is the only value that
 * crosses the process boundary; workers rebuild their reporter from it.
 */
export const ConnectionDescriptorSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535),
  totalIterations: z.number().int().min(1).max(MAX_WIRE_VALUE),
  workerCount: z.number().int().min(1),
  stepSize: z.number().int().min(1),
  /** Absent means per-worker. */
  samplingMode: SamplingModeSchema.optional(),
});
export type ConnectionDescriptor = Readonly<z.infer<typeof ConnectionDescriptorSchema>>;

export function createDescriptor(fields: ConnectionDescriptor): ConnectionDescriptor {
  return Object.freeze(validate(ConnectionDescriptorSchema, fields, 'connection descriptor'));
}

export function encodeDescriptor(descriptor: ConnectionDescriptor): string {
  return JSON.stringify({
    host: descriptor.host,
    port: descriptor.port,
    totalIterations: descriptor.totalIterations,
    workerCount: descriptor.workerCount,
    stepSize: descriptor.stepSize,
    samplingMode: descriptor.samplingMode,
  });
}

export function decodeDescriptor(serialized: string): ConnectionDescriptor {
  let parsed: unknown;
  try {
    parsed = JSON.parse(serialized);
  } catch (error) {
    throw new ParloopError(
      `Connection descriptor is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      ErrorCode.INPUT_INVALID,
      'The connection descriptor could not be read'
    );
  }
  return Object.freeze(validate(ConnectionDescriptorSchema, parsed, 'connection descriptor'));
}
