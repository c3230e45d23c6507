import { performance } from 'perf_hooks';
import { z } from 'zod';
import { WorkerReporter, decodeDescriptor, validate } from '@parloop/core';
import type { WorkerReporterOptions } from '@parloop/core';

export const LoopWorkerDataSchema = z
  .object({
    descriptor: z.string(),
    workerId: z.number().int().positive(),
    start: z.number().int().nonnegative(),
    end: z.number().int().nonnegative(),
    workload: z.number().nonnegative(),
    flushOnClose: z.boolean().optional(),
  })
  .refine((data) => data.end >= data.start, { message: 'end must not precede start' });
export type LoopWorkerData = z.infer<typeof LoopWorkerDataSchema>;

/** Spins for `micros` microseconds and returns the number of spins. */
export function busyWait(micros: number): number {
  const until = performance.now() + micros / 1000;
  let spins = 0;
  while (performance.now() < until) spins++;
  return spins;
}

/**
 * Body of one demonstration worker: registers with the aggregator, runs its
 * share of the loop and closes the reporter.
 */
export async function runLoopWorker(
  input: unknown,
  options: Pick<WorkerReporterOptions, 'createSender'> = {}
): Promise<number> {
  const data = validate(LoopWorkerDataSchema, input, 'worker data');
  const reporter = WorkerReporter.connect(decodeDescriptor(data.descriptor), data.workerId, {
    ...options,
    flushOnClose: data.flushOnClose,
  });
  for (let i = data.start; i < data.end; i++) {
    if (data.workload > 0) busyWait(data.workload);
    reporter.increment(i + 1);
  }
  await reporter.close();
  return reporter.count;
}
