import { z } from 'zod';
import { MAX_UPDATE_PERIOD, MAX_WIRE_VALUE } from '@parloop/core';

const IterationsSchema = z.coerce
  .number()
  .int('Iterations must be a whole number')
  .positive('Iterations must be positive')
  .max(MAX_WIRE_VALUE);

const WorkersSchema = z.coerce.number().int('Workers must be a whole number').positive();

const PeriodSchema = z.coerce
  .number()
  .positive('The update period must be positive')
  .max(MAX_UPDATE_PERIOD, 'The update period must be at most an hour');

const UpdatePolicySchema = z.enum(['max', 'overwrite']);

const SamplingModeSchema = z.enum(['global', 'per-worker']);

export const RunOptionsSchema = z.object({
  iterations: IterationsSchema,
  workers: WorkersSchema,
  showWorkerProgress: z.boolean().optional().default(false),
  period: PeriodSchema.optional(),
  title: z.string().optional().default(''),
  workload: z.coerce.number().nonnegative().default(50),
  updatePolicy: UpdatePolicySchema.optional(),
  samplingMode: SamplingModeSchema.default('per-worker'),
  flush: z.boolean().optional().default(true),
  format: z.enum(['bars', 'lines']).default('bars'),
});
export type RunOptions = z.infer<typeof RunOptionsSchema>;

export const ListenOptionsSchema = z.object({
  iterations: IterationsSchema,
  workers: WorkersSchema,
  showWorkerProgress: z.boolean().optional().default(false),
  period: PeriodSchema.optional(),
  title: z.string().optional().default(''),
  updatePolicy: UpdatePolicySchema.optional(),
  samplingMode: SamplingModeSchema.default('per-worker'),
});
export type ListenOptions = z.infer<typeof ListenOptionsSchema>;

export const StepSizeOptionsSchema = z.object({
  iterations: IterationsSchema,
  workers: WorkersSchema.default(1),
  mode: SamplingModeSchema.default('per-worker'),
  format: z.enum(['table', 'json']).default('table'),
});
export type StepSizeOptions = z.infer<typeof StepSizeOptionsSchema>;
