import { z } from 'zod';
import { validate } from '../utils/validation.js';

/** Largest value the wire format can carry in either field. */
export const MAX_WIRE_VALUE = 0xffffffff;

/** Below this many iterations per reporting unit, every iteration is reported. */
const DENSE_REPORTING_THRESHOLD = 200;
/** Target number of reports per reporting unit once sampling kicks in. */
const REPORTS_PER_UNIT = 100;

export const LoopSpecSchema = z.object({
  totalIterations: z.number().int().min(1).max(MAX_WIRE_VALUE),
  workerCount: z.number().int().min(1),
});
export type LoopSpec = Readonly<z.infer<typeof LoopSpecSchema>>;

export const SamplingModeSchema = z.enum(['global', 'per-worker']);
export type SamplingMode = z.infer<typeof SamplingModeSchema>;

export function createLoopSpec(totalIterations: number, workerCount: number): LoopSpec {
  return Object.freeze(validate(LoopSpecSchema, { totalIterations, workerCount }, 'loop spec'));
}

/**
 * Number of local iterations a reporter accumulates before sending one report.
 *
 * `denominator` is 1 for a single global counter or the worker count when each
 * worker reports its own share.
 */
export function computeStepSize(totalIterations: number, denominator: number): number {
  const perUnit = totalIterations / denominator;
  if (perUnit > DENSE_REPORTING_THRESHOLD) {
    return Math.max(1, Math.floor(perUnit / REPORTS_PER_UNIT));
  }
  return 1;
}

export function stepSizeForLoop(loop: LoopSpec, mode: SamplingMode = 'per-worker'): number {
  const denominator = mode === 'global' ? 1 : loop.workerCount;
  return computeStepSize(loop.totalIterations, denominator);
}

/** Updates a reporter sends for `localIterations` increments, without the closing flush. */
export function expectedUpdates(localIterations: number, stepSize: number): number {
  return Math.floor(localIterations / stepSize);
}

/**
 * Iterations a global-mode report stands for when loop index `iteration`
 * completes, or 0 when that index sends nothing. Every multiple of the step
 * reports a full step and the last index reports the remainder, so the reports
 * of one loop sum to its total.
 */
export function globalReportValue(
  iteration: number,
  totalIterations: number,
  stepSize: number
): number {
  if (iteration % stepSize === 0) return stepSize;
  if (iteration === totalIterations) return totalIterations % stepSize;
  return 0;
}
