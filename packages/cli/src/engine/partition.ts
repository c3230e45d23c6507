export interface IterationRange {
  /** Inclusive. */
  start: number;
  /** Exclusive. */
  end: number;
}

/**
 * Splits `total` iterations into `workers` contiguous ranges whose lengths
 * differ by at most one. The longer ranges come first.
 */
export function partitionIterations(total: number, workers: number): IterationRange[] {
  const base = Math.floor(total / workers);
  const extra = total % workers;
  const ranges: IterationRange[] = [];
  let start = 0;
  for (let idx = 0; idx < workers; idx++) {
    const length = base + (idx < extra ? 1 : 0);
    ranges.push({ start, end: start + length });
    start += length;
  }
  return ranges;
}
