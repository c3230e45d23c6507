import { useState, useMemo } from 'react';
import type { ProgressFrame, ProgressSink } from '@parloop/core';

/**
 * Hook that exposes the latest frame and an Ink-backed ProgressSink.
 *
 * The sink is a stable object (via useMemo) safe to hand to the aggregator,
 * whose render timer calls it outside React.
 */
export function useProgressSink(): {
  frame: ProgressFrame | null;
  finished: boolean;
  sink: ProgressSink;
} {
  const [frame, setFrame] = useState<ProgressFrame | null>(null);
  const [finished, setFinished] = useState(false);

  const sink: ProgressSink = useMemo(
    () => ({
      render(next: ProgressFrame) {
        setFrame(next);
      },
      finish() {
        setFinished(true);
      },
    }),
    []
  );

  return { frame, finished, sink };
}
