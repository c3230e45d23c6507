import React, { useEffect, useState } from 'react';
import { Box, Text, useApp } from 'ink';
import { useProgressSink } from '../ui/hooks/use-progress-sink.js';
import { ProgressBars } from '../ui/components/progress-bars.js';
import { ErrorDisplay } from '../ui/components/error-display.js';
import { renderApp } from '../ui/app.js';
import { runLoop } from '../engine/run-loop.js';
import type { RunLoopOptions, RunLoopResult } from '../engine/run-loop.js';

type RunAppOptions = Omit<RunLoopOptions, 'sink'>;

interface ResultRef {
  value?: RunLoopResult;
  error?: unknown;
}

function RunInkApp({
  options,
  resultRef,
}: {
  options: RunAppOptions;
  resultRef: ResultRef;
}): React.ReactElement {
  const { frame, finished, sink } = useProgressSink();
  const [result, setResult] = useState<RunLoopResult | null>(null);
  const [error, setError] = useState<unknown>(null);
  const { exit } = useApp();

  useEffect(() => {
    void (async () => {
      try {
        const r = await runLoop({ ...options, sink });
        resultRef.value = r;
        setResult(r);
      } catch (e: unknown) {
        resultRef.error = e;
        setError(e);
      }
    })();
    // eslint-disable-next-line react-hooks/exhaustive-deps -- run the loop once on mount
  }, []);

  useEffect(() => {
    if (result || error) exit();
  }, [result, error, exit]);

  return (
    <Box flexDirection="column">
      {error ? null : <ProgressBars frame={frame} finished={finished} />}
      {result && (
        <Box marginTop={1}>
          <Text dimColor>
            {String(result.iterations)} iterations on {String(result.workers)} workers in{' '}
            {String(result.elapsedMs)} ms | step {String(result.stepSize)} |{' '}
            {String(result.stats.datagrams)} datagrams
          </Text>
        </Box>
      )}
      {error ? <ErrorDisplay error={error} /> : null}
    </Box>
  );
}

function rethrow(error: unknown): never {
  if (error instanceof Error) throw error;
  throw new Error(String(error));
}

export async function runRunApp(options: RunAppOptions): Promise<RunLoopResult | undefined> {
  const resultRef: ResultRef = {};
  await renderApp(<RunInkApp options={options} resultRef={resultRef} />);
  if (resultRef.error) rethrow(resultRef.error);
  return resultRef.value;
}
