import React from 'react';
import { Box, Text } from 'ink';
import Spinner from 'ink-spinner';
import type { ProgressFrame } from '@parloop/core';
import { percent, textBar } from '../format.js';

interface Props {
  frame: ProgressFrame | null;
  finished: boolean;
  barWidth?: number;
}

function Bar({
  label,
  fraction,
  width,
  color,
}: {
  label: string;
  fraction: number;
  width: number;
  color: string;
}): React.ReactElement {
  return (
    <Box>
      <Box width={16}>
        <Text>{label}</Text>
      </Box>
      <Text color={color}>{textBar(fraction, width)}</Text>
      <Text> {percent(fraction).padStart(4)}</Text>
    </Box>
  );
}

export function ProgressBars({ frame, finished, barWidth = 40 }: Props): React.ReactElement {
  if (!frame) {
    return (
      <Box>
        <Text color="cyan">
          <Spinner type="dots" />
        </Text>
        <Text color="cyan"> Waiting for workers</Text>
      </Box>
    );
  }

  const done = finished && frame.total >= 1;
  return (
    <Box flexDirection="column">
      <Box>
        {done ? (
          <Text color="green">✓ </Text>
        ) : (
          <Text color="cyan">
            <Spinner type="dots" />{' '}
          </Text>
        )}
        <Text bold>{frame.title || 'Progress'}</Text>
      </Box>
      <Bar label="Total" fraction={frame.total} width={barWidth} color="green" />
      {frame.workers?.map((worker) => (
        <Bar
          key={worker.label}
          label={worker.label}
          fraction={worker.fraction}
          width={barWidth}
          color="blue"
        />
      ))}
    </Box>
  );
}
