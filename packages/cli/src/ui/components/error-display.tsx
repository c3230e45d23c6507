import type React from 'react';
import { Box, Text } from 'ink';
import { ParloopError } from '@parloop/core';
import { SUGGESTIONS } from '../../utils/error-handler.js';

interface Props {
  error: unknown;
}

export function ErrorDisplay({ error }: Props): React.ReactElement {
  if (error instanceof ParloopError) {
    const contextEntries = Object.entries(error.context).filter(([, v]) => v != null);
    const suggestions = SUGGESTIONS[error.code];

    return (
      <Box flexDirection="column" marginTop={1}>
        <Text color="red">✗ {error.userMessage}</Text>
        {contextEntries.length > 0 && (
          <Box flexDirection="column" marginLeft={2}>
            {contextEntries.map(([key, value]) => (
              <Text key={key} dimColor>
                {key}: {String(value)}
              </Text>
            ))}
          </Box>
        )}
        <Text dimColor> Code: {error.code}</Text>
        {suggestions && suggestions.length > 0 && (
          <Box flexDirection="column" marginTop={1}>
            <Text>Hints:</Text>
            {suggestions.map((s, i) => (
              <Text key={i} color="blue">
                {'  • '}
                {s}
              </Text>
            ))}
          </Box>
        )}
      </Box>
    );
  }

  if (error instanceof Error) {
    return <Text color="red">✗ {error.message}</Text>;
  }

  return <Text color="red">✗ Something went wrong unexpectedly: {String(error)}</Text>;
}
