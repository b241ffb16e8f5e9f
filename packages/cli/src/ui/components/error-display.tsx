import type React from 'react';
import { Box, Text } from 'ink';
import { PackwrightError, StepExecutionError } from '@packwright/core';
import { SUGGESTIONS, isSensitiveKey } from '../../utils/error-handler.js';

interface Props {
  error: unknown;
}

export function ErrorDisplay({ error }: Props): React.ReactElement {
  if (error instanceof PackwrightError) {
    const contextEntries = Object.entries(error.context).filter(([, v]) => v != null);
    const suggestions = SUGGESTIONS[error.code];
    const partialPaths = error instanceof StepExecutionError ? error.partialPaths : [];

    return (
      <Box flexDirection="column" marginTop={1}>
        <Text color="red">✗ {error.userMessage}</Text>
        {contextEntries.length > 0 && (
          <Box flexDirection="column" marginLeft={2}>
            {contextEntries.map(([key, value]) => (
              <Text key={key} dimColor>
                {key}: {isSensitiveKey(key) ? '***REDACTED***' : String(value)}
              </Text>
            ))}
          </Box>
        )}
        {partialPaths.length > 0 && (
          <Box flexDirection="column" marginLeft={2}>
            <Text dimColor>Left on disk:</Text>
            {partialPaths.map((p) => (
              <Text key={p} dimColor>
                {'  '}
                {p}
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
