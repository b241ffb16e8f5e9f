import React from 'react';
import { Box, Text } from 'ink';
import Spinner from 'ink-spinner';
import type { StepStatus } from '../hooks/use-pipeline.js';

interface Props {
  message: string;
  status: StepStatus;
}

const SETTLED: Record<Exclude<StepStatus, 'running' | 'section'>, { icon: string; color: string }> =
  {
    success: { icon: '✓', color: 'green' },
    fail: { icon: '✗', color: 'red' },
    warn: { icon: '⚠', color: 'yellow' },
    info: { icon: 'ℹ', color: 'blue' },
  };

export function ProgressStep({ message, status }: Props): React.ReactElement {
  switch (status) {
    case 'section':
      return (
        <Box marginTop={1}>
          <Text bold color="cyan">{`── ${message} ──`}</Text>
        </Box>
      );
    case 'running':
      return (
        <Text color="cyan">
          <Spinner type="dots" /> {message}
        </Text>
      );
    default: {
      const { icon, color } = SETTLED[status];
      return (
        <Text color={color}>
          {icon} {message}
        </Text>
      );
    }
  }
}
