import React from 'react';
import { Box, Static, Text } from 'ink';
import { ProgressStep } from './progress-step.js';
import type { PipelineLog } from '../hooks/use-pipeline.js';

interface Props {
  log: PipelineLog;
  /** Print the warning and failure tally once the pipeline is over. */
  done?: boolean;
}

/**
 * Finished steps go to <Static> so they stay in the scrollback; only the
 * step still running is redrawn.
 */
export function StagePipeline({ log, done = false }: Props): React.ReactElement {
  const settled = log.steps.filter((s) => s.status !== 'running');
  const running = log.steps.findLast((s) => s.status === 'running');
  const tally = [
    log.warnings > 0 ? `${String(log.warnings)} warning(s)` : '',
    log.failures > 0 ? `${String(log.failures)} failure(s)` : '',
  ].filter(Boolean);

  return (
    <Box flexDirection="column">
      <Static items={settled}>
        {(step) => <ProgressStep key={step.id} message={step.message} status={step.status} />}
      </Static>
      {running && !done ? <ProgressStep message={running.message} status="running" /> : null}
      {done && tally.length > 0 ? (
        <Text color={log.failures > 0 ? 'red' : 'yellow'}>{tally.join(', ')}</Text>
      ) : null}
    </Box>
  );
}
