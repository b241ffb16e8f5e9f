import React, { useEffect, useState } from 'react';
import { Box, render, useApp } from 'ink';
import type { ProgressReporter } from '@packwright/core';
import { usePipeline } from './hooks/use-pipeline.js';
import { StagePipeline } from './components/stage-pipeline.js';
import { ErrorDisplay } from './components/error-display.js';

type Settled<T> = { ok: true; value: T } | { ok: false; error: unknown };

interface Props<T> {
  run: (reporter: ProgressReporter) => Promise<T>;
  summary: (value: T) => React.ReactNode;
  onSettled: (settled: Settled<T>) => void;
}

function PipelineApp<T>({ run, summary, onSettled }: Props<T>): React.ReactElement {
  const { reporter, ...log } = usePipeline();
  const [settled, setSettled] = useState<Settled<T> | null>(null);
  const { exit } = useApp();

  useEffect(() => {
    const finish = (outcome: Settled<T>): void => {
      onSettled(outcome);
      setSettled(outcome);
    };
    void run(reporter).then(
      (value) => finish({ ok: true, value }),
      (error: unknown) => finish({ ok: false, error })
    );
    // eslint-disable-next-line react-hooks/exhaustive-deps -- run pipeline once on mount
  }, []);

  useEffect(() => {
    // eslint-disable-next-line react-you-might-not-need-an-effect/no-event-handler -- Ink requires useEffect to exit the app after async pipeline completes
    if (settled) exit();
  }, [settled, exit]);

  return (
    <Box flexDirection="column">
      <StagePipeline log={log} done={settled !== null} />
      {settled?.ok ? summary(settled.value) : null}
      {settled && !settled.ok ? <ErrorDisplay error={settled.error} /> : null}
    </Box>
  );
}

/**
 * Run a pipeline under a live Ink view and resolve with its result once the
 * view has exited. A pipeline error is shown, then rethrown for the exit code.
 * Resolves undefined when the view exits before the pipeline settles.
 */
export async function renderPipeline<T>(
  run: (reporter: ProgressReporter) => Promise<T>,
  summary: (value: T) => React.ReactNode
): Promise<T | undefined> {
  const box: { settled?: Settled<T> } = {};
  const { waitUntilExit } = render(
    <PipelineApp
      run={run}
      summary={summary}
      onSettled={(settled) => {
        box.settled = settled;
      }}
    />
  );
  await waitUntilExit();

  const { settled } = box;
  if (!settled) return undefined;
  if (!settled.ok) {
    throw settled.error instanceof Error ? settled.error : new Error(String(settled.error));
  }
  return settled.value;
}
