import { useMemo, useReducer } from 'react';
import type { ProgressReporter } from '@packwright/core';

export type StepStatus = 'running' | 'success' | 'fail' | 'warn' | 'info' | 'section';

export interface PipelineStep {
  id: number;
  message: string;
  status: StepStatus;
}

export interface PipelineLog {
  steps: PipelineStep[];
  warnings: number;
  failures: number;
}

export interface ProgressEvent {
  kind: keyof ProgressReporter;
  message: string;
}

export const EMPTY_LOG: PipelineLog = { steps: [], warnings: 0, failures: 0 };

const STATUS_BY_KIND: Record<ProgressEvent['kind'], StepStatus> = {
  section: 'section',
  start: 'running',
  succeed: 'success',
  fail: 'fail',
  warn: 'warn',
  info: 'info',
};

function nextId(steps: PipelineStep[]): number {
  return (steps.at(-1)?.id ?? -1) + 1;
}

/**
 * Fold one reporter call into the log. `succeed` and `fail` close the most
 * recent running step; a component that fails before it ever started (a
 * download error, say) gets a step of its own.
 */
export function reduceProgress(log: PipelineLog, event: ProgressEvent): PipelineLog {
  const status = STATUS_BY_KIND[event.kind];
  const warnings = log.warnings + (status === 'warn' ? 1 : 0);
  const failures = log.failures + (status === 'fail' ? 1 : 0);

  if (status === 'success' || status === 'fail') {
    const open = log.steps.findLastIndex((s) => s.status === 'running');
    const existing = log.steps[open];
    if (existing) {
      const steps = [...log.steps];
      steps[open] = { ...existing, message: event.message, status };
      return { steps, warnings, failures };
    }
  }

  const step: PipelineStep = { id: nextId(log.steps), message: event.message, status };
  return { steps: [...log.steps, step], warnings, failures };
}

/** Pipeline log state plus a stable reporter that async pipelines can hold on to. */
export function usePipeline(): PipelineLog & { reporter: ProgressReporter } {
  const [log, dispatch] = useReducer(reduceProgress, EMPTY_LOG);

  const reporter = useMemo<ProgressReporter>(() => {
    const emit =
      (kind: ProgressEvent['kind']) =>
      (message: string): void => {
        dispatch({ kind, message });
      };
    return {
      section: emit('section'),
      start: emit('start'),
      succeed: emit('succeed'),
      fail: emit('fail'),
      warn: emit('warn'),
      info: emit('info'),
    };
  }, []);

  return { ...log, reporter };
}
