import { Command } from 'commander';
import { runPurge, runRestore, runTrash, validate } from '@packwright/core';
import type {
  ComponentOperationResult,
  ProgressReporter,
  TrackerOperationOptions,
} from '@packwright/core';
import { ErrorHandler } from '../utils/error-handler.js';
import { TargetOptionsSchema } from '../utils/command-schemas.js';
import { OutputFormatter, createProgress } from '../utils/cli-helpers.js';

type TrackerPipeline = (
  options: TrackerOperationOptions,
  progress?: ProgressReporter
) => Promise<ComponentOperationResult[]>;

function createTrackerCommand(name: string, description: string, pipeline: TrackerPipeline): Command {
  return new Command(name)
    .description(description)
    .argument('<component-ids...>', 'Installed component ids')
    .requiredOption('--target <path>', 'Root of the target device')
    .option('--format <format>', 'Result format (table, json, yaml)', 'table')
    .action(async (componentIds: string[], options: unknown) => {
      const validated = validate(TargetOptionsSchema, options, 'command options');
      const structured = validated.format !== 'table';
      try {
        const results = await pipeline(
          { targetRoot: validated.target, componentIds },
          createProgress(structured)
        );
        if (structured) {
          console.log(OutputFormatter.format(results, validated.format));
        }
        if (results.some((r) => r.status === 'failed' || r.status === 'partial')) {
          process.exitCode = 1;
        }
      } catch (error) {
        ErrorHandler.handleCliError(error);
      }
    });
}

export function createTrashCommand(): Command {
  return createTrackerCommand(
    'trash',
    'Move installed components into the trash of their target root',
    runTrash
  );
}

export function createRestoreCommand(): Command {
  return createTrackerCommand('restore', 'Move trashed components back into place', runRestore);
}

export function createPurgeCommand(): Command {
  return createTrackerCommand('purge', 'Permanently delete trashed components', runPurge);
}
