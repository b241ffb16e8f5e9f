import { Command } from 'commander';
import { runListInstalled, runListTrashed, validate } from '@packwright/core';
import { ErrorHandler } from '../utils/error-handler.js';
import { TargetOptionsSchema } from '../utils/command-schemas.js';
import { OutputFormatter } from '../utils/cli-helpers.js';

function formatTime(epochMs: number): string {
  return new Date(epochMs).toISOString().replace('T', ' ').slice(0, 19);
}

export function createInstalledCommand(): Command {
  return new Command('installed')
    .description('List components installed on a target root')
    .requiredOption('--target <path>', 'Root of the target device')
    .option('--format <format>', 'Result format (table, json, yaml)', 'table')
    .action(async (options: unknown) => {
      const validated = validate(TargetOptionsSchema, options, 'command options');
      try {
        const entries = await runListInstalled({ targetRoot: validated.target });
        if (validated.format !== 'table') {
          console.log(OutputFormatter.format(entries, validated.format));
          return;
        }
        console.log(
          OutputFormatter.formatTable(
            entries.map((e) => ({
              component: e.componentId,
              name: e.name ?? '',
              version: e.version ?? '',
              installed: formatTime(e.installedAt),
              files: e.ownedPaths.length,
            }))
          )
        );
      } catch (error) {
        ErrorHandler.handleCliError(error);
      }
    });
}

export function createTrashedCommand(): Command {
  return new Command('trashed')
    .description('List components waiting in the trash of a target root')
    .requiredOption('--target <path>', 'Root of the target device')
    .option('--format <format>', 'Result format (table, json, yaml)', 'table')
    .action(async (options: unknown) => {
      const validated = validate(TargetOptionsSchema, options, 'command options');
      try {
        const trashed = await runListTrashed({ targetRoot: validated.target });
        if (validated.format !== 'table') {
          console.log(OutputFormatter.format(trashed, validated.format));
          return;
        }
        console.log(
          OutputFormatter.formatTable(
            trashed.map((t) => ({
              component: t.componentId,
              name: t.snapshot?.name ?? '',
              trashed: formatTime(t.movedAt),
              files: t.entries.filter((e) => !e.missing).length,
            }))
          )
        );
      } catch (error) {
        ErrorHandler.handleCliError(error);
      }
    });
}
