import { Command } from 'commander';
import { loadConfig, runRefreshVersions, validate } from '@packwright/core';
import { ErrorHandler } from '../utils/error-handler.js';
import { RefreshOptionsSchema } from '../utils/command-schemas.js';
import { OutputFormatter, createProgress } from '../utils/cli-helpers.js';

export function createRefreshCommand(): Command {
  return new Command('refresh')
    .description('Look up the latest version of each component and cache it in the registry')
    .argument('[component-ids...]', 'Components to refresh (all when omitted)')
    .option('--format <format>', 'Result format (table, json, yaml)', 'table')
    .action(async (componentIds: string[], options: unknown) => {
      const validated = validate(RefreshOptionsSchema, options, 'command options');
      const structured = validated.format !== 'table';

      try {
        const result = await runRefreshVersions(
          { config: loadConfig(process.env), componentIds },
          createProgress(structured)
        );
        if (structured) {
          console.log(OutputFormatter.format(result, validated.format));
        } else {
          console.log(
            OutputFormatter.formatTable(
              result.refreshed.map((r) => ({
                component: r.componentId,
                previous: r.previousVersion ?? '',
                current: r.version ?? '',
                asset: r.filename,
              }))
            )
          );
        }
        if (result.failures.length > 0) process.exitCode = 1;
      } catch (error) {
        ErrorHandler.handleCliError(error);
      }
    });
}
