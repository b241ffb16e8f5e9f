import { Command } from 'commander';
import { loadConfig, runComponents, validate } from '@packwright/core';
import type { ComponentsOptions } from '@packwright/core';
import { ErrorHandler } from '../utils/error-handler.js';
import { ComponentsOptionsSchema } from '../utils/command-schemas.js';
import { OutputFormatter } from '../utils/cli-helpers.js';

export function createComponentsCommand(): Command {
  return new Command('components')
    .description('Show component definitions from the registry')
    .argument('[component-ids...]', 'Components to show (all when omitted)')
    .option('--category <name>', 'Only show components in this category')
    .option('--format <format>', 'Result format (table, json, yaml)', 'table')
    .action(async (componentIds: string[], options: unknown) => {
      const validated = validate(ComponentsOptionsSchema, options, 'command options');
      const structured = validated.format !== 'table';

      try {
        const query: ComponentsOptions = {
          config: loadConfig(process.env),
          componentIds,
          category: validated.category,
        };
        if (validated.format === 'table') {
          const { runComponentsApp } = await import('./components-app.js');
          await runComponentsApp(query);
        } else {
          console.log(OutputFormatter.format(await runComponents(query), validated.format));
        }
      } catch (error) {
        if (structured) ErrorHandler.handleCliError(error);
        process.exitCode = ErrorHandler.getExitCode(error);
      }
    });
}
