import { Command } from 'commander';
import { runInstallPack, validate } from '@packwright/core';
import { ErrorHandler } from '../utils/error-handler.js';
import { InstallPackOptionsSchema, collect } from '../utils/command-schemas.js';
import { OutputFormatter, createProgress } from '../utils/cli-helpers.js';

export function createInstallPackCommand(): Command {
  return new Command('install-pack')
    .description('Extract a built pack onto a target root and track its components')
    .argument('<pack-path>', 'Pack archive produced by the build command')
    .requiredOption('--target <path>', 'Root of the target device')
    .option('--clean <path>', 'Remove this path from the target first (repeatable)', collect)
    .option('--format <format>', 'Result format (table, json, yaml)', 'table')
    .action(async (packPath: string, options: unknown) => {
      const validated = validate(InstallPackOptionsSchema, options, 'command options');
      const structured = validated.format !== 'table';

      try {
        const result = await runInstallPack(
          { packPath, targetRoot: validated.target, cleanPaths: validated.clean },
          createProgress(structured)
        );
        if (structured) {
          console.log(OutputFormatter.format(result, validated.format));
          return;
        }
        console.log(
          OutputFormatter.formatTable(
            result.installed.map((c) => ({ component: c.componentId, files: c.files.length }))
          )
        );
      } catch (error) {
        ErrorHandler.handleCliError(error);
      }
    });
}
