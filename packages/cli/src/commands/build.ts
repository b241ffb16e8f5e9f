import { Command } from 'commander';
import { loadConfig, runBuild, validate } from '@packwright/core';
import { ErrorHandler } from '../utils/error-handler.js';
import { BuildOptionsSchema, collect } from '../utils/command-schemas.js';
import { OutputFormatter, createProgress } from '../utils/cli-helpers.js';
import { shutdown } from '../utils/shutdown.js';

export function createBuildCommand(): Command {
  return new Command('build')
    .description('Bundle components into a distributable pack archive')
    .argument('[component-ids...]', 'Components to bundle (all when omitted)')
    .option('--comment <text>', 'Note added to the pack summary')
    .option('--strict', 'Fail a component whose asset pattern matches several files')
    .option('--pin <id=tag>', 'Use a specific release tag for a component (repeatable)', collect)
    .option('--format <format>', 'Result format (table, json)', 'table')
    .action(async (componentIds: string[], options: unknown) => {
      const validated = validate(BuildOptionsSchema, options, 'command options');

      try {
        const buildOptions = {
          config: loadConfig(process.env),
          componentIds,
          comment: validated.comment,
          resolutionMode: validated.strict ? ('strict' as const) : undefined,
          versions: validated.pin,
          signal: shutdown.signal,
        };

        if (validated.format === 'json') {
          const result = await runBuild(buildOptions, createProgress(true));
          console.log(OutputFormatter.format(result, 'json'));
          if (result.failures.length > 0) process.exitCode = 1;
          return;
        }

        const { runBuildApp } = await import('./build-app.js');
        const result = await runBuildApp(buildOptions);
        if (result && result.failures.length > 0) process.exitCode = 1;
      } catch (error) {
        if (validated.format === 'json') ErrorHandler.handleCliError(error);
        process.exitCode = ErrorHandler.getExitCode(error);
      }
    });
}
