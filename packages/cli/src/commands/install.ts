import { Command } from 'commander';
import { loadConfig, runInstall, validate } from '@packwright/core';
import { ErrorHandler } from '../utils/error-handler.js';
import { InstallOptionsSchema, collect } from '../utils/command-schemas.js';
import { OutputFormatter, createProgress } from '../utils/cli-helpers.js';
import { shutdown } from '../utils/shutdown.js';

export function createInstallCommand(): Command {
  return new Command('install')
    .description('Install components directly onto a target root')
    .argument('[component-ids...]', 'Components to install (all when omitted)')
    .requiredOption('--target <path>', 'Root of the target device')
    .option('--strict', 'Fail a component whose asset pattern matches several files')
    .option('--pin <id=tag>', 'Use a specific release tag for a component (repeatable)', collect)
    .option('--format <format>', 'Result format (table, json)', 'table')
    .action(async (componentIds: string[], options: unknown) => {
      const validated = validate(InstallOptionsSchema, options, 'command options');

      try {
        const installOptions = {
          config: loadConfig(process.env),
          targetRoot: validated.target,
          componentIds,
          resolutionMode: validated.strict ? ('strict' as const) : undefined,
          versions: validated.pin,
          signal: shutdown.signal,
        };

        if (validated.format === 'json') {
          const result = await runInstall(installOptions, createProgress(true));
          console.log(OutputFormatter.format(result, 'json'));
          if (result.failures.length > 0) process.exitCode = 1;
          return;
        }

        const { runInstallApp } = await import('./build-app.js');
        const result = await runInstallApp(installOptions);
        if (result && result.failures.length > 0) process.exitCode = 1;
      } catch (error) {
        if (validated.format === 'json') ErrorHandler.handleCliError(error);
        process.exitCode = ErrorHandler.getExitCode(error);
      }
    });
}
