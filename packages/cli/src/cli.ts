#!/usr/bin/env node
import * as dotenv from 'dotenv';
import { Command } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { Logger } from './utils/cli-helpers.js';
import { ErrorHandler } from './utils/error-handler.js';
import { shutdown } from './utils/shutdown.js';
import { createComponentsCommand } from './commands/components.js';
import { createRefreshCommand } from './commands/refresh.js';
import { createBuildCommand } from './commands/build.js';
import { createInstallCommand } from './commands/install.js';
import { createInstallPackCommand } from './commands/install-pack.js';
import { createInstalledCommand, createTrashedCommand } from './commands/installed.js';
import {
  createTrashCommand,
  createRestoreCommand,
  createPurgeCommand,
} from './commands/trash.js';
import { PackageJsonSchema, validate } from '@packwright/core';

function setupSignalHandlers(): void {
  process.on('SIGINT', () => shutdown.handle('SIGINT'));
  process.on('SIGTERM', () => shutdown.handle('SIGTERM'));
  process.on('uncaughtException', (error) => {
    Logger.fail('Uncaught Exception:');
    console.error(error);
    process.exit(1);
  });
  process.on('unhandledRejection', (reason) => {
    Logger.fail('Unhandled Promise Rejection:');
    console.error('Reason:', reason);
    process.exit(1);
  });
}

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Read the CLI package's own version
const packageJson = validate(
  PackageJsonSchema,
  JSON.parse(readFileSync(join(__dirname, '../package.json'), 'utf-8')),
  'PackageJson'
);

dotenv.config();
setupSignalHandlers();

const program = new Command();
program
  .name('packwright')
  .description('Assemble and maintain SD card trees from versioned, remotely hosted components')
  .version(packageJson.version);

program.addCommand(createComponentsCommand());
program.addCommand(createRefreshCommand());
program.addCommand(createBuildCommand());
program.addCommand(createInstallCommand());
program.addCommand(createInstallPackCommand());
program.addCommand(createInstalledCommand());
program.addCommand(createTrashedCommand());
program.addCommand(createTrashCommand());
program.addCommand(createRestoreCommand());
program.addCommand(createPurgeCommand());

program.parseAsync().catch((error: unknown) => {
  ErrorHandler.handleCliError(error);
});
