#!/usr/bin/env node
import { Command } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { Logger } from './utils/cli-helpers.js';
import { createRunCommand } from './commands/run.js';
import { createListenCommand } from './commands/listen.js';
import { createStepSizeCommand } from './commands/step-size.js';
import { PackageJsonSchema, validate } from '@parloop/core';

function setupSignalHandlers(): void {
  const handleShutdown = (signal: string) => {
    Logger.warn(`Received ${signal}, shutting down...`);
    process.exit(0);
  };
  process.on('SIGINT', () => handleShutdown('SIGINT'));
  process.on('SIGTERM', () => handleShutdown('SIGTERM'));
  process.on('uncaughtException', (error) => {
    Logger.fail('Uncaught Exception:');
    console.error(error);
    process.exit(1);
  });
  process.on('unhandledRejection', (reason, promise) => {
    Logger.fail('Unhandled Promise Rejection:');
    console.error('Promise:', promise);
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
const version = packageJson.version;

setupSignalHandlers();

const program = new Command();
program
  .name('parloop')
  .description('Live progress for loops split across parallel workers')
  .version(version);

program.addCommand(createRunCommand());
program.addCommand(createListenCommand());
program.addCommand(createStepSizeCommand());

await program.parseAsync();
