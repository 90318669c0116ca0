#!/usr/bin/env node
import { Command } from 'commander';
import { runCommand, type RunCommandOptions } from './commands/run.js';
import { statusCommand, type StatusCommandOptions } from './commands/status.js';
import { sampleCommand } from './commands/sample.js';
import { errorMessage } from './errors.js';
import { EXIT_CODES } from './pipeline/report.js';
import { Logger } from './utils/logger.js';

const logger = new Logger('Main');

const DEFAULT_CONFIG = 'config/pipeline.yaml';

const program = new Command();

program
  .name('content-pipeline')
  .description('Generate, illustrate and publish blog articles from a topics spreadsheet')
  .version('1.0.0');

program
  .command('run')
  .description('Run every topic in a CSV or XLSX file through the pipeline')
  .argument('<input>', 'Topics file (.csv or .xlsx)')
  .option('-c, --config <file>', 'Pipeline configuration file', DEFAULT_CONFIG)
  .option('-n, --concurrency <count>', 'Topics processed in parallel (overrides config)')
  .option('--force', 'Republish topics that were already published, updating the existing posts')
  .option('--report <file>', 'Write the run report as JSON')
  .option('--no-progress', 'Disable the progress bar')
  .action(async (input: string, options: RunCommandOptions) => {
    process.exitCode = await runCommand(input, options);
  });

program
  .command('status')
  .description('List content cache entries, most recent first')
  .option('-c, --config <file>', 'Pipeline configuration file', DEFAULT_CONFIG)
  .option('-l, --limit <count>', 'Number of entries to show', '50')
  .action((options: StatusCommandOptions) => {
    statusCommand(options);
  });

program
  .command('sample')
  .description('Write a sample topics.csv')
  .argument('[dir]', 'Output directory', '.')
  .action(async (dir: string) => {
    await sampleCommand(dir);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error(`💥 ${errorMessage(error)}`);
  process.exitCode = EXIT_CODES.fatal;
});
