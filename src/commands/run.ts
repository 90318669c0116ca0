import { resolve } from 'path';
import { loadConfig } from '../config/config.js';
import { ConfigError } from '../errors.js';
import { EXIT_CODES, exitCodeFor, writeRunReport } from '../pipeline/report.js';
import { BatchOrchestrator } from '../services/batch-orchestrator.js';
import { createCollaborators } from '../services/collaborators.js';
import { openTopicSource } from '../sources/index.js';
import { SQLiteContentCache } from '../storage/sqlite.js';
import { Logger } from '../utils/logger.js';

const logger = new Logger('Run');

export interface RunCommandOptions {
  config: string;
  concurrency?: string;
  force?: boolean;
  report?: string;
  progress: boolean;
}

function parseConcurrency(value: string | undefined, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigError(`Concurrency must be a positive integer, got '${value}'`);
  }
  return parsed;
}

export async function runCommand(input: string, options: RunCommandOptions): Promise<number> {
  const config = loadConfig(resolve(options.config));
  const maxConcurrency = parseConcurrency(options.concurrency, config.batch.concurrency);
  const source = openTopicSource(resolve(input), { defaultWordCount: config.generation.defaultWordCount });

  const cache = new SQLiteContentCache(config.cache.fileName);
  cache.initialize();

  const orchestrator = new BatchOrchestrator({
    cache,
    ...createCollaborators(config),
    retryPolicy: config.retry,
    force: options.force ?? false
  });

  let interrupts = 0;
  const onSignal = (signal: NodeJS.Signals) => {
    interrupts++;
    if (interrupts > 1) {
      logger.error(`Received ${signal} again, exiting without waiting for topics in flight`);
      process.exit(EXIT_CODES.cancelled);
    }
    logger.warn(`🛑 Received ${signal}, finishing topics in flight (press again to force quit)`);
    orchestrator.cancel();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    const showProgress = options.progress && process.stdout.isTTY === true;
    const expectedTotal = showProgress
      ? await logger.withOperation(`Reading topics from ${input}`, () => source.count(), {
        successMessage: total => `Found ${total} topics`
      })
      : undefined;

    const report = await orchestrator.run(source, { maxConcurrency, expectedTotal, showProgress });

    if (options.report) {
      await writeRunReport(options.report, report);
      logger.info(`Run report written to ${options.report}`);
    }

    return exitCodeFor(report);
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    cache.close();
  }
}
