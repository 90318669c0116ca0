import type * as cliProgress from 'cli-progress';
import { CacheIOError, errorMessage } from '../errors.js';
import type { RunContext } from '../pipeline/context.js';
import { fingerprint } from '../pipeline/fingerprint.js';
import { buildRunReport, formatRunSummary } from '../pipeline/report.js';
import { PipelineRunner } from '../pipeline/runner.js';
import type { PipelineResult, RunReport, TopicRecord } from '../pipeline/types.js';
import { BaseProcessorService } from './base-processor.js';

export interface BatchRunOptions {
  maxConcurrency: number;
  /** Known number of topics; enables the progress bar. */
  expectedTotal?: number;
  showProgress?: boolean;
}

export class BatchOrchestrator extends BaseProcessorService<TopicRecord> {
  private readonly context: Omit<RunContext, 'signal'>;
  private runner: PipelineRunner | null = null;
  private abortController: AbortController | null = null;
  private results = new Map<number, PipelineResult>();
  private inFlight = new Map<string, Promise<PipelineResult>>();
  private progress: cliProgress.SingleBar | null = null;

  constructor(context: Omit<RunContext, 'signal'>) {
    super({ serviceName: 'Batch' });
    this.context = context;
  }

  /**
   * Stops dispatching topics. Topics in flight finish their current stage,
   * record it, and are reported as skipped.
   */
  cancel(): void {
    if (!this.abortController || this.abortController.signal.aborted) {
      return;
    }
    this.logger.warn('Cancellation requested');
    this.abortController.abort();
    this.stop();
  }

  async run(topics: Iterable<TopicRecord> | AsyncIterable<TopicRecord>, options: BatchRunOptions): Promise<RunReport> {
    const startedAt = new Date();
    this.abortController = new AbortController();
    this.runner = new PipelineRunner({ ...this.context, signal: this.abortController.signal });
    this.results = new Map();
    this.inFlight = new Map();

    this.logger.info(`Starting batch with concurrency ${options.maxConcurrency}${this.context.force ? ' (force republish)' : ''}`);

    if (options.showProgress && options.expectedTotal) {
      this.progress = this.logger.createProgress(options.expectedTotal, 'Publishing');
    }

    try {
      await this.processAll(topics, options.maxConcurrency);
    } finally {
      this.logger.stopProgress();
      this.progress = null;
    }

    const report = buildRunReport({
      results: [...this.results.entries()]
        .sort(([a], [b]) => a - b)
        .map(([, result]) => result),
      startedAt,
      cancelled: this.abortController.signal.aborted
    });

    this.abortController = null;
    this.runner = null;

    this.logger.info(formatRunSummary(report));
    return report;
  }

  /**
   * Topics sharing a fingerprint run one after another, so a duplicate row
   * resolves from the cache instead of generating and publishing again.
   */
  protected async processTask(task: TopicRecord, index: number, workerId: number): Promise<void> {
    const key = fingerprint(task);
    const current = this.runAfter(this.inFlight.get(key), task, workerId);
    this.inFlight.set(key, current);

    try {
      this.record(index, await current);
    } finally {
      if (this.inFlight.get(key) === current) {
        this.inFlight.delete(key);
      }
    }
  }

  private async runAfter(previous: Promise<PipelineResult> | undefined, task: TopicRecord, workerId: number): Promise<PipelineResult> {
    if (previous) {
      this.logger.debug(`[Worker ${workerId}] Waiting for a duplicate of '${task.topic}' to finish`);
      // The earlier task records its own outcome
      await Promise.allSettled([previous]);
    }
    if (!this.runner) {
      throw new Error('Batch runner not initialized');
    }
    return this.runner.run(task);
  }

  protected async handleTaskError(task: TopicRecord, index: number, error: unknown, workerId: number): Promise<void> {
    if (error instanceof CacheIOError) {
      this.logger.error(`[Worker ${workerId}] Content cache unavailable, aborting run:`, error);
      throw error;
    }

    // Anything unexpected stays local to the topic
    this.logger.error(`[Worker ${workerId}] Unexpected error for '${task.topic}':`, error);
    const result: PipelineResult = {
      status: 'failed',
      topic: task.topic,
      fingerprint: fingerprint(task),
      ...(task.sourceRowId ? { sourceRowId: task.sourceRowId } : {}),
      reason: errorMessage(error),
      attempts: 0
    };
    this.record(index, Object.freeze(result));
  }

  private record(index: number, result: PipelineResult): void {
    this.results.set(index, result);
    this.progress?.increment();
  }
}
