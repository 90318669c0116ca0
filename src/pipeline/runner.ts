import { Logger } from '../utils/logger.js';
import { InvalidTopicError, StaleStageError, errorMessage } from '../errors.js';
import {
  stageRank,
  type CacheEntry,
  type CacheEntryFields,
  type CacheStage,
  type MediaReference
} from '../storage/models.js';
import { fingerprint } from './fingerprint.js';
import { retryWithBackoff, type RetryResult } from './retry.js';
import type { RunContext } from './context.js';
import type { PipelineResult, PipelineStatus, TopicRecord } from './types.js';

export type PipelineState =
  | 'NEW'
  | 'GENERATING'
  | 'GENERATED'
  | 'RESOLVING_MEDIA'
  | 'MEDIA_RESOLVED'
  | 'PUBLISHING'
  | 'PUBLISHED'
  | 'SKIPPED'
  | 'FAILED';

const RESUME_STATE: Record<CacheStage, PipelineState> = {
  generated: 'GENERATED',
  media_resolved: 'MEDIA_RESOLVED',
  published: 'PUBLISHED'
};

class StageFailure extends Error {}

/**
 * Drives one topic through generation, media resolution and publishing.
 * Each completed stage is written to the cache before the next one starts.
 */
export class PipelineRunner {
  private readonly logger = new Logger('Pipeline');

  constructor(private readonly context: RunContext) {}

  async run(record: TopicRecord): Promise<PipelineResult> {
    const run = new TopicRun(record, fingerprint(record), this.logger);

    try {
      this.validate(record);
    } catch (error) {
      return run.finish('failed', { reason: errorMessage(error) });
    }

    const cached = this.context.cache.get(run.fingerprint);
    run.resumeFrom(cached);

    if (cached?.stage === 'published') {
      if (!this.context.force) {
        return run.finish('skipped', {
          reason: 'already published',
          remotePostId: cached.remotePostId ?? undefined
        });
      }
      return this.republish(run, cached);
    }

    try {
      let entry = cached;

      if (stageRank(entry?.stage) < stageRank('generated')) {
        entry = await this.generate(run, entry);
        if (this.cancelled()) {
          return run.finish('skipped', { reason: 'cancelled after generated' });
        }
      }

      if (stageRank(entry?.stage) < stageRank('media_resolved')) {
        entry = await this.resolveMedia(run, entry);
        if (this.cancelled()) {
          return run.finish('skipped', { reason: 'cancelled after media_resolved' });
        }
      }

      entry = await this.publish(run, entry);
      return run.finish('success', { remotePostId: entry.remotePostId ?? undefined });
    } catch (error) {
      if (error instanceof StageFailure) {
        return run.finish('failed', { reason: error.message });
      }
      if (error instanceof StaleStageError) {
        this.logger.error(`${run.label} Cache conflict, another run may be processing this topic:`, error);
        return run.finish('failed', { reason: error.message });
      }
      throw error;
    }
  }

  private validate(record: TopicRecord): void {
    if (!record.topic.trim()) {
      throw new InvalidTopicError('Topic is empty');
    }
    if (!Number.isInteger(record.targetWordCount) || record.targetWordCount <= 0) {
      throw new InvalidTopicError(`Invalid target word count: ${record.targetWordCount}`);
    }
  }

  private async generate(run: TopicRun, entry: CacheEntry | null): Promise<CacheEntry> {
    const { record } = run;
    run.transition('GENERATING');

    const article = run.expect('generate', await this.call(run, 'generate', () => this.context.generator.generate({
      topic: record.topic,
      targetWordCount: record.targetWordCount,
      outline: record.outline,
      keywords: record.keywords
    })));

    const next = this.advance(run, entry, 'generated', {
      topic: record.topic,
      articleTitle: article.title,
      articleBody: article.body
    });
    run.transition('GENERATED');
    return next;
  }

  private async resolveMedia(run: TopicRun, entry: CacheEntry | null): Promise<CacheEntry> {
    const { record } = run;
    run.transition('RESOLVING_MEDIA');

    const result = await this.call(run, 'resolve media', () => this.context.mediaResolver.resolve({
      topic: record.topic,
      category: record.category,
      keywords: record.keywords,
      includeVideo: record.includeVideo ?? false
    }));

    let mediaReference: MediaReference | null = null;
    if (result.ok) {
      mediaReference = Object.keys(result.value).length > 0 ? result.value : null;
    } else {
      // Media is optional: publish without it
      this.logger.warn(`${run.label} Continuing without media: ${result.error.message}`);
    }

    const next = this.advance(run, entry, 'media_resolved', { mediaReference });
    run.transition('MEDIA_RESOLVED');
    return next;
  }

  private async publish(run: TopicRun, entry: CacheEntry | null): Promise<CacheEntry> {
    const { record } = run;
    const body = entry?.articleBody;
    if (!entry || !body) {
      throw new StageFailure('Cached entry has no article body to publish');
    }
    const { articleTitle, mediaReference } = entry;
    run.transition('PUBLISHING');

    const remotePostId = run.expect('publish', await this.call(run, 'publish', () => this.context.publisher.publish({
      title: articleTitle || record.topic,
      body,
      mediaReference,
      category: record.category,
      tags: record.tags ?? []
    })));

    const next = this.advance(run, entry, 'published', { remotePostId });
    run.transition('PUBLISHED');
    return next;
  }

  private async republish(run: TopicRun, cached: CacheEntry): Promise<PipelineResult> {
    const { record } = run;
    run.transition('PUBLISHING');

    const result = await this.call(run, 'update post', () => this.context.publisher.publish({
      title: cached.articleTitle || record.topic,
      body: cached.articleBody ?? '',
      mediaReference: cached.mediaReference,
      category: record.category,
      tags: record.tags ?? [],
      existingPostId: cached.remotePostId ?? undefined
    }));

    if (!result.ok) {
      return run.finish('failed', { reason: run.describeFailure('update post', result) });
    }

    this.context.cache.put(run.fingerprint, {
      topic: cached.topic,
      stage: 'published',
      articleTitle: cached.articleTitle,
      articleBody: cached.articleBody,
      mediaReference: cached.mediaReference,
      remotePostId: result.value,
      attemptCount: run.totalAttempts
    });
    run.transition('PUBLISHED');
    return run.finish('success', { remotePostId: result.value });
  }

  private call<T>(run: TopicRun, operation: string, fn: () => Promise<T>): Promise<RetryResult<T>> {
    return retryWithBackoff(fn, this.context.retryPolicy, {
      sleep: this.context.sleep,
      onRetry: (error, attemptNumber, delayMs) => {
        this.logger.warn(
          `${run.label} ${operation} attempt ${attemptNumber}/${this.context.retryPolicy.maxAttempts} failed, retrying in ${delayMs}ms: ${error.message}`
        );
      }
    }).then(result => {
      run.attempts += result.attempts;
      return result;
    });
  }

  private advance(run: TopicRun, entry: CacheEntry | null, stage: CacheStage, fields: CacheEntryFields): CacheEntry {
    return this.context.cache.advance(run.fingerprint, stage, {
      ...fields,
      topic: entry?.topic ?? run.record.topic,
      attemptCount: run.totalAttempts
    });
  }

  private cancelled(): boolean {
    return this.context.signal?.aborted ?? false;
  }
}

class TopicRun {
  readonly label: string;
  attempts = 0;
  private state: PipelineState = 'NEW';
  private previousAttempts = 0;

  constructor(
    readonly record: TopicRecord,
    readonly fingerprint: string,
    private readonly logger: Logger
  ) {
    this.label = record.sourceRowId ? `[${record.sourceRowId}] '${record.topic}'` : `'${record.topic}'`;
  }

  get totalAttempts(): number {
    return this.previousAttempts + this.attempts;
  }

  resumeFrom(entry: CacheEntry | null): void {
    if (!entry) {
      return;
    }
    this.previousAttempts = entry.attemptCount;
    if (entry.stage !== 'published') {
      this.logger.info(`${this.label} Resuming from stage '${entry.stage}'`);
    }
    this.state = RESUME_STATE[entry.stage];
  }

  transition(next: PipelineState): void {
    this.logger.debug(`${this.label} ${this.state} -> ${next}`);
    this.state = next;
  }

  expect<T>(operation: string, result: RetryResult<T>): T {
    if (result.ok) {
      return result.value;
    }
    throw new StageFailure(this.describeFailure(operation, result));
  }

  describeFailure(operation: string, result: { error: Error; attempts: number; exhausted: boolean }): string {
    const suffix = result.exhausted ? ` (gave up after ${result.attempts} attempts)` : '';
    return `${operation} failed: ${result.error.message}${suffix}`;
  }

  finish(
    status: PipelineStatus,
    details: { remotePostId?: string; reason?: string } = {}
  ): PipelineResult {
    const terminal: Record<PipelineStatus, PipelineState> = {
      success: 'PUBLISHED',
      skipped: 'SKIPPED',
      failed: 'FAILED'
    };
    if (this.state !== terminal[status]) {
      this.transition(terminal[status]);
    }

    const result: PipelineResult = {
      status,
      topic: this.record.topic,
      fingerprint: this.fingerprint,
      attempts: this.attempts,
      ...(this.record.sourceRowId ? { sourceRowId: this.record.sourceRowId } : {}),
      ...(details.remotePostId ? { remotePostId: details.remotePostId } : {}),
      ...(details.reason ? { reason: details.reason } : {})
    };

    switch (status) {
      case 'success':
        this.logger.info(`${this.label} Published as post ${details.remotePostId}`);
        break;
      case 'skipped':
        this.logger.info(`${this.label} Skipped: ${details.reason}`);
        break;
      case 'failed':
        this.logger.error(`${this.label} Failed: ${details.reason}`);
        break;
    }

    return Object.freeze(result);
  }
}
