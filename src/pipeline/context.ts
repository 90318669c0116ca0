import type { ContentCache } from '../storage/models.js';
import type { RetryPolicy, Sleep } from './retry.js';
import type { Generator, MediaResolver, Publisher } from './types.js';

/**
 * Everything a pipeline task needs, passed explicitly to each task.
 */
export interface RunContext {
  cache: ContentCache;
  generator: Generator;
  mediaResolver: MediaResolver;
  publisher: Publisher;
  retryPolicy: RetryPolicy;
  /** Republish topics whose fingerprint is already published, updating the existing post. */
  force?: boolean;
  /** Checked between stages; an aborted signal stops the topic after its current stage is recorded. */
  signal?: AbortSignal;
  sleep?: Sleep;
}
