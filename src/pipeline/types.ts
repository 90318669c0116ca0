import type { MediaReference } from '../storage/models.js';

export const DEFAULT_WORD_COUNT = 3200;

export interface TopicRecord {
  readonly topic: string;
  readonly targetWordCount: number;
  readonly outline?: readonly string[];
  readonly category?: string;
  readonly tags?: readonly string[];
  readonly keywords?: readonly string[];
  readonly includeVideo?: boolean;
  readonly sourceRowId?: string;
}

export interface GenerationRequest {
  topic: string;
  targetWordCount: number;
  outline?: readonly string[];
  keywords?: readonly string[];
}

export interface GeneratedArticle {
  title: string;
  body: string;
  wordCount: number;
}

export interface MediaRequest {
  topic: string;
  category?: string;
  keywords?: readonly string[];
  includeVideo: boolean;
}

export interface PublishRequest {
  title: string;
  body: string;
  mediaReference: MediaReference | null;
  category?: string;
  tags: readonly string[];
  existingPostId?: string;
}

/** Fails with GenerationError. */
export interface Generator {
  generate(request: GenerationRequest): Promise<GeneratedArticle>;
}

/** Fails with MediaError. Video lookup failures never surface here. */
export interface MediaResolver {
  resolve(request: MediaRequest): Promise<MediaReference>;
}

/** Fails with PublishError. Updates `existingPostId` when given, creates a post otherwise. */
export interface Publisher {
  publish(request: PublishRequest): Promise<string>;
}

export type PipelineStatus = 'success' | 'skipped' | 'failed';

export interface PipelineResult {
  readonly status: PipelineStatus;
  readonly topic: string;
  readonly fingerprint: string;
  readonly sourceRowId?: string;
  readonly remotePostId?: string;
  readonly reason?: string;
  readonly attempts: number;
}

export interface RunFailure {
  readonly topic: string;
  readonly sourceRowId?: string;
  readonly reason: string;
}

export interface RunReport {
  readonly runId: string;
  readonly startedAt: Date;
  readonly finishedAt: Date;
  readonly cancelled: boolean;
  readonly counts: Readonly<Record<PipelineStatus | 'total', number>>;
  readonly results: readonly PipelineResult[];
  readonly failures: readonly RunFailure[];
}
