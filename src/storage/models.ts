export const CACHE_STAGES = ['generated', 'media_resolved', 'published'] as const;

export type CacheStage = typeof CACHE_STAGES[number];

export function isCacheStage(value: string): value is CacheStage {
  return CACHE_STAGES.some(stage => stage === value);
}

/**
 * Position in the stage order. An absent entry counts as -1 (not started).
 */
export function stageRank(stage: CacheStage | null | undefined): number {
  return stage ? CACHE_STAGES.indexOf(stage) : -1;
}

export interface MediaImage {
  url: string;
  alt?: string;
  credit?: string;
}

/** Featured image fields, extra images placed inside the article, and a video embed. */
export interface MediaReference {
  imageUrl?: string;
  imageAlt?: string;
  imageCredit?: string;
  inlineImages?: MediaImage[];
  videoRef?: string;
}

export interface CacheEntry {
  fingerprint: string;
  topic: string;
  stage: CacheStage;
  articleTitle: string | null;
  articleBody: string | null;
  mediaReference: MediaReference | null;
  remotePostId: string | null;
  updatedAt: Date;
  attemptCount: number;
}

export type CacheEntryFields = Partial<Omit<CacheEntry, 'fingerprint' | 'stage' | 'updatedAt'>>;

export interface ContentCache {
  get(fingerprint: string): CacheEntry | null;

  /** Overwrites the entry. Refuses to move an existing entry to an earlier stage. */
  put(fingerprint: string, entry: Omit<CacheEntry, 'fingerprint' | 'updatedAt'>): CacheEntry;

  /**
   * Moves the entry strictly forward to `stage`, merging `fields` into it.
   * Throws StaleStageError when `stage` is not after the current one.
   */
  advance(fingerprint: string, stage: CacheStage, fields: CacheEntryFields): CacheEntry;

  list(limit?: number): CacheEntry[];
}
