import Database from 'better-sqlite3';
import type { Database as DatabaseType } from 'better-sqlite3';
import path from 'path';
import { mkdirSync } from 'fs';
import os from 'os';
import { z } from 'zod';
import { Logger } from '../utils/logger.js';
import { CacheIOError, StaleStageError } from '../errors.js';
import {
  isCacheStage,
  stageRank,
  type CacheEntry,
  type CacheEntryFields,
  type CacheStage,
  type ContentCache,
  type MediaReference
} from './models.js';

type CacheRow = {
  fingerprint: string;
  topic: string;
  stage: string;
  article_title: string | null;
  article_body: string | null;
  media_json: string | null;
  remote_post_id: string | null;
  attempt_count: number;
  updated_at: string;
};

const MediaReferenceSchema = z.object({
  imageUrl: z.string().optional(),
  imageAlt: z.string().optional(),
  imageCredit: z.string().optional(),
  inlineImages: z.array(z.object({
    url: z.string(),
    alt: z.string().optional(),
    credit: z.string().optional()
  })).optional(),
  videoRef: z.string().optional()
});

const logger = new Logger('Cache');

export const IN_MEMORY = ':memory:';

export function resolveCachePath(fileName: string): string {
  if (fileName === IN_MEMORY || path.isAbsolute(fileName)) {
    return fileName;
  }
  return path.join(os.homedir(), '.content-pipeline', fileName);
}

export class SQLiteContentCache implements ContentCache {
  private db: DatabaseType | null = null;
  private readonly dbPath: string;
  private readonly now: () => Date;

  constructor(fileName: string, options: { now?: () => Date } = {}) {
    this.dbPath = resolveCachePath(fileName);
    this.now = options.now ?? (() => new Date());
  }

  initialize(): void {
    try {
      if (this.dbPath !== IN_MEMORY) {
        mkdirSync(path.dirname(this.dbPath), { recursive: true });
      }

      this.db = new Database(this.dbPath);
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('synchronous = FULL');

      this.db.exec(`
        CREATE TABLE IF NOT EXISTS cache_entries (
          fingerprint TEXT PRIMARY KEY,
          topic TEXT NOT NULL,
          stage TEXT NOT NULL CHECK (stage IN ('generated','media_resolved','published')),
          article_title TEXT,
          article_body TEXT,
          media_json TEXT,
          remote_post_id TEXT,
          attempt_count INTEGER NOT NULL DEFAULT 0,
          updated_at DATETIME NOT NULL
        );

        CREATE INDEX IF NOT EXISTS idx_cache_entries_updated_at ON cache_entries (updated_at);
      `);

      logger.info(`Content cache initialized at ${this.dbPath}`);
    } catch (error) {
      this.db = null;
      logger.error('Failed to initialize content cache:', error);
      throw new CacheIOError(`Cannot open content cache at ${this.dbPath}`, { cause: error });
    }
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
      logger.info('Content cache closed');
    }
  }

  get(fingerprint: string): CacheEntry | null {
    return this.io(`read ${fingerprint}`, database => {
      const row = this.selectRow(database, fingerprint);
      return row ? this.mapRow(row) : null;
    });
  }

  put(fingerprint: string, entry: Omit<CacheEntry, 'fingerprint' | 'updatedAt'>): CacheEntry {
    return this.io(`write ${fingerprint}`, database => {
      const write = database.transaction(() => {
        const current = this.selectRow(database, fingerprint);
        if (current && isCacheStage(current.stage) && stageRank(entry.stage) < stageRank(current.stage)) {
          throw new StaleStageError(fingerprint, current.stage, entry.stage);
        }

        const next: CacheEntry = { ...entry, fingerprint, updatedAt: this.now() };
        this.upsert(database, next);
        return next;
      });

      return write.immediate();
    });
  }

  advance(fingerprint: string, stage: CacheStage, fields: CacheEntryFields): CacheEntry {
    return this.io(`advance ${fingerprint}`, database => {
      const write = database.transaction(() => {
        const row = this.selectRow(database, fingerprint);
        const current = row ? this.mapRow(row) : null;

        if (stageRank(stage) <= stageRank(current?.stage)) {
          throw new StaleStageError(fingerprint, current?.stage ?? 'new', stage);
        }

        const next: CacheEntry = {
          fingerprint,
          topic: fields.topic ?? current?.topic ?? '',
          stage,
          articleTitle: fields.articleTitle ?? current?.articleTitle ?? null,
          articleBody: fields.articleBody ?? current?.articleBody ?? null,
          mediaReference: fields.mediaReference !== undefined
            ? fields.mediaReference
            : current?.mediaReference ?? null,
          remotePostId: fields.remotePostId ?? current?.remotePostId ?? null,
          attemptCount: fields.attemptCount ?? current?.attemptCount ?? 0,
          updatedAt: this.now()
        };

        this.upsert(database, next);
        return next;
      });

      return write.immediate();
    });
  }

  list(limit = 50): CacheEntry[] {
    return this.io('list entries', database => {
      const rows = database
        .prepare<[number], CacheRow>(`
          SELECT * FROM cache_entries
          ORDER BY updated_at DESC
          LIMIT ?
        `)
        .all(limit);

      return rows.map(row => this.mapRow(row));
    });
  }

  private io<T>(operation: string, run: (database: DatabaseType) => T): T {
    const database = this.ensureDb();
    try {
      return run(database);
    } catch (error) {
      if (error instanceof StaleStageError || error instanceof CacheIOError) {
        throw error;
      }
      throw new CacheIOError(`Content cache failed to ${operation}`, { cause: error });
    }
  }

  private selectRow(database: DatabaseType, fingerprint: string): CacheRow | undefined {
    return database
      .prepare<[string], CacheRow>(`SELECT * FROM cache_entries WHERE fingerprint = ?`)
      .get(fingerprint);
  }

  private upsert(database: DatabaseType, entry: CacheEntry): void {
    database
      .prepare(`
        INSERT INTO cache_entries
          (fingerprint, topic, stage, article_title, article_body, media_json, remote_post_id, attempt_count, updated_at)
        VALUES
          (@fingerprint, @topic, @stage, @articleTitle, @articleBody, @mediaJson, @remotePostId, @attemptCount, @updatedAt)
        ON CONFLICT(fingerprint) DO UPDATE SET
          topic = excluded.topic,
          stage = excluded.stage,
          article_title = excluded.article_title,
          article_body = excluded.article_body,
          media_json = excluded.media_json,
          remote_post_id = excluded.remote_post_id,
          attempt_count = excluded.attempt_count,
          updated_at = excluded.updated_at
      `)
      .run({
        fingerprint: entry.fingerprint,
        topic: entry.topic,
        stage: entry.stage,
        articleTitle: entry.articleTitle,
        articleBody: entry.articleBody,
        mediaJson: entry.mediaReference ? JSON.stringify(entry.mediaReference) : null,
        remotePostId: entry.remotePostId,
        attemptCount: entry.attemptCount,
        updatedAt: entry.updatedAt.toISOString()
      });
  }

  private ensureDb(): DatabaseType {
    if (!this.db) {
      throw new CacheIOError('Content cache not initialized');
    }
    return this.db;
  }

  private mapRow(row: CacheRow): CacheEntry {
    if (!isCacheStage(row.stage)) {
      throw new CacheIOError(`Unknown stage '${row.stage}' stored for ${row.fingerprint}`);
    }

    return {
      fingerprint: row.fingerprint,
      topic: row.topic,
      stage: row.stage,
      articleTitle: row.article_title,
      articleBody: row.article_body,
      mediaReference: this.parseMedia(row.media_json),
      remotePostId: row.remote_post_id,
      attemptCount: row.attempt_count,
      updatedAt: new Date(row.updated_at)
    };
  }

  private parseMedia(json: string | null): MediaReference | null {
    if (!json) {
      return null;
    }
    const parsed = MediaReferenceSchema.safeParse(JSON.parse(json));
    if (!parsed.success) {
      throw new CacheIOError('Stored media reference is malformed');
    }
    return parsed.data;
  }
}
