import { resolve } from 'path';
import { loadConfig } from '../config/config.js';
import { SQLiteContentCache } from '../storage/sqlite.js';
import type { CacheEntry } from '../storage/models.js';

export interface StatusCommandOptions {
  config: string;
  limit: string;
}

export function formatCacheEntry(entry: CacheEntry): string {
  const post = entry.remotePostId ? `post ${entry.remotePostId}` : '-';
  return [
    entry.fingerprint.slice(0, 12),
    entry.stage.padEnd(14),
    post.padEnd(12),
    entry.updatedAt.toISOString(),
    entry.topic
  ].join('  ');
}

export function statusCommand(options: StatusCommandOptions): void {
  const config = loadConfig(resolve(options.config));
  const cache = new SQLiteContentCache(config.cache.fileName);
  cache.initialize();

  try {
    const entries = cache.list(Math.max(1, parseInt(options.limit, 10) || 50));
    if (entries.length === 0) {
      console.log('Content cache is empty.');
      return;
    }
    entries.forEach(entry => console.log(formatCacheEntry(entry)));
  } finally {
    cache.close();
  }
}
