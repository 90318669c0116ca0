import { createHash } from 'crypto';
import type { TopicRecord } from './types.js';

type FingerprintInput = Pick<TopicRecord, 'topic' | 'targetWordCount' | 'outline'>;

function normalizeText(value: string): string {
  return value.trim().replace(/\s+/g, ' ');
}

/**
 * Cache key for a generation request. Only the fields that change the
 * generated article take part; category, tags and keywords do not.
 */
export function fingerprint(record: FingerprintInput): string {
  const normalized = {
    topic: normalizeText(record.topic).toLowerCase(),
    targetWordCount: record.targetWordCount,
    outline: (record.outline ?? []).map(normalizeText).filter(Boolean)
  };

  return createHash('sha256').update(JSON.stringify(normalized)).digest('hex');
}
