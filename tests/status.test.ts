import { describe, expect, it } from 'vitest';
import { formatCacheEntry } from '../src/commands/status.js';

describe('formatCacheEntry', () => {
  it('shows the short fingerprint, stage, post and topic', () => {
    const line = formatCacheEntry({
      fingerprint: 'abcdef0123456789'.repeat(4),
      topic: 'Indoor Plants',
      stage: 'published',
      articleTitle: 'Title',
      articleBody: '<p>Body</p>',
      mediaReference: null,
      remotePostId: '42',
      attemptCount: 3,
      updatedAt: new Date('2026-01-02T03:04:05.000Z')
    });

    expect(line).toBe('abcdef012345  published       post 42       2026-01-02T03:04:05.000Z  Indoor Plants');
  });

  it('shows a dash for entries that are not published yet', () => {
    const line = formatCacheEntry({
      fingerprint: 'f'.repeat(64),
      topic: 'Ferns',
      stage: 'generated',
      articleTitle: null,
      articleBody: null,
      mediaReference: null,
      remotePostId: null,
      attemptCount: 1,
      updatedAt: new Date('2026-01-02T03:04:05.000Z')
    });

    expect(line.split(/\s{2,}/)).toEqual([
      'ffffffffffff',
      'generated',
      '-',
      '2026-01-02T03:04:05.000Z',
      'Ferns'
    ]);
  });
});
