import { existsSync } from 'fs';
import { z } from 'zod';
import { TopicSourceError } from '../errors.js';
import { DEFAULT_WORD_COUNT, type TopicRecord } from '../pipeline/types.js';
import type { Logger } from '../utils/logger.js';

export type TopicRow = Record<string, string>;

export interface TopicSourceOptions {
  defaultWordCount?: number;
}

const OutlineJsonSchema = z.union([
  z.array(z.string()),
  z.object({
    sections: z.array(z.object({
      title: z.string(),
      subsections: z.array(z.string()).optional()
    }))
  })
]);

export function normalizeHeader(header: string): string {
  return header.trim().toLowerCase().replace(/[\s-]+/g, '_');
}

function splitList(value: string | undefined, separator: RegExp = /,/): string[] {
  if (!value) {
    return [];
  }
  return value.split(separator).map(item => item.trim()).filter(Boolean);
}

/**
 * Accepts `Intro | Body | Wrap-up` or the JSON form
 * `{"sections":[{"title":"Intro","subsections":["Why"]}]}`. Subsections follow
 * their section in the flattened list.
 */
export function parseOutline(value: string | undefined): string[] {
  const trimmed = value?.trim();
  if (!trimmed) {
    return [];
  }

  if (trimmed.startsWith('{') || trimmed.startsWith('[')) {
    let json: unknown;
    try {
      json = JSON.parse(trimmed);
    } catch {
      json = undefined;
    }
    const parsed = OutlineJsonSchema.safeParse(json);
    if (parsed.success) {
      const headings = Array.isArray(parsed.data)
        ? parsed.data
        : parsed.data.sections.flatMap(section => [section.title, ...(section.subsections ?? [])]);
      return headings.map(heading => heading.trim()).filter(Boolean);
    }
  }

  return splitList(trimmed, /\||\n/);
}

function parseWordCount(value: string | undefined, fallback: number): number {
  const trimmed = value?.trim();
  if (!trimmed) {
    return fallback;
  }
  // Invalid counts are passed through and rejected by the pipeline before any call
  return Number(trimmed.replace(/[,_\s]/g, ''));
}

export function parseTopicRow(row: TopicRow, rowNumber: number, defaultWordCount = DEFAULT_WORD_COUNT): TopicRecord | null {
  const topic = row.topic?.trim();
  if (!topic) {
    return null;
  }

  const category = row.category?.trim() || splitList(row.categories)[0];
  const tags = splitList(row.tags);
  const keywords = splitList(row.keywords || row.primary_keywords);
  const outline = parseOutline(row.outline || row.custom_outline);

  const record: TopicRecord = {
    topic,
    targetWordCount: parseWordCount(row.word_count, defaultWordCount),
    sourceRowId: row.id?.trim() || `row-${rowNumber}`,
    includeVideo: /^(true|yes|y|1)$/i.test(row.video_required?.trim() ?? ''),
    ...(outline.length > 0 ? { outline: Object.freeze(outline) } : {}),
    ...(category ? { category } : {}),
    ...(tags.length > 0 ? { tags: Object.freeze(tags) } : {}),
    ...(keywords.length > 0 ? { keywords: Object.freeze(keywords) } : {})
  };

  return Object.freeze(record);
}

/**
 * Restartable, lazily read sequence of topic records. Every iteration reads
 * the input again from the start.
 */
export abstract class TopicSource implements AsyncIterable<TopicRecord> {
  protected abstract logger: Logger;
  protected readonly filePath: string;
  private readonly defaultWordCount: number;

  constructor(filePath: string, options: TopicSourceOptions = {}) {
    this.filePath = filePath;
    this.defaultWordCount = options.defaultWordCount ?? DEFAULT_WORD_COUNT;
  }

  abstract getSourceName(): string;

  /**
   * Rows keyed by normalized header name, header row excluded. Implementations
   * pass the header through `checkHeader` before yielding any row.
   */
  protected abstract readRows(): AsyncIterable<TopicRow>;

  protected checkHeader(headers: string[]): string[] {
    if (!headers.includes('topic')) {
      throw new TopicSourceError(`${this.filePath} has no 'topic' column`);
    }
    return headers;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<TopicRecord> {
    if (!existsSync(this.filePath)) {
      throw new TopicSourceError(`Input file not found: ${this.filePath}`);
    }

    // Row 1 is the header
    let rowNumber = 1;
    for await (const row of this.readRows()) {
      rowNumber++;
      const record = parseTopicRow(row, rowNumber, this.defaultWordCount);
      if (!record) {
        this.logger.warn(`Skipping row ${rowNumber}: empty topic`);
        continue;
      }
      yield record;
    }
  }

  async count(): Promise<number> {
    let total = 0;
    for await (const _record of this) {
      total++;
    }
    return total;
  }
}
