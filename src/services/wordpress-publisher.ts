import { z } from 'zod';
import type { WordPressConfig } from '../config/types.js';
import { PublishError, errorMessage } from '../errors.js';
import { formatPostContent } from '../pipeline/content-format.js';
import type { PublishRequest, Publisher } from '../pipeline/types.js';
import { fetchJson, isTransientHttpError } from '../utils/http.js';
import { Logger } from '../utils/logger.js';

type Taxonomy = 'categories' | 'tags';

const TermListSchema = z.array(z.object({ id: z.number(), name: z.string() }));
const CreatedSchema = z.object({ id: z.number() });

export interface WordPressOptions extends WordPressConfig {
  timeoutMs?: number;
}

function decodeEntities(value: string): string {
  return value
    .replace(/&amp;/g, '&')
    .replace(/&#0?39;/g, "'")
    .replace(/&quot;/g, '"');
}

/**
 * WordPress REST (wp/v2) publisher using an application password.
 */
export class WordPressPublisher implements Publisher {
  private readonly logger = new Logger('WordPress');
  private readonly options: WordPressOptions;
  private readonly baseUrl: string;
  private readonly termIds = new Map<string, Promise<number>>();

  constructor(options: WordPressOptions) {
    this.options = options;
    this.baseUrl = `${options.url.replace(/\/+$/, '')}/wp-json/wp/v2`;
  }

  async publish(request: PublishRequest): Promise<string> {
    if (!this.options.url || !this.options.username || !this.options.appPassword) {
      throw new PublishError('permanent', 'WordPress URL or credentials are not configured');
    }

    try {
      const categories = request.category ? await this.resolveTerms('categories', [request.category]) : [];
      const tags = await this.resolveTerms('tags', request.tags);

      const endpoint = request.existingPostId
        ? `${this.baseUrl}/posts/${encodeURIComponent(request.existingPostId)}`
        : `${this.baseUrl}/posts`;

      const payload = await this.request(endpoint, {
        method: 'POST',
        body: {
          title: request.title,
          content: formatPostContent(request.body, request.mediaReference),
          status: this.options.status,
          categories,
          tags
        }
      });

      const post = CreatedSchema.parse(payload);
      this.logger.info(`${request.existingPostId ? 'Updated' : 'Created'} post ${post.id}: '${request.title}'`);
      return String(post.id);
    } catch (error) {
      const kind = isTransientHttpError(error) ? 'transient' : 'permanent';
      throw new PublishError(kind, `Publishing '${request.title}' failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async resolveTerms(taxonomy: Taxonomy, names: readonly string[]): Promise<number[]> {
    return Promise.all(names.map(name => this.resolveTerm(taxonomy, name)));
  }

  private resolveTerm(taxonomy: Taxonomy, name: string): Promise<number> {
    const key = `${taxonomy}:${name.toLowerCase()}`;
    const cached = this.termIds.get(key);
    if (cached) {
      return cached;
    }

    const lookup = this.findOrCreateTerm(taxonomy, name).catch((error: unknown) => {
      this.termIds.delete(key);
      throw error;
    });
    this.termIds.set(key, lookup);
    return lookup;
  }

  private async findOrCreateTerm(taxonomy: Taxonomy, name: string): Promise<number> {
    const search = new URL(`${this.baseUrl}/${taxonomy}`);
    search.searchParams.set('search', name);
    search.searchParams.set('per_page', '100');

    const existing = TermListSchema.parse(await this.request(search.toString()));
    const match = existing.find(term => decodeEntities(term.name).toLowerCase() === name.toLowerCase());
    if (match) {
      return match.id;
    }

    const created = CreatedSchema.parse(await this.request(`${this.baseUrl}/${taxonomy}`, {
      method: 'POST',
      body: { name }
    }));
    this.logger.debug(`Created ${taxonomy} term '${name}' (${created.id})`);
    return created.id;
  }

  private request(url: string, options: { method?: 'GET' | 'POST'; body?: unknown } = {}): Promise<unknown> {
    const credentials = Buffer.from(`${this.options.username}:${this.options.appPassword}`).toString('base64');
    return fetchJson(url, {
      ...options,
      headers: { Authorization: `Basic ${credentials}` },
      timeoutMs: this.options.timeoutMs
    });
  }
}
