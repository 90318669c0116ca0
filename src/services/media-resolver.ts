import { z } from 'zod';
import type { MediaConfig } from '../config/types.js';
import { MediaError, errorMessage } from '../errors.js';
import type { MediaRequest, MediaResolver } from '../pipeline/types.js';
import type { MediaImage, MediaReference } from '../storage/models.js';
import { fetchJson, isTransientHttpError } from '../utils/http.js';
import { Logger } from '../utils/logger.js';
import type { VideoLookup } from './youtube.js';

const UNSPLASH_SEARCH_URL = 'https://api.unsplash.com/search/photos';

const UnsplashSearchSchema = z.object({
  results: z.array(z.object({
    width: z.number(),
    height: z.number(),
    description: z.string().nullish(),
    alt_description: z.string().nullish(),
    urls: z.object({
      regular: z.string()
    }),
    user: z.object({
      name: z.string()
    })
  }))
});

export interface StockMediaOptions extends MediaConfig {
  unsplashAccessKey: string;
  timeoutMs?: number;
}

export function imageQuery(request: Pick<MediaRequest, 'topic' | 'category' | 'keywords'>): string {
  return [request.category || request.topic, request.keywords?.[0]].filter(Boolean).join(' ');
}

export function videoQuery(request: Pick<MediaRequest, 'topic' | 'keywords'>): string {
  return [request.topic, ...(request.keywords ?? []).slice(0, 2)].join(' ');
}

/**
 * Featured and inline images from Unsplash plus an optional video embed.
 * Video lookup never fails the resolution.
 */
export class StockMediaResolver implements MediaResolver {
  private readonly logger = new Logger('Media');
  private readonly options: StockMediaOptions;
  private readonly videoLookup: VideoLookup | null;

  constructor(options: StockMediaOptions, videoLookup: VideoLookup | null = null) {
    this.options = options;
    this.videoLookup = videoLookup;
  }

  async resolve(request: MediaRequest): Promise<MediaReference> {
    const image = await this.findImages(imageQuery(request));
    const videoRef = request.includeVideo ? await this.findVideo(request) : undefined;

    return {
      ...image,
      ...(videoRef ? { videoRef } : {})
    };
  }

  /**
   * Up to `candidates` photos meeting the minimum size: the first is the
   * featured image, the rest go inside the article.
   */
  private async findImages(query: string): Promise<Omit<MediaReference, 'videoRef'>> {
    if (!this.options.unsplashAccessKey) {
      throw new MediaError('permanent', 'UNSPLASH_ACCESS_KEY is not configured');
    }

    const url = new URL(UNSPLASH_SEARCH_URL);
    url.searchParams.set('query', query);
    url.searchParams.set('per_page', String(this.options.candidates * 2));
    url.searchParams.set('orientation', 'landscape');

    let payload: unknown;
    try {
      payload = await fetchJson(url.toString(), {
        headers: { Authorization: `Client-ID ${this.options.unsplashAccessKey}` },
        timeoutMs: this.options.timeoutMs
      });
    } catch (error) {
      const kind = isTransientHttpError(error) ? 'transient' : 'permanent';
      throw new MediaError(kind, `Image search failed: ${errorMessage(error)}`, { cause: error });
    }

    const parsed = UnsplashSearchSchema.safeParse(payload);
    if (!parsed.success) {
      throw new MediaError('permanent', 'Image search returned an unexpected payload');
    }

    const images: MediaImage[] = parsed.data.results
      .filter(candidate => candidate.width >= this.options.minWidth && candidate.height >= this.options.minHeight)
      .slice(0, this.options.candidates)
      .map(photo => ({
        url: photo.urls.regular,
        alt: photo.alt_description || photo.description || query,
        credit: photo.user.name
      }));

    const [featured, ...inline] = images;
    if (!featured) {
      throw new MediaError('permanent', `No image of at least ${this.options.minWidth}x${this.options.minHeight} for '${query}'`);
    }

    this.logger.debug(`Selected ${images.length} image${images.length === 1 ? '' : 's'} for '${query}'`);
    return {
      imageUrl: featured.url,
      imageAlt: featured.alt,
      imageCredit: featured.credit,
      ...(inline.length > 0 ? { inlineImages: inline } : {})
    };
  }

  private async findVideo(request: MediaRequest): Promise<string | undefined> {
    if (!this.videoLookup) {
      this.logger.debug('Video requested but no video lookup is configured');
      return undefined;
    }

    try {
      return (await this.videoLookup.findVideo(videoQuery(request))) ?? undefined;
    } catch (error) {
      this.logger.warn(`Video lookup failed for '${request.topic}', continuing without video: ${errorMessage(error)}`);
      return undefined;
    }
  }
}
