import { google } from 'googleapis';
import type { youtube_v3 } from 'googleapis';
import { Logger } from '../utils/logger.js';

export interface VideoLookup {
  /** Embed URL of the best matching video, or null when there is none. */
  findVideo(query: string): Promise<string | null>;
}

export function embedUrl(videoId: string): string {
  return `https://www.youtube.com/embed/${videoId}`;
}

export class YouTubeVideoLookup implements VideoLookup {
  private readonly youtube: youtube_v3.Youtube;
  private readonly timeoutMs: number;
  private readonly logger = new Logger('YouTube');

  constructor(apiKey: string, options: { timeoutMs?: number } = {}) {
    this.youtube = google.youtube({ version: 'v3', auth: apiKey });
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  async findVideo(query: string): Promise<string | null> {
    this.logger.debug(`Searching videos for '${query}'`);

    const searchParams: youtube_v3.Params$Resource$Search$List = {
      part: ['snippet'],
      q: query,
      type: ['video'],
      videoEmbeddable: 'true',
      maxResults: 1
    };

    const response = await this.youtube.search.list(searchParams, { timeout: this.timeoutMs });

    const videoId = response.data.items?.[0]?.id?.videoId;
    if (!videoId) {
      this.logger.debug(`No video found for '${query}'`);
      return null;
    }

    return embedUrl(videoId);
  }
}
