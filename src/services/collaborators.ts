import type { Config } from '../config/types.js';
import { LlmModelFactory } from '../llm/factory.js';
import type { Generator, MediaResolver, Publisher } from '../pipeline/types.js';
import { ArticleGenerator } from './article-generator.js';
import { StockMediaResolver } from './media-resolver.js';
import { WordPressPublisher } from './wordpress-publisher.js';
import { YouTubeVideoLookup } from './youtube.js';

export interface Collaborators {
  generator: Generator;
  mediaResolver: MediaResolver;
  publisher: Publisher;
}

export function createCollaborators(config: Config): Collaborators {
  const timeoutMs = config.retry.callTimeoutMs;
  const youtubeKey = config.platforms.youtube.apiKey;

  return {
    generator: ArticleGenerator.fromConfig(new LlmModelFactory(config), config),
    mediaResolver: new StockMediaResolver(
      { ...config.media, unsplashAccessKey: config.platforms.unsplash.apiKey, timeoutMs },
      youtubeKey ? new YouTubeVideoLookup(youtubeKey, { timeoutMs }) : null
    ),
    publisher: new WordPressPublisher({ ...config.wordpress, timeoutMs })
  };
}
