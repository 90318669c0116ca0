import { z } from 'zod';
import type { Config } from '../config/types.js';
import { GenerationError, errorMessage } from '../errors.js';
import type { LlmModelFactory } from '../llm/factory.js';
import type { LlmModel } from '../llm/models/base.js';
import type { LlmCompletionResponse } from '../llm/types.js';
import type { GeneratedArticle, GenerationRequest, Generator } from '../pipeline/types.js';
import { Logger } from '../utils/logger.js';

const ArticleResponseSchema = z.object({
  title: z.string().min(1).max(200),
  body: z.string().min(1)
});

type ArticleResponse = z.infer<typeof ArticleResponseSchema>;

// HTML markup costs tokens on top of the words themselves
const TOKENS_PER_WORD = 1.5;
// JSON envelope and title
const RESPONSE_OVERHEAD_TOKENS = 500;
const WORD_COUNT_TOLERANCE = 0.05;

export function countWords(text: string): number {
  const plain = text.replace(/<[^>]+>/g, ' ').trim();
  return plain ? plain.split(/\s+/).length : 0;
}

export function maxTokensFor(targetWordCount: number): number {
  return Math.ceil(targetWordCount * TOKENS_PER_WORD) + RESPONSE_OVERHEAD_TOKENS;
}

export function buildUserPrompt(request: GenerationRequest): string {
  const words = request.targetWordCount;
  const share = (ratio: number) => Math.round(words * ratio);

  const lines = [
    `Write a comprehensive article about: ${request.topic}`,
    ``,
    `Key requirements:`,
    `- Article length: ${words} words`,
    `- Include relevant examples and data`,
    `- Optimize for search while maintaining readability`
  ];

  if (request.keywords && request.keywords.length > 0) {
    lines.push(`- Include these keywords naturally: ${request.keywords.join(', ')}`);
  }

  lines.push(
    ``,
    `Content distribution:`,
    `- Introduction: ~${share(0.1)} words`,
    `- Main content: ~${share(0.7)} words`,
    `- Examples and data: ~${share(0.1)} words`,
    `- Conclusion: ~${share(0.1)} words`
  );

  if (request.outline && request.outline.length > 0) {
    lines.push(``, `Follow this outline:`, ...request.outline.map(heading => `- ${heading}`));
  }

  return lines.join('\n');
}

export class ArticleGenerator implements Generator {
  private readonly logger = new Logger('Generator');
  private readonly llm: LlmModel;
  private readonly systemPrompt: string;
  private readonly temperature: number;

  constructor(llm: LlmModel, options: { systemPrompt: string; temperature: number }) {
    this.llm = llm;
    this.systemPrompt = options.systemPrompt;
    this.temperature = options.temperature;
  }

  static fromConfig(factory: LlmModelFactory, config: Config): ArticleGenerator {
    return new ArticleGenerator(factory.create(config.generation.model), {
      systemPrompt: config.generation.prompt,
      temperature: config.generation.temperature
    });
  }

  async generate(request: GenerationRequest): Promise<GeneratedArticle> {
    const maxTokens = maxTokensFor(request.targetWordCount);
    this.logger.info(`Generating ${request.targetWordCount}-word article on '${request.topic}'`, { model: this.llm.getModelName() });

    let response: LlmCompletionResponse<ArticleResponse>;
    try {
      response = await this.llm.completeStructured({
        messages: [
          { role: 'system', content: this.systemPrompt },
          { role: 'user', content: buildUserPrompt(request) }
        ],
        temperature: this.temperature,
        maxTokens,
        outputFormat: {
          type: 'zod_schema',
          schema: ArticleResponseSchema,
          name: 'article'
        }
      });
    } catch (error) {
      const kind = this.llm.isTransientError(error) ? 'transient' : 'permanent';
      throw new GenerationError(kind, `Text generation failed: ${errorMessage(error)}`, { cause: error });
    }

    if (response.refusal || response.finishReason === 'content_filter') {
      throw new GenerationError('permanent', `Content policy rejection: ${response.refusal ?? 'filtered'}`);
    }
    if (response.finishReason === 'length') {
      throw new GenerationError('permanent', `Article was cut off at the ${maxTokens}-token output limit`);
    }
    if (!response.parsed) {
      throw new GenerationError('permanent', 'Model returned no article');
    }

    const title = response.parsed.title.replace(/^#+\s*/, '').trim();
    const body = response.parsed.body.trim();
    const wordCount = countWords(body);

    const drift = Math.abs(wordCount - request.targetWordCount) / request.targetWordCount;
    if (drift > WORD_COUNT_TOLERANCE) {
      this.logger.warn(`Article '${title}' has ${wordCount} words, target was ${request.targetWordCount}`);
    } else {
      this.logger.debug(`Article '${title}' has ${wordCount} words`);
    }

    return { title, body, wordCount };
  }
}
