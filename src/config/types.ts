import { z } from 'zod';

const DEFAULT_SYSTEM_PROMPT = [
  'You are a professional content writer for a blog.',
  'Write in a professional, engaging tone, include relevant examples and data,',
  'and optimize for search engines while keeping the article readable.',
  'Return the article title separately from the body. Format the body as HTML paragraphs and <h2>/<h3> headings.'
].join(' ');

const PlatformSchema = z.object({
  apiUrl: z.string().url().optional(),
  apiKey: z.string().default('')
});

export const ConfigSchema = z.object({
  cache: z.object({
    fileName: z.string().min(1).default('content-cache.db')
  }).default({}),
  generation: z.object({
    model: z.string().min(1).default('openai:gpt-4o-mini'),
    prompt: z.string().min(1).default(DEFAULT_SYSTEM_PROMPT),
    temperature: z.number().min(0).max(2).default(0.7),
    defaultWordCount: z.number().int().positive().default(3200)
  }).default({}),
  batch: z.object({
    concurrency: z.number().int().positive().default(3)
  }).default({}),
  retry: z.object({
    maxAttempts: z.number().int().positive().default(3),
    initialDelayMs: z.number().int().nonnegative().default(1000),
    callTimeoutMs: z.number().int().positive().default(180_000)
  }).default({}),
  media: z.object({
    minWidth: z.number().int().nonnegative().default(1200),
    minHeight: z.number().int().nonnegative().default(630),
    candidates: z.number().int().positive().default(4)
  }).default({}),
  wordpress: z.object({
    url: z.string().default(''),
    username: z.string().default(''),
    appPassword: z.string().default(''),
    status: z.enum(['publish', 'draft', 'pending', 'private']).default('publish')
  }).default({}),
  platforms: z.object({
    openai: PlatformSchema.default({}),
    unsplash: PlatformSchema.default({}),
    youtube: PlatformSchema.default({})
  }).default({})
});

export type Config = z.infer<typeof ConfigSchema>;
export type PlatformConfig = z.infer<typeof PlatformSchema>;
export type RetryConfig = Config['retry'];
export type MediaConfig = Config['media'];
export type WordPressConfig = Config['wordpress'];
