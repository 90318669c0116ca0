import { vi, type Mock } from 'vitest';
import type { RunContext } from '../../src/pipeline/context.js';
import type { RetryPolicy } from '../../src/pipeline/retry.js';
import type {
  GeneratedArticle,
  GenerationRequest,
  Generator,
  MediaRequest,
  MediaResolver,
  PublishRequest,
  Publisher
} from '../../src/pipeline/types.js';
import type { MediaReference } from '../../src/storage/models.js';
import { SQLiteContentCache } from '../../src/storage/sqlite.js';

export const FAST_RETRY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 10,
  callTimeoutMs: 1000
};

/** Queue of errors per topic, thrown one per call before the fake succeeds. */
class ScriptedFailures {
  private readonly queues = new Map<string, Error[]>();

  add(topic: string, ...errors: Error[]): void {
    this.queues.set(topic, [...(this.queues.get(topic) ?? []), ...errors]);
  }

  throwNext(topic: string): void {
    const error = this.queues.get(topic)?.shift();
    if (error) {
      throw error;
    }
  }
}

export class FakeGenerator implements Generator {
  readonly calls: GenerationRequest[] = [];
  readonly failures = new ScriptedFailures();
  onGenerate: (request: GenerationRequest) => Promise<void> | void = () => undefined;

  async generate(request: GenerationRequest): Promise<GeneratedArticle> {
    this.calls.push(request);
    await this.onGenerate(request);
    this.failures.throwNext(request.topic);
    return {
      title: `Title: ${request.topic}`,
      body: `<p>About ${request.topic}</p>`,
      wordCount: request.targetWordCount
    };
  }
}

export class FakeMediaResolver implements MediaResolver {
  readonly calls: MediaRequest[] = [];
  readonly failures = new ScriptedFailures();
  media: MediaReference = { imageUrl: 'https://images.test/photo.jpg', imageCredit: 'Test Photographer' };

  async resolve(request: MediaRequest): Promise<MediaReference> {
    this.calls.push(request);
    this.failures.throwNext(request.topic);
    return this.media;
  }
}

/** Failures are keyed by post title. */
export class FakePublisher implements Publisher {
  readonly calls: PublishRequest[] = [];
  readonly failures = new ScriptedFailures();
  private nextId = 100;

  async publish(request: PublishRequest): Promise<string> {
    this.calls.push(request);
    this.failures.throwNext(request.title);
    return request.existingPostId ?? String(this.nextId++);
  }
}

export interface TestContext extends RunContext {
  cache: SQLiteContentCache;
  generator: FakeGenerator;
  mediaResolver: FakeMediaResolver;
  publisher: FakePublisher;
  sleep: Mock<(ms: number) => Promise<void>>;
}

export function createTestContext(overrides: Pick<RunContext, 'force' | 'signal'> = {}): TestContext {
  const cache = new SQLiteContentCache(':memory:');
  cache.initialize();

  return {
    cache,
    generator: new FakeGenerator(),
    mediaResolver: new FakeMediaResolver(),
    publisher: new FakePublisher(),
    retryPolicy: FAST_RETRY,
    sleep: vi.fn<(ms: number) => Promise<void>>(async () => undefined),
    ...overrides
  };
}
