import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { GenerationError, MediaError, PublishError } from '../src/errors.js';
import { fingerprint } from '../src/pipeline/fingerprint.js';
import { PipelineRunner } from '../src/pipeline/runner.js';
import type { TopicRecord } from '../src/pipeline/types.js';
import { createTestContext, type TestContext } from './helpers/fakes.js';

const topic: TopicRecord = {
  topic: 'Indoor Plants',
  targetWordCount: 1500,
  category: 'Home',
  tags: ['plants'],
  keywords: ['houseplants'],
  sourceRowId: 'a1'
};

describe('PipelineRunner', () => {
  let context: TestContext;

  beforeEach(() => {
    context = createTestContext();
  });

  afterEach(() => {
    context.cache.close();
  });

  it('generates, resolves media and publishes a new topic', async () => {
    const result = await new PipelineRunner(context).run(topic);

    expect(result).toEqual({
      status: 'success',
      topic: 'Indoor Plants',
      fingerprint: fingerprint(topic),
      sourceRowId: 'a1',
      remotePostId: '100',
      attempts: 3
    });
    expect(context.generator.calls).toEqual([{
      topic: 'Indoor Plants',
      targetWordCount: 1500,
      outline: undefined,
      keywords: ['houseplants']
    }]);
    expect(context.publisher.calls[0]).toEqual({
      title: 'Title: Indoor Plants',
      body: '<p>About Indoor Plants</p>',
      mediaReference: { imageUrl: 'https://images.test/photo.jpg', imageCredit: 'Test Photographer' },
      category: 'Home',
      tags: ['plants']
    });
    expect(context.cache.get(fingerprint(topic))).toMatchObject({
      stage: 'published',
      remotePostId: '100',
      attemptCount: 3
    });
  });

  it('skips an already published topic without calling any collaborator', async () => {
    await new PipelineRunner(context).run(topic);

    const result = await new PipelineRunner(context).run(topic);

    expect(result).toMatchObject({ status: 'skipped', reason: 'already published', remotePostId: '100', attempts: 0 });
    expect(context.generator.calls).toHaveLength(1);
    expect(context.mediaResolver.calls).toHaveLength(1);
    expect(context.publisher.calls).toHaveLength(1);
  });

  it('resumes from the last completed stage', async () => {
    context.cache.advance(fingerprint(topic), 'generated', {
      topic: 'Indoor Plants',
      articleTitle: 'Cached Title',
      articleBody: '<p>Cached body</p>',
      attemptCount: 2
    });

    const result = await new PipelineRunner(context).run(topic);

    expect(result).toMatchObject({ status: 'success', attempts: 2 });
    expect(context.generator.calls).toHaveLength(0);
    expect(context.publisher.calls[0]).toMatchObject({ title: 'Cached Title', body: '<p>Cached body</p>' });
    expect(context.cache.get(fingerprint(topic))?.attemptCount).toBe(4);
  });

  it('publishes without media when media resolution fails', async () => {
    context.mediaResolver.failures.add('Indoor Plants', new MediaError('permanent', 'No image of at least 1200x630'));

    const result = await new PipelineRunner(context).run(topic);

    expect(result.status).toBe('success');
    expect(context.publisher.calls[0]?.mediaReference).toBeNull();
    expect(context.cache.get(fingerprint(topic))?.mediaReference).toBeNull();
  });

  it('publishes without media when media retries are exhausted', async () => {
    const unavailable = new MediaError('transient', 'HTTP 503');
    context.mediaResolver.failures.add('Indoor Plants', unavailable, unavailable, unavailable);

    const result = await new PipelineRunner(context).run(topic);

    expect(result).toMatchObject({ status: 'success', attempts: 5 });
    expect(context.mediaResolver.calls).toHaveLength(3);
    expect(context.publisher.calls[0]?.mediaReference).toBeNull();
  });

  it('fails a permanent generation error without writing the cache', async () => {
    context.generator.failures.add('Indoor Plants', new GenerationError('permanent', 'Content policy rejection: filtered'));

    const result = await new PipelineRunner(context).run(topic);

    expect(result).toMatchObject({
      status: 'failed',
      reason: 'generate failed: Content policy rejection: filtered',
      attempts: 1
    });
    expect(context.cache.get(fingerprint(topic))).toBeNull();
    expect(context.mediaResolver.calls).toHaveLength(0);
  });

  it('retries transient generation errors with backoff', async () => {
    const limited = new GenerationError('transient', 'rate limited');
    context.generator.failures.add('Indoor Plants', limited, limited);

    const result = await new PipelineRunner(context).run(topic);

    expect(result).toMatchObject({ status: 'success', attempts: 5 });
    expect(context.sleep.mock.calls).toEqual([[10], [20]]);
  });

  it('reports exhausted retries', async () => {
    const limited = new GenerationError('transient', 'rate limited');
    context.generator.failures.add('Indoor Plants', limited, limited, limited);

    const result = await new PipelineRunner(context).run(topic);

    expect(result).toMatchObject({
      status: 'failed',
      reason: 'generate failed: rate limited (gave up after 3 attempts)',
      attempts: 3
    });
  });

  it('keeps the media stage when publishing fails and picks up from it on the next run', async () => {
    context.publisher.failures.add('Title: Indoor Plants', new PublishError('permanent', 'HTTP 401: Unauthorized'));

    const failed = await new PipelineRunner(context).run(topic);
    expect(failed).toMatchObject({ status: 'failed', reason: 'publish failed: HTTP 401: Unauthorized' });
    expect(context.cache.get(fingerprint(topic))?.stage).toBe('media_resolved');

    const retried = await new PipelineRunner(context).run(topic);
    expect(retried).toMatchObject({ status: 'success', remotePostId: '100', attempts: 1 });
    expect(context.generator.calls).toHaveLength(1);
    expect(context.mediaResolver.calls).toHaveLength(1);
  });

  it.each([0, -5, 12.5, Number.NaN])('rejects a target word count of %s before any call', async targetWordCount => {
    const result = await new PipelineRunner(context).run({ ...topic, targetWordCount });

    expect(result.status).toBe('failed');
    expect(result.reason).toBe(`Invalid target word count: ${targetWordCount}`);
    expect(result.attempts).toBe(0);
    expect(context.generator.calls).toHaveLength(0);
    expect(context.cache.list()).toEqual([]);
  });

  it('rejects an empty topic', async () => {
    const result = await new PipelineRunner(context).run({ ...topic, topic: '   ' });

    expect(result).toMatchObject({ status: 'failed', reason: 'Topic is empty' });
  });

  it('updates the existing post when forced to republish', async () => {
    await new PipelineRunner(context).run(topic);

    const result = await new PipelineRunner({ ...context, force: true }).run(topic);

    expect(result).toMatchObject({ status: 'success', remotePostId: '100', attempts: 1 });
    expect(context.generator.calls).toHaveLength(1);
    expect(context.publisher.calls[1]).toMatchObject({
      title: 'Title: Indoor Plants',
      existingPostId: '100'
    });
    expect(context.cache.get(fingerprint(topic))).toMatchObject({ stage: 'published', attemptCount: 4 });
  });

  it('fails when another run has already written the stage', async () => {
    context.generator.onGenerate = () => {
      context.cache.advance(fingerprint(topic), 'generated', { topic: 'Indoor Plants' });
    };

    const result = await new PipelineRunner(context).run(topic);

    expect(result.status).toBe('failed');
    expect(result.reason).toBe(
      `Stale stage for ${fingerprint(topic).slice(0, 12)}: cannot move from 'generated' to 'generated'`
    );
  });

  it('stops after the current stage once cancelled', async () => {
    const controller = new AbortController();
    const runner = new PipelineRunner({ ...context, signal: controller.signal });
    context.generator.onGenerate = () => controller.abort();

    const result = await runner.run(topic);

    expect(result).toMatchObject({ status: 'skipped', reason: 'cancelled after generated' });
    expect(context.cache.get(fingerprint(topic))?.stage).toBe('generated');
    expect(context.mediaResolver.calls).toHaveLength(0);
  });
});
