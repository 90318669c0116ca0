import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import { MediaError } from '../src/errors.js';
import { StockMediaResolver, imageQuery, videoQuery } from '../src/services/media-resolver.js';
import type { VideoLookup } from '../src/services/youtube.js';

const options = { minWidth: 1200, minHeight: 630, candidates: 4, unsplashAccessKey: 'test-key', timeoutMs: 1000 };

const request = { topic: 'Indoor Plants', category: 'Home', keywords: ['houseplants', 'ferns', 'light'], includeVideo: true };

const searchResults = {
  results: [
    {
      width: 800,
      height: 600,
      description: null,
      alt_description: 'small plant',
      urls: { regular: 'https://images.test/small.jpg' },
      user: { name: 'First Photographer' }
    },
    {
      width: 1600,
      height: 900,
      description: 'Green leaves',
      alt_description: null,
      urls: { regular: 'https://images.test/large.jpg' },
      user: { name: 'Second Photographer' }
    }
  ]
};

function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), { status: 200, headers: { 'Content-Type': 'application/json' } });
}

describe('media queries', () => {
  it('searches images by category and the first keyword', () => {
    expect(imageQuery(request)).toBe('Home houseplants');
    expect(imageQuery({ topic: 'Indoor Plants' })).toBe('Indoor Plants');
  });

  it('searches videos by topic and the first two keywords', () => {
    expect(videoQuery(request)).toBe('Indoor Plants houseplants ferns');
  });
});

describe('StockMediaResolver', () => {
  let fetchMock: Mock<typeof fetch>;
  let videoLookup: { findVideo: Mock<VideoLookup['findVideo']> };

  beforeEach(() => {
    fetchMock = vi.fn<typeof fetch>(async () => jsonResponse(searchResults));
    vi.stubGlobal('fetch', fetchMock);
    videoLookup = { findVideo: vi.fn<VideoLookup['findVideo']>(async () => 'https://www.youtube.com/embed/abc123') };
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('picks the first image that is large enough and adds a video', async () => {
    const media = await new StockMediaResolver(options, videoLookup).resolve(request);

    expect(media).toEqual({
      imageUrl: 'https://images.test/large.jpg',
      imageAlt: 'Green leaves',
      imageCredit: 'Second Photographer',
      videoRef: 'https://www.youtube.com/embed/abc123'
    });
    expect(fetchMock.mock.calls[0]?.[0]).toBe(
      'https://api.unsplash.com/search/photos?query=Home+houseplants&per_page=8&orientation=landscape'
    );
    expect(new Headers(fetchMock.mock.calls[0]?.[1]?.headers).get('Authorization')).toBe('Client-ID test-key');
    expect(videoLookup.findVideo).toHaveBeenCalledWith('Indoor Plants houseplants ferns');
  });

  it('places the remaining large photos inside the article, up to the candidate count', async () => {
    const photo = (n: number) => ({
      width: 2000,
      height: 1000,
      description: null,
      alt_description: `photo ${n}`,
      urls: { regular: `https://images.test/${n}.jpg` },
      user: { name: `Photographer ${n}` }
    });
    fetchMock.mockImplementation(async () => jsonResponse({ results: [photo(1), searchResults.results[0], photo(2), photo(3)] }));

    const media = await new StockMediaResolver({ ...options, candidates: 2 }).resolve({ ...request, includeVideo: false });

    expect(media).toEqual({
      imageUrl: 'https://images.test/1.jpg',
      imageAlt: 'photo 1',
      imageCredit: 'Photographer 1',
      inlineImages: [{ url: 'https://images.test/2.jpg', alt: 'photo 2', credit: 'Photographer 2' }]
    });
    expect(fetchMock.mock.calls[0]?.[0]).toContain('per_page=4');
  });

  it('only looks for a video when one is requested', async () => {
    const media = await new StockMediaResolver(options, videoLookup).resolve({ ...request, includeVideo: false });

    expect(media.videoRef).toBeUndefined();
    expect(videoLookup.findVideo).not.toHaveBeenCalled();
  });

  it('keeps the image when the video lookup fails', async () => {
    videoLookup.findVideo.mockRejectedValueOnce(new Error('quota exceeded'));

    const media = await new StockMediaResolver(options, videoLookup).resolve(request);

    expect(media).toEqual({
      imageUrl: 'https://images.test/large.jpg',
      imageAlt: 'Green leaves',
      imageCredit: 'Second Photographer'
    });
  });

  it('fails permanently when no image meets the minimum size', async () => {
    fetchMock.mockImplementation(async () => jsonResponse({ results: [searchResults.results[0]] }));

    await expect(new StockMediaResolver(options).resolve(request)).rejects.toMatchObject({
      kind: 'permanent',
      message: `No image of at least 1200x630 for 'Home houseplants'`
    });
  });

  it('treats server errors as transient', async () => {
    fetchMock.mockImplementation(async () => new Response('unavailable', { status: 503, statusText: 'Service Unavailable' }));

    const error = await new StockMediaResolver(options).resolve(request).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(MediaError);
    if (error instanceof MediaError) {
      expect(error.kind).toBe('transient');
      expect(error.message).toBe('Image search failed: HTTP 503: Service Unavailable - unavailable');
    }
  });

  it('treats rejected credentials as permanent', async () => {
    fetchMock.mockImplementation(async () => new Response('', { status: 401, statusText: 'Unauthorized' }));

    await expect(new StockMediaResolver(options).resolve(request)).rejects.toMatchObject({
      kind: 'permanent',
      message: 'Image search failed: HTTP 401: Unauthorized'
    });
  });

  it('fails permanently without an access key and makes no request', async () => {
    await expect(new StockMediaResolver({ ...options, unsplashAccessKey: '' }).resolve(request))
      .rejects.toThrow('UNSPLASH_ACCESS_KEY is not configured');
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
