/**
 * HTTP Surface Tests
 *
 * The full app runs in process through fastify.inject with a fake post
 * source, image fetcher and person lookup.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Mock } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { createCanvas } from '@napi-rs/canvas';
import type { RawPost } from '../../shared/types.js';
import { buildApp } from './app.js';
import type { AppDeps } from './app.js';
import { loadConfig } from './config.js';
import { UpstreamError } from './services/reddit-client.js';
import type { PostQuery } from './services/reddit-client.js';
import type { PersonInfo } from './services/wiki-client.js';

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47];

function solidPng(color: string): Buffer {
  const canvas = createCanvas(32, 32);
  const ctx = canvas.getContext('2d');
  ctx.fillStyle = color;
  ctx.fillRect(0, 0, 32, 32);
  return canvas.toBuffer('image/png');
}

function post(id: string, title: string, imageUrls: string[] = []): RawPost {
  return { id, title, body: '', createdAt: null, url: null, imageUrls };
}

const POSTS = [
  post('1', 'Touchdown! Geno Smith delivers'),
  post('2', 'Geno Smith to the end zone'),
  post('3', 'Crowd is loud tonight'),
];

describe('HTTP API', () => {
  let app: FastifyInstance;
  let postSource: Mock<[PostQuery, AbortSignal?], Promise<RawPost[]>>;
  let deps: AppDeps;

  beforeEach(async () => {
    postSource = vi.fn<[PostQuery, AbortSignal?], Promise<RawPost[]>>(async () => POSTS);
    deps = {
      config: { ...loadConfig(), memeRateLimit: 2 },
      postSource,
      fetchImage: async () => solidPng('#ff0000'),
      lookupPerson: async (name: string): Promise<PersonInfo | null> => (name === 'Geno Smith'
        ? { name, title: name, description: 'American football quarterback', extract: null, thumbnail: null, wikidataQid: null, url: null }
        : null),
      scorer: { score: () => 0.5 },
      random: () => 0,
    };
    app = await buildApp(deps);
  });

  afterEach(async () => {
    await app.close();
  });

  // ============ Info ============

  it('should report health', async () => {
    const res = await app.inject({ method: 'GET', url: '/health' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ status: 'ok' });
  });

  it('should describe the service', async () => {
    const res = await app.inject({ method: 'GET', url: '/' });
    expect(res.json()).toMatchObject({ name: 'Buzz Meme API' });
  });

  // ============ Buzz ============

  describe('GET /buzz', () => {
    it('should clamp the limit and summarise the feed', async () => {
      const res = await app.inject({ method: 'GET', url: '/buzz?limit=999' });

      expect(res.statusCode).toBe(200);
      expect(postSource).toHaveBeenCalledWith({ subreddit: 'nfl', query: 'super bowl', limit: 50 }, undefined);
      const body = res.json();
      expect(body.success).toBe(true);
      expect(body.data).toMatchObject({
        count: 3,
        avgPolarity: 0.5,
        moodLabel: 'HYPE',
        topEvent: 'TOUCHDOWN',
      });
      expect(body.data.memeSeed.topLines).toEqual([
        'Touchdown! Geno Smith delivers',
        'Geno Smith to the end zone',
        'Crowd is loud tonight',
      ]);
    });

    it('should map upstream failures to 502', async () => {
      postSource.mockRejectedValueOnce(new UpstreamError('reddit', 'bad_status', 503));

      const res = await app.inject({ method: 'GET', url: '/buzz' });
      expect(res.statusCode).toBe(502);
      expect(res.json()).toEqual({ success: false, error: 'Upstream unavailable: reddit' });
    });
  });

  describe('GET /celebs and /trend', () => {
    it('should list verified people with mention counts', async () => {
      const res = await app.inject({ method: 'GET', url: '/celebs?top_n=3' });

      expect(res.statusCode).toBe(200);
      const { data } = res.json();
      expect(data.count).toBe(1);
      expect(data.celebs[0]).toMatchObject({ name: 'Geno Smith', mentions: 2 });
    });

    it('should combine buzz with the top celeb', async () => {
      const res = await app.inject({ method: 'GET', url: '/trend' });

      const { data } = res.json();
      expect(data.buzz.moodLabel).toBe('HYPE');
      expect(data.topCeleb).toMatchObject({ name: 'Geno Smith' });
    });
  });

  // ============ Memes ============

  describe('GET /meme', () => {
    it('should render a placeholder grid when the feed has no images', async () => {
      const res = await app.inject({ method: 'GET', url: '/meme?tiles=4&business=Pizza%20Barn' });

      expect(res.statusCode).toBe(200);
      const { data } = res.json();
      expect(data.imageDataUrl.startsWith('data:image/png;base64,')).toBe(true);
      expect(data.metadata).toMatchObject({ tilesRequested: 4, tilesUsed: 1, imagesUsed: 0, style: 'grid' });
      expect(data.caption).toBe('Mood: HYPE. Keywords: geno, smith, touchdown, delivers. 15% OFF at Pizza Barn tonight.');
      expect(postSource).toHaveBeenCalledWith(
        { subreddit: 'nfl', query: 'super bowl', limit: 25 },
        expect.any(AbortSignal),
      );
    });

    it('should use feed images when present', async () => {
      postSource.mockResolvedValueOnce([post('9', 'Halftime lights show', ['https://i.redd.it/a.png'])]);

      const res = await app.inject({ method: 'GET', url: '/meme?tiles=1' });
      const { data } = res.json();
      expect(data.metadata).toMatchObject({ tilesUsed: 1, imagesUsed: 1, imageUrlsUsed: ['https://i.redd.it/a.png'] });
    });

    it.each([
      ['/meme?style=poster', 'style must be grid or classic'],
      ['/meme?tiles=9', 'tiles must be an integer between 1 and 4'],
      ['/meme?focus=maybe', 'focus must be true or false'],
    ])('should reject %s with 400', async (url, error) => {
      const res = await app.inject({ method: 'GET', url });
      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ success: false, error });
    });
  });

  describe('PNG routes', () => {
    it('should return the meme as a PNG body', async () => {
      const res = await app.inject({ method: 'GET', url: '/meme.png?style=classic' });

      expect(res.statusCode).toBe(200);
      expect(res.headers['content-type']).toBe('image/png');
      expect([...res.rawPayload.subarray(0, 4)]).toEqual(PNG_SIGNATURE);
    });

    it('should render the promo card', async () => {
      const res = await app.inject({ method: 'GET', url: '/meme_card.png' });

      expect(res.statusCode).toBe(200);
      expect(res.headers['content-type']).toBe('image/png');
      expect([...res.rawPayload.subarray(0, 4)]).toEqual(PNG_SIGNATURE);
    });

    it('should ignore render-only parameters on the promo card', async () => {
      const res = await app.inject({ method: 'GET', url: '/meme_card.png?style=bogus&tiles=9' });

      expect(res.statusCode).toBe(200);
      expect(res.headers['content-type']).toBe('image/png');
    });

    it('should rate-limit renders separately from the JSON routes', async () => {
      const first = await app.inject({ method: 'GET', url: '/meme.png' });
      const second = await app.inject({ method: 'GET', url: '/meme.png' });
      const third = await app.inject({ method: 'GET', url: '/meme.png' });

      expect([first.statusCode, second.statusCode, third.statusCode]).toEqual([200, 200, 429]);
      expect((await app.inject({ method: 'GET', url: '/buzz' })).statusCode).toBe(200);
    });
  });

  describe('GET /meme_suggestion', () => {
    it('should build caption and prompt text from the buzz', async () => {
      const res = await app.inject({ method: 'GET', url: '/meme_suggestion?business=Taco%20Hut&offer=BOGO' });

      const { data } = res.json();
      expect(data.caption).toBe('TOUCHDOWN vibes: HYPE. BOGO at Taco Hut tonight.');
      expect(data.imagePrompt).toBe(
        'Create a bold, funny Super Bowl reaction meme for a Taco Hut. ' +
        "Tone: HYPE. Event: TOUCHDOWN. Include big readable text: 'BOGO TONIGHT'.",
      );
      expect(data.buzz).toEqual({ avgPolarity: 0.5, topEvent: 'TOUCHDOWN', count: 3, query: 'super bowl' });
    });

    it('should ignore render-only parameters', async () => {
      const res = await app.inject({ method: 'GET', url: '/meme_suggestion?tiles=9&focus=maybe&offer=BOGO&business=Taco%20Hut' });

      expect(res.statusCode).toBe(200);
      expect(res.json().data.caption).toBe('TOUCHDOWN vibes: HYPE. BOGO at Taco Hut tonight.');
    });
  });
});
