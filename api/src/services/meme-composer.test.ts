/**
 * Meme Composer Tests
 *
 * End-to-end pipeline runs with a fixed scorer, a fixed random sequence and
 * an in-memory image fetcher.
 */

import { describe, it, expect, vi } from 'vitest';
import { createCanvas, loadImage } from '@napi-rs/canvas';
import { MoodState } from '../../../shared/types.js';
import type { RawPost, StyleConfig } from '../../../shared/types.js';
import { composeMeme, normalizeTiles, resolveStyleConfig } from './meme-composer.js';
import type { ComposeDeps, ImageFetcher, PipelineLogger } from './meme-composer.js';
import type { PolarityScorer } from './vibe-classifier.js';
import { sequenceRandom } from '../utils/random.js';

const fixed = (value: number): PolarityScorer => ({ score: () => value });

function solidPng(color: string, width = 40, height = 40): Buffer {
  const canvas = createCanvas(width, height);
  const ctx = canvas.getContext('2d');
  ctx.fillStyle = color;
  ctx.fillRect(0, 0, width, height);
  return canvas.toBuffer('image/png');
}

function post(id: string, title: string, imageUrls: string[] = []): RawPost {
  return { id, title, body: '', createdAt: null, url: null, imageUrls };
}

function gridConfig(overrides: Partial<StyleConfig> = {}): StyleConfig {
  return {
    style: 'grid',
    tiles: 4,
    focusBias: false,
    twoImageBackground: true,
    topic: 'super bowl',
    business: 'Pizza Barn',
    offer: '15% OFF',
    width: 256,
    height: 256,
    ...overrides,
  };
}

function fetcherFor(images: Record<string, Buffer | null>): ImageFetcher {
  return async (url) => images[url] ?? null;
}

async function pixelAt(png: Buffer, x: number, y: number): Promise<number[]> {
  const image = await loadImage(png);
  const canvas = createCanvas(image.width, image.height);
  const ctx = canvas.getContext('2d');
  ctx.drawImage(image, 0, 0);
  const data = ctx.getImageData(x, y, 1, 1).data;
  return [data[0], data[1], data[2]];
}

describe('Meme Composer', () => {
  // ============ Config ============

  describe('style config', () => {
    it('should coerce unsupported tile counts to 4', () => {
      expect(normalizeTiles(3)).toBe(4);
      expect(normalizeTiles(2)).toBe(2);
      expect(normalizeTiles(1)).toBe(1);
    });

    it('should apply size floors and defaults', () => {
      const resolved = resolveStyleConfig({ ...gridConfig(), width: 10, height: undefined });
      expect(resolved.width).toBe(64);
      expect(resolved.height).toBe(1024);
      expect(resolved.showCta).toBe(false);
    });
  });

  // ============ Grid ============

  describe('grid style', () => {
    it('should render a single placeholder tile when no images exist', async () => {
      const fetchImage = vi.fn<Parameters<ImageFetcher>, ReturnType<ImageFetcher>>(async () => null);
      const posts = [post('1', 'Touchdown crowd roars'), post('2', 'Crowd chants loud')];

      const meme = await composeMeme(posts, gridConfig(), { fetchImage, scorer: fixed(0.5) });

      expect(fetchImage).not.toHaveBeenCalled();
      expect(meme.width).toBe(256);
      expect(meme.height).toBe(256);
      expect(meme.metadata).toMatchObject({
        mood: MoodState.POSITIVE,
        moodLabel: 'HYPE',
        avgPolarity: 0.5,
        keywords: ['crowd', 'touchdown', 'roars', 'chants', 'loud'],
        event: 'TOUCHDOWN',
        style: 'grid',
        tilesRequested: 4,
        tilesUsed: 1,
        imagesFound: 0,
        imagesRequested: 0,
        imagesUsed: 0,
        imageUrlsUsed: [],
        headline: null,
        subline: null,
      });
      expect(meme.caption).toBe('Mood: HYPE. Keywords: crowd, touchdown, roars, chants. 15% OFF at Pizza Barn tonight.');
      expect([...meme.png.subarray(0, 4)]).toEqual([0x89, 0x50, 0x4e, 0x47]);
    });

    it('should sample one image per post up to the tile count', async () => {
      const posts = [
        post('1', 'Kickoff crowd', ['u0']),
        post('2', 'Kickoff lights', ['u1']),
        post('3', 'Kickoff snacks', ['u2']),
      ];
      const deps: ComposeDeps = {
        fetchImage: fetcherFor({ u0: solidPng('#ff0000'), u1: solidPng('#0000ff'), u2: solidPng('#00ff00') }),
        scorer: fixed(0),
        random: sequenceRandom([0]),
      };

      const meme = await composeMeme(posts, gridConfig({ tiles: 2 }), deps);

      expect(meme.metadata.imagesFound).toBe(3);
      expect(meme.metadata.imagesRequested).toBe(2);
      expect(meme.metadata.imageUrlsUsed).toEqual(['u0', 'u1']);
      expect(meme.metadata.tilesUsed).toBe(2);
    });

    it('should drop missing, failed and undecodable images without failing', async () => {
      const warn = vi.fn();
      const log: PipelineLogger = { debug: vi.fn(), warn };
      const posts = ['u0', 'u1', 'u2', 'u3'].map((url, i) => post(String(i), `Kickoff post ${i}`, [url]));
      const fetchImage: ImageFetcher = async (url) => {
        if (url === 'u0') return solidPng('#ff0000');
        if (url === 'u2') throw new Error('connection reset');
        if (url === 'u3') return Buffer.from('not an image');
        return null;
      };

      const meme = await composeMeme(posts, gridConfig(), { fetchImage, log, scorer: fixed(0), random: sequenceRandom([0]) });

      expect(meme.metadata.imagesRequested).toBe(4);
      expect(meme.metadata.imagesUsed).toBe(1);
      expect(meme.metadata.imageUrlsUsed).toEqual(['u0']);
      expect(meme.metadata.tilesUsed).toBe(4);
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn.mock.calls[0][0]).toMatchObject({ url: 'u3' });
    });

    it('should give up on a fetch that outlives its timeout', async () => {
      const posts = [post('1', 'Kickoff crowd', ['slow'])];
      const fetchImage: ImageFetcher = () => new Promise<Buffer | null>(() => {});

      const meme = await composeMeme(posts, gridConfig({ tiles: 1 }), {
        fetchImage,
        scorer: fixed(0),
        fetchTimeoutMs: 50,
      });

      expect(meme.metadata.imagesRequested).toBe(1);
      expect(meme.metadata.imagesUsed).toBe(0);
      expect(meme.metadata.tilesUsed).toBe(1);
    });

    it('should skip fetching once the request is cancelled', async () => {
      const controller = new AbortController();
      controller.abort();
      const fetchImage = vi.fn<Parameters<ImageFetcher>, ReturnType<ImageFetcher>>(async () => solidPng('#ff0000'));

      const meme = await composeMeme([post('1', 'Kickoff crowd', ['u0'])], gridConfig({ tiles: 1 }), {
        fetchImage,
        scorer: fixed(0),
        signal: controller.signal,
      });

      expect(fetchImage).not.toHaveBeenCalled();
      expect(meme.metadata.imagesUsed).toBe(0);
    });

    it('should bias keywords and images toward focus terms', async () => {
      const posts = [
        post('1', 'Crowd noise everywhere', ['u0']),
        post('2', 'Bad Bunny halftime set', ['u1']),
      ];
      const meme = await composeMeme(posts, gridConfig({ tiles: 1, focusBias: true }), {
        fetchImage: fetcherFor({ u0: solidPng('#ff0000'), u1: solidPng('#0000ff') }),
        scorer: fixed(0),
        focusTerms: ['Bad Bunny'],
      });

      expect(meme.metadata.focusTerms).toEqual(['Bad Bunny']);
      expect(meme.metadata.keywords[0]).toBe('Bad Bunny');
      expect(meme.metadata.imageUrlsUsed).toEqual(['u1']);
    });
  });

  // ============ Classic ============

  describe('classic style', () => {
    it('should split two images from one post and caption from the templates', async () => {
      const posts = [post('1', 'Halftime lights show', ['a', 'b'])];
      const meme = await composeMeme(
        posts,
        gridConfig({ style: 'classic' }),
        {
          fetchImage: fetcherFor({ a: solidPng('#ff0000'), b: solidPng('#0000ff') }),
          scorer: fixed(0),
          random: sequenceRandom([0]),
        },
      );

      expect(meme.metadata).toMatchObject({
        mood: MoodState.NEUTRAL,
        moodLabel: 'NEUTRAL',
        event: 'HALFTIME',
        style: 'classic',
        tilesUsed: 1,
        imagesRequested: 2,
        imagesUsed: 2,
        imageUrlsUsed: ['a', 'b'],
        headline: 'LIVE REACTION CHECK @ PIZZA BARN',
        subline: 'NEUTRAL: HALFTIME • LIGHTS • SHOW • 15% OFF',
      });
      expect(meme.caption).toBe(
        'LIVE REACTION CHECK @ PIZZA BARN — NEUTRAL: HALFTIME • LIGHTS • SHOW • 15% OFF. 15% OFF at Pizza Barn.',
      );
      expect(await pixelAt(meme.png, 64, 128)).toEqual([255, 0, 0]);
      expect(await pixelAt(meme.png, 192, 128)).toEqual([0, 0, 255]);
    });

    it('should draw from a post that mentions a focus term', async () => {
      const posts = [
        post('1', 'Crowd noise everywhere', ['a', 'b']),
        post('2', 'Bad Bunny halftime set', ['c']),
      ];
      const meme = await composeMeme(
        posts,
        gridConfig({ style: 'classic', focusBias: true }),
        {
          fetchImage: fetcherFor({ a: solidPng('#ff0000'), b: solidPng('#ff0000'), c: solidPng('#0000ff') }),
          scorer: fixed(0),
          random: sequenceRandom([0]),
          focusTerms: ['Bad Bunny'],
        },
      );

      expect(meme.metadata.imageUrlsUsed).toEqual(['c']);
      expect(await pixelAt(meme.png, 128, 128)).toEqual([0, 0, 255]);
    });

    it('should use a single image when two are not wanted', async () => {
      const posts = [post('1', 'Halftime lights show', ['a', 'b'])];
      const meme = await composeMeme(
        posts,
        gridConfig({ style: 'classic', twoImageBackground: false }),
        {
          fetchImage: fetcherFor({ a: solidPng('#ff0000'), b: solidPng('#0000ff') }),
          scorer: fixed(0),
          random: sequenceRandom([0]),
        },
      );

      expect(meme.metadata.imagesRequested).toBe(1);
      expect(meme.metadata.imageUrlsUsed).toEqual(['a']);
    });
  });
});
