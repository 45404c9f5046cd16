/**
 * Meme Composer
 *
 * Runs the whole pipeline for one request:
 * classify → mood → aligned keywords → focus bias → image plan →
 * bounded fetch → style render → PNG.
 *
 * Missing or broken images never fail a render; the styles fall back to
 * placeholder backgrounds. Callers only see an error if rendering itself
 * throws.
 */

import { createCanvas, loadImage } from '@napi-rs/canvas';
import type { Image } from '@napi-rs/canvas';
import type { RawPost, RenderedMeme, StyleConfig, TileCount } from '../../../shared/types.js';
import {
  ALIGNMENT_THRESHOLD,
  ALLOWED_TILES,
  CANVAS_SIZE,
  IMAGE_FETCH_TIMEOUT_MS,
  KEYWORD_TOP_K,
  MOOD_THRESHOLD,
} from '../../../shared/constants.js';
import {
  classifyMood,
  classifyPosts,
  meanPolarity,
  moodLabel,
  topEvent,
  vaderScorer,
} from './vibe-classifier.js';
import type { PolarityScorer } from './vibe-classifier.js';
import { extractKeywords } from './keyword-extractor.js';
import { biasKeywords, pickFocusTerms } from './focus-bias.js';
import { encodePng } from './image-compositor.js';
import { resolveFontFamily } from './text-layout.js';
import { MEME_STYLES } from './meme-styles.js';
import type { ResolvedStyleConfig, StyleInput } from './meme-styles.js';
import { defaultRandom } from '../utils/random.js';
import type { RandomSource } from '../utils/random.js';

// ============ Types ============

/** Raw image bytes for a URL, or null when unavailable. */
export type ImageFetcher = (url: string, signal: AbortSignal) => Promise<Buffer | null>;

export interface PipelineLogger {
  debug(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
}

export interface ComposeDeps {
  fetchImage: ImageFetcher;
  random?: RandomSource;
  scorer?: PolarityScorer;
  /** Overrides the random focus pool draw when focusBias is on. */
  focusTerms?: string[];
  log?: PipelineLogger;
  /** Request cancellation; aborts in-flight image fetches. */
  signal?: AbortSignal;
  fetchTimeoutMs?: number;
  moodThreshold?: number;
  alignmentThreshold?: number;
  topK?: number;
  fontPath?: string;
}

const silentLogger: PipelineLogger = {
  debug() {},
  warn() {},
};

// ============ Config ============

export function normalizeTiles(tiles: number): TileCount {
  return ALLOWED_TILES.find(t => t === tiles) ?? 4;
}

export function resolveStyleConfig(config: StyleConfig): ResolvedStyleConfig {
  return {
    ...config,
    tiles: normalizeTiles(config.tiles),
    width: Math.max(64, Math.floor(config.width ?? CANVAS_SIZE.WIDTH)),
    height: Math.max(64, Math.floor(config.height ?? CANVAS_SIZE.HEIGHT)),
    showCta: config.showCta ?? false,
  };
}

// ============ Image Loading ============

/**
 * One fetch with its own deadline, linked to the request signal. Resolves
 * null on timeout, abort or error, even if the fetcher ignores its signal.
 */
async function fetchWithDeadline(
  fetchImage: ImageFetcher,
  url: string,
  timeoutMs: number,
  parent: AbortSignal | undefined,
  log: PipelineLogger,
): Promise<Buffer | null> {
  if (parent?.aborted) return null;

  const controller = new AbortController();
  const onParentAbort = () => controller.abort();
  parent?.addEventListener('abort', onParentAbort, { once: true });

  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<null>(resolve => {
    timer = setTimeout(() => {
      log.debug({ url, timeoutMs }, 'Image fetch timed out');
      controller.abort();
    }, timeoutMs);
    controller.signal.addEventListener('abort', () => resolve(null), { once: true });
  });

  try {
    return await Promise.race([fetchImage(url, controller.signal), deadline]);
  } catch (err) {
    log.debug({ url, err }, 'Image fetch failed');
    return null;
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
  }
}

interface LoadedImage {
  url: string;
  image: Image;
}

/**
 * Fetches run concurrently (the plan is already capped at the style's
 * image budget); decode failures drop the slot.
 */
async function loadImages(urls: string[], deps: ComposeDeps, log: PipelineLogger): Promise<LoadedImage[]> {
  const timeoutMs = deps.fetchTimeoutMs ?? IMAGE_FETCH_TIMEOUT_MS;
  const settled = await Promise.all(
    urls.map(url => fetchWithDeadline(deps.fetchImage, url, timeoutMs, deps.signal, log)),
  );

  const loaded: LoadedImage[] = [];
  for (let i = 0; i < urls.length; i++) {
    const bytes = settled[i];
    if (!bytes || bytes.length === 0) continue;
    try {
      loaded.push({ url: urls[i], image: await loadImage(bytes) });
    } catch (err) {
      log.warn({ url: urls[i], err }, 'Image decode failed');
    }
  }
  return loaded;
}

// ============ Public API ============

export async function composeMeme(rawPosts: RawPost[], styleConfig: StyleConfig, deps: ComposeDeps): Promise<RenderedMeme> {
  const random = deps.random ?? defaultRandom;
  const log = deps.log ?? silentLogger;
  const topK = deps.topK ?? KEYWORD_TOP_K;
  const config = resolveStyleConfig(styleConfig);

  // Vibe first, keywords second
  const posts = classifyPosts(rawPosts, deps.scorer ?? vaderScorer);
  const avgPolarity = meanPolarity(posts);
  const mood = classifyMood(avgPolarity, deps.moodThreshold ?? MOOD_THRESHOLD);
  const label = moodLabel(mood);
  let keywords = extractKeywords(posts, mood, {
    topK,
    alignmentThreshold: deps.alignmentThreshold ?? ALIGNMENT_THRESHOLD,
  });

  const focusTerms = config.focusBias ? (deps.focusTerms ?? pickFocusTerms(random)) : [];
  if (config.focusBias) {
    keywords = biasKeywords(keywords, focusTerms, topK);
  }

  const style = MEME_STYLES[config.style];
  const input: StyleInput = {
    config,
    keywords,
    moodLabel: label,
    event: topEvent(posts),
    focusTerms,
    random,
    fontFamily: resolveFontFamily(deps.fontPath),
  };

  const urls = style.planImages(posts, input).slice(0, style.maxImages(config));
  const loaded = await loadImages(urls, deps, log);
  log.debug({ requested: urls.length, loaded: loaded.length, style: style.name }, 'Meme images loaded');

  const canvas = createCanvas(config.width, config.height);
  const outcome = style.render(canvas.getContext('2d'), loaded.map(l => l.image), input);

  return {
    png: encodePng(canvas),
    width: config.width,
    height: config.height,
    caption: outcome.caption,
    metadata: {
      mood,
      moodLabel: label,
      avgPolarity,
      keywords,
      focusTerms,
      event: input.event,
      style: style.name,
      tilesRequested: config.tiles,
      tilesUsed: outcome.tilesUsed,
      imagesFound: posts.filter(p => p.imageUrls.length > 0).length,
      imagesRequested: urls.length,
      imagesUsed: loaded.length,
      imageUrlsUsed: loaded.map(l => l.url),
      headline: outcome.headline,
      subline: outcome.subline,
    },
  };
}
