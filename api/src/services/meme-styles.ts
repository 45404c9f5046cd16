/**
 * Meme Styles
 *
 * Each style decides which image URLs it wants from the post batch and how
 * to lay the final canvas out. Both share the compositor and text-layout
 * primitives.
 */

import type { SKRSContext2D } from '@napi-rs/canvas';
import type {
  EventTag,
  MemeStyleName,
  MoodLabel,
  Post,
  StyleConfig,
  TileCount,
} from '../../../shared/types.js';
import { COLORS } from '../../../shared/constants.js';
import { filterByFocus } from './focus-bias.js';
import { selectCaption } from './caption-templates.js';
import {
  drawCenteredLines,
  drawNoImagesNotice,
  drawTextBox,
  renderClassicBackground,
  renderGridBackground,
} from './image-compositor.js';
import type { ImageSource } from './image-compositor.js';
import { createCanvasMeasurer, fitAndWrap } from './text-layout.js';
import { pickOne, sample } from '../utils/random.js';
import type { RandomSource } from '../utils/random.js';

export type ResolvedStyleConfig = Required<StyleConfig>;

export interface StyleInput {
  config: ResolvedStyleConfig;
  keywords: string[];
  moodLabel: MoodLabel;
  event: EventTag | null;
  focusTerms: string[];
  random: RandomSource;
  fontFamily: string;
}

export interface StyleOutcome {
  tilesUsed: number;
  caption: string;
  headline: string | null;
  subline: string | null;
}

export interface MemeStyle {
  readonly name: MemeStyleName;
  /** Upper bound on images this style will ever draw. */
  maxImages(config: ResolvedStyleConfig): number;
  planImages(posts: Post[], input: StyleInput): string[];
  render(ctx: SKRSContext2D, images: ImageSource[], input: StyleInput): StyleOutcome;
}

function withImages(posts: Post[]): Post[] {
  return posts.filter(p => p.imageUrls.length > 0);
}

function scaleFor(config: ResolvedStyleConfig): number {
  return Math.min(config.width, config.height) / 1024;
}

function scaled(size: number, scale: number, floor = 8): number {
  return Math.max(floor, Math.round(size * scale));
}

// ============ Grid ============

// Fractions of canvas height reserved for the overlay bands
const GRID_TOP_BAR = 0.117;
const GRID_CTA_BAND = 0.137;

export class GridStyle implements MemeStyle {
  readonly name = 'grid' as const;

  maxImages(config: ResolvedStyleConfig): number {
    return config.tiles;
  }

  /**
   * One image (the first URL) per post; posts are sampled when there are
   * more than tiles.
   */
  planImages(posts: Post[], input: StyleInput): string[] {
    const want = input.config.tiles;
    let candidates = withImages(posts);
    if (input.focusTerms.length > 0) {
      candidates = filterByFocus(candidates, input.focusTerms);
    }
    candidates = candidates.length > want
      ? sample(input.random, candidates, want)
      : candidates.slice(0, want);
    return candidates.map(p => p.imageUrls[0]);
  }

  render(ctx: SKRSContext2D, images: ImageSource[], input: StyleInput): StyleOutcome {
    const { config, keywords, moodLabel, fontFamily } = input;
    const { width, height } = config;
    const scale = scaleFor(config);
    const tilesUsed: TileCount = images.length === 0 ? 1 : config.tiles;

    const boxes = renderGridBackground(ctx, images, tilesUsed, width, height);

    if (images.length === 0) {
      drawNoImagesNotice(ctx, width, height, fontFamily);
    }

    // Top bar: mood + keywords
    const topText = [moodLabel, ...keywords.slice(0, 4).map(k => k.toUpperCase())].join(' • ');
    drawTextBox(ctx, { x0: 0, y0: 0, x1: width, y1: Math.round(height * GRID_TOP_BAR) },
      topText, scaled(72, scale), fontFamily);

    // Bottom CTA band
    const ctaH = Math.round(height * GRID_CTA_BAND);
    drawTextBox(ctx, { x0: 0, y0: height - ctaH, x1: width, y1: height },
      `${config.offer} — ${config.business}`, scaled(60, scale), fontFamily,
      { text: COLORS.CTA_TEXT, box: COLORS.CTA_BG });

    // Per-tile keyword labels, kept above the CTA band
    const pad = scaled(10, scale, 2);
    const labelH = scaled(100, scale, 20);
    boxes.forEach((box, i) => {
      if (i >= keywords.length) return;
      const ly1 = Math.min(box.y1 - pad, height - ctaH - pad);
      const ly0 = Math.max(box.y0 + pad, ly1 - labelH);
      if (ly1 <= ly0) return;
      drawTextBox(ctx, { x0: box.x0 + pad, y0: ly0, x1: box.x1 - pad, y1: ly1 },
        keywords[i].toUpperCase(), scaled(54, scale), fontFamily);
    });

    const caption = `Mood: ${moodLabel}. Keywords: ${keywords.slice(0, 4).join(', ')}. ` +
      `${config.offer} at ${config.business} tonight.`;

    return { tilesUsed, caption, headline: null, subline: null };
  }
}

// ============ Classic ============

const CLASSIC_BAND = 0.28;

export class ClassicStyle implements MemeStyle {
  readonly name = 'classic' as const;

  maxImages(config: ResolvedStyleConfig): number {
    return config.twoImageBackground ? 2 : 1;
  }

  /**
   * One source post so a split background always shows related photos.
   * Two images only when asked for, available, and a coin flip agrees.
   */
  planImages(posts: Post[], input: StyleInput): string[] {
    const { config, random } = input;
    const candidates = filterByFocus(withImages(posts), input.focusTerms);
    const src = pickOne(random, candidates);
    if (!src) return [];

    const urls = src.imageUrls;
    let want = 1;
    if (config.twoImageBackground && urls.length >= 2 && random() < 0.5) {
      want = 2;
    }
    return sample(random, urls, Math.min(want, urls.length));
  }

  render(ctx: SKRSContext2D, images: ImageSource[], input: StyleInput): StyleOutcome {
    const { config, fontFamily } = input;
    const { width, height } = config;
    const scale = scaleFor(config);

    renderClassicBackground(ctx, images.slice(0, 2), width, height);

    const { headline, subline } = selectCaption({
      mood: input.moodLabel,
      keywords: input.keywords,
      topic: config.topic,
      business: config.business,
      offer: config.offer,
      event: input.event,
    }, input.random);

    const measurer = createCanvasMeasurer(ctx, fontFamily);
    const margin = scaled(24, scale, 4);
    const maxW = width - 2 * margin;
    const ctaH = config.showCta ? scaled(84, scale, 16) : 0;
    const bandH = Math.floor(height * CLASSIC_BAND);
    const minSize = scaled(18, scale);

    const top = fitAndWrap(measurer, headline.trim().toUpperCase(), maxW, bandH, scaled(96, scale), minSize);
    drawCenteredLines(ctx, top.lines, margin, width, top.fontSize, top.lineHeight, fontFamily);

    const bottom = fitAndWrap(measurer, subline.trim().toUpperCase(), maxW, bandH, scaled(92, scale), minSize);
    const bottomY = Math.max(height - ctaH - margin - bottom.lineHeight * bottom.lines.length, margin + bandH);
    drawCenteredLines(ctx, bottom.lines, bottomY, width, bottom.fontSize, bottom.lineHeight, fontFamily);

    if (config.showCta) {
      drawTextBox(ctx, { x0: 0, y0: height - ctaH, x1: width, y1: height },
        `${config.offer} @ ${config.business}`.trim(), scaled(42, scale), fontFamily,
        { text: COLORS.CTA_TEXT, box: COLORS.CTA_BG });
    }

    const caption = `${headline} — ${subline}. ${config.offer} at ${config.business}.`;
    return { tilesUsed: 1, caption, headline, subline };
  }
}

export const MEME_STYLES: Record<MemeStyleName, MemeStyle> = {
  grid: new GridStyle(),
  classic: new ClassicStyle(),
};
