/**
 * Text Layout
 *
 * Greedy word wrap plus a descending font-size search that finds the
 * largest size whose wrapped block fits a box. Measurement goes through a
 * TextMeasurer so layout can be computed without a canvas.
 */

import { existsSync } from 'node:fs';
import { GlobalFonts } from '@napi-rs/canvas';
import type { SKRSContext2D } from '@napi-rs/canvas';
import {
  FONT_STEP,
  LINE_HEIGHT_RATIO,
  MAX_TOKEN_CHARS,
  MIN_FONT_SIZE,
} from '../../../shared/constants.js';

export interface TextMeasurer {
  /** Rendered width in pixels of `text` at `fontSize`. */
  measure(text: string, fontSize: number): number;
}

export interface FittedText {
  fontSize: number;
  lines: string[];
  lineHeight: number;
}

// ============ Font Ladder ============

export const DEFAULT_FONT_FAMILY = 'sans-serif';
const FONT_ALIAS = 'MemeDisplay';

export const FONT_CANDIDATES = [
  '/System/Library/Fonts/Supplemental/Impact.ttf',
  '/System/Library/Fonts/Supplemental/Arial Bold.ttf',
  '/Library/Fonts/Impact.ttf',
  '/usr/share/fonts/truetype/dejavu/DejaVuSans-Bold.ttf',
  '/usr/share/fonts/truetype/liberation/LiberationSans-Bold.ttf',
];

const resolvedFamilies = new Map<string, string>();

/**
 * First candidate that exists and registers wins; the generic family is
 * the floor. Never throws.
 */
export function resolveFontFamily(preferredPath = ''): string {
  const cached = resolvedFamilies.get(preferredPath);
  if (cached) return cached;

  const candidates = preferredPath ? [preferredPath, ...FONT_CANDIDATES] : FONT_CANDIDATES;
  let family = DEFAULT_FONT_FAMILY;
  for (const path of candidates) {
    if (!existsSync(path)) continue;
    if (GlobalFonts.registerFromPath(path, FONT_ALIAS)) {
      family = FONT_ALIAS;
      break;
    }
  }

  resolvedFamilies.set(preferredPath, family);
  return family;
}

export function fontString(fontSize: number, family: string, weight: 'bold' | 'normal' = 'bold'): string {
  if (family === DEFAULT_FONT_FAMILY) {
    return `${weight} ${fontSize}px ${DEFAULT_FONT_FAMILY}`;
  }
  return `${weight} ${fontSize}px "${family}", ${DEFAULT_FONT_FAMILY}`;
}

export function createCanvasMeasurer(ctx: SKRSContext2D, family: string): TextMeasurer {
  return {
    measure(text: string, fontSize: number): number {
      ctx.font = fontString(fontSize, family);
      return ctx.measureText(text).width;
    },
  };
}

// ============ Metrics ============

export function lineHeightFor(fontSize: number): number {
  return Math.floor(fontSize * LINE_HEIGHT_RATIO);
}

export function strokeWidthFor(fontSize: number): number {
  return Math.max(2, Math.floor(fontSize / 14));
}

// ============ Wrapping ============

/**
 * Greedy wrap. A single token wider than maxWidth gets a line of its own,
 * cut to MAX_TOKEN_CHARS characters.
 */
export function wrapText(measurer: TextMeasurer, text: string, fontSize: number, maxWidth: number): string[] {
  const words = text.split(/\s+/).filter(w => w.length > 0);
  const lines: string[] = [];
  let current: string[] = [];

  for (const word of words) {
    const trial = [...current, word].join(' ');
    if (measurer.measure(trial, fontSize) <= maxWidth) {
      current.push(word);
      continue;
    }

    if (current.length > 0) {
      lines.push(current.join(' '));
      current = [];
    }

    if (measurer.measure(word, fontSize) <= maxWidth) {
      current = [word];
    } else {
      lines.push(word.slice(0, MAX_TOKEN_CHARS));
    }
  }

  if (current.length > 0) {
    lines.push(current.join(' '));
  }
  return lines;
}

export function fitAndWrap(
  measurer: TextMeasurer,
  text: string,
  maxWidth: number,
  maxHeight: number,
  startSize: number,
  minSize: number = MIN_FONT_SIZE,
): FittedText {
  const trimmed = (text || '').trim();
  if (!trimmed) {
    return { fontSize: minSize, lines: [], lineHeight: lineHeightFor(minSize) };
  }

  for (let size = startSize; size >= minSize; size -= FONT_STEP) {
    const lines = wrapText(measurer, trimmed, size, maxWidth);
    if (lines.length === 0) continue;
    const lineHeight = lineHeightFor(size);
    if (lines.length * lineHeight <= maxHeight) {
      return { fontSize: size, lines, lineHeight };
    }
  }

  // Nothing fits: smallest size, overflow is clipped by the caller's canvas
  return {
    fontSize: minSize,
    lines: wrapText(measurer, trimmed, minSize, maxWidth),
    lineHeight: lineHeightFor(minSize),
  };
}

/**
 * Left x for each line so it sits centred, stroke included, never closer
 * than 10px to the left edge.
 */
export function centerOffsets(
  measurer: TextMeasurer,
  lines: string[],
  fontSize: number,
  canvasWidth: number,
  strokeWidth: number = strokeWidthFor(fontSize),
): number[] {
  return lines.map(line => {
    const width = measurer.measure(line, fontSize) + strokeWidth * 2;
    return Math.max(Math.floor((canvasWidth - width) / 2), 10);
  });
}
