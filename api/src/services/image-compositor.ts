/**
 * Image Compositor
 *
 * Canvas primitives for meme backgrounds and overlays.
 * Uses @napi-rs/canvas (prebuilt Skia, no system deps).
 *
 * Backgrounds come in two flavours: a 1/2/4 tile grid of cover-filled
 * photos, and the "classic" contain-on-blur composition that never crops
 * the subject out of frame.
 */

import { createCanvas } from '@napi-rs/canvas';
import type { Canvas, Image, SKRSContext2D } from '@napi-rs/canvas';
import type { LayoutBox, TileCount } from '../../../shared/types.js';
import {
  BLUR_RADIUS,
  COLORS,
  CONTAIN_INSET,
  DARKEN_ALPHA,
} from '../../../shared/constants.js';
import {
  createCanvasMeasurer,
  centerOffsets,
  fontString,
  strokeWidthFor,
  wrapText,
} from './text-layout.js';

export type ImageSource = Image | Canvas;

export interface Size {
  width: number;
  height: number;
}

export interface TextStyle {
  fill: string;
  outline: string;
  strokeWidth: number;
}

export interface BoxColors {
  text: string;
  box: string;
}

export const NO_IMAGES_NOTICE = 'NO LIVE IMAGES FOUND';
export const NO_IMAGES_HINT = 'Try: subreddit=pics or a different q=...';

// ============ Geometry ============

export function boxWidth(box: LayoutBox): number {
  return box.x1 - box.x0;
}

export function boxHeight(box: LayoutBox): number {
  return box.y1 - box.y0;
}

/**
 * 1 → full canvas, 2 → left/right halves, 4 → quadrants.
 */
export function gridBoxes(tiles: TileCount, width: number, height: number): LayoutBox[] {
  const halfW = Math.floor(width / 2);
  const halfH = Math.floor(height / 2);

  switch (tiles) {
    case 1:
      return [{ x0: 0, y0: 0, x1: width, y1: height }];
    case 2:
      return [
        { x0: 0, y0: 0, x1: halfW, y1: height },
        { x0: halfW, y0: 0, x1: width, y1: height },
      ];
    case 4:
      return [
        { x0: 0, y0: 0, x1: halfW, y1: halfH },
        { x0: halfW, y0: 0, x1: width, y1: halfH },
        { x0: 0, y0: halfH, x1: halfW, y1: height },
        { x0: halfW, y0: halfH, x1: width, y1: height },
      ];
  }
}

/**
 * Largest aspect-preserving size within max bounds. Never enlarges.
 */
export function containSize(srcW: number, srcH: number, maxW: number, maxH: number): Size {
  if (srcW <= 0 || srcH <= 0) return { width: Math.max(1, maxW), height: Math.max(1, maxH) };
  const scale = Math.min(1, maxW / srcW, maxH / srcH);
  return {
    width: Math.max(1, Math.round(srcW * scale)),
    height: Math.max(1, Math.round(srcH * scale)),
  };
}

// ============ Resizing ============

/**
 * Scale uniformly to cover width × height, then centre-crop the excess.
 */
export function coverResize(src: ImageSource, width: number, height: number): Canvas {
  const canvas = createCanvas(width, height);
  const ctx = canvas.getContext('2d');
  const srcW = src.width;
  const srcH = src.height;

  if (srcW === 0 || srcH === 0) {
    ctx.drawImage(src, 0, 0, width, height);
    return canvas;
  }

  if (srcW === width && srcH === height) {
    ctx.drawImage(src, 0, 0);
    return canvas;
  }

  const scale = Math.max(width / srcW, height / srcH);
  const scaledW = Math.max(width, Math.round(srcW * scale));
  const scaledH = Math.max(height, Math.round(srcH * scale));
  const left = Math.max(Math.floor((scaledW - width) / 2), 0);
  const top = Math.max(Math.floor((scaledH - height) / 2), 0);

  ctx.drawImage(src, 0, 0, srcW, srcH, -left, -top, scaledW, scaledH);
  return canvas;
}

/**
 * Blurred, darkened cover fill with the whole image contained on top.
 */
export function containOnBlur(src: ImageSource, width: number, height: number): Canvas {
  const canvas = createCanvas(width, height);
  const ctx = canvas.getContext('2d');

  ctx.filter = `blur(${BLUR_RADIUS}px)`;
  ctx.drawImage(coverResize(src, width, height), 0, 0);
  ctx.filter = 'none';

  ctx.fillStyle = `rgba(0, 0, 0, ${DARKEN_ALPHA})`;
  ctx.fillRect(0, 0, width, height);

  const fg = containSize(src.width, src.height, width - CONTAIN_INSET, height - CONTAIN_INSET);
  const x = Math.floor((width - fg.width) / 2);
  const y = Math.floor((height - fg.height) / 2);
  ctx.drawImage(src, 0, 0, src.width, src.height, x, y, fg.width, fg.height);

  return canvas;
}

// ============ Backgrounds ============

/**
 * Cover-filled tiles; tiles past the end of `images` get the placeholder colour.
 */
export function renderGridBackground(
  ctx: SKRSContext2D,
  images: ImageSource[],
  tiles: TileCount,
  width: number,
  height: number,
): LayoutBox[] {
  ctx.fillStyle = COLORS.GRID_BG;
  ctx.fillRect(0, 0, width, height);

  const boxes = gridBoxes(tiles, width, height);
  boxes.forEach((box, i) => {
    const w = boxWidth(box);
    const h = boxHeight(box);
    const image = images[i];
    if (image) {
      ctx.drawImage(coverResize(image, w, h), box.x0, box.y0);
    } else {
      ctx.fillStyle = COLORS.PLACEHOLDER;
      ctx.fillRect(box.x0, box.y0, w, h);
    }
  });
  return boxes;
}

/**
 * 0 images → flat colour, 1 → contain-on-blur, 2 → independent halves.
 */
export function renderClassicBackground(
  ctx: SKRSContext2D,
  images: ImageSource[],
  width: number,
  height: number,
): void {
  ctx.fillStyle = COLORS.PLACEHOLDER;
  ctx.fillRect(0, 0, width, height);

  if (images.length === 1) {
    ctx.drawImage(containOnBlur(images[0], width, height), 0, 0);
  } else if (images.length >= 2) {
    const leftW = Math.floor(width / 2);
    const rightW = width - leftW;
    ctx.drawImage(containOnBlur(images[0], leftW, height), 0, 0);
    ctx.drawImage(containOnBlur(images[1], rightW, height), leftW, 0);
  }
}

// ============ Text ============

/**
 * Outline first, then fill. If the backend rejects strokeText this line is
 * filled plain.
 */
export function drawOutlinedText(ctx: SKRSContext2D, text: string, x: number, y: number, style: TextStyle): void {
  if (style.strokeWidth > 0) {
    try {
      ctx.lineJoin = 'round';
      ctx.lineWidth = style.strokeWidth * 2;
      ctx.strokeStyle = style.outline;
      ctx.strokeText(text, x, y);
    } catch (err) {
      console.warn('Outline text failed, filling plain:', err);
    }
  }
  ctx.fillStyle = style.fill;
  ctx.fillText(text, x, y);
}

/**
 * Solid box with up to three wrapped, outlined lines inset by 12px.
 */
export function drawTextBox(
  ctx: SKRSContext2D,
  box: LayoutBox,
  text: string,
  fontSize: number,
  family: string,
  colors: BoxColors = { text: COLORS.TEXT, box: COLORS.BOX },
): void {
  ctx.fillStyle = colors.box;
  ctx.fillRect(box.x0, box.y0, boxWidth(box), boxHeight(box));

  const measurer = createCanvasMeasurer(ctx, family);
  const lines = wrapText(measurer, text, fontSize, boxWidth(box) - 24);
  const style: TextStyle = {
    fill: colors.text,
    outline: COLORS.OUTLINE,
    strokeWidth: Math.max(2, Math.floor(fontSize / 18)),
  };

  ctx.textBaseline = 'top';
  ctx.font = fontString(fontSize, family);
  let y = box.y0 + 12;
  for (const line of lines.slice(0, 3)) {
    drawOutlinedText(ctx, line, box.x0 + 12, y, style);
    y += Math.floor(fontSize * 1.15);
  }
}

/**
 * Horizontally centred lines with the meme-style white fill/black outline.
 */
export function drawCenteredLines(
  ctx: SKRSContext2D,
  lines: string[],
  y0: number,
  width: number,
  fontSize: number,
  lineHeight: number,
  family: string,
): void {
  if (lines.length === 0) return;

  const measurer = createCanvasMeasurer(ctx, family);
  const strokeWidth = strokeWidthFor(fontSize);
  const offsets = centerOffsets(measurer, lines, fontSize, width, strokeWidth);
  const style: TextStyle = { fill: COLORS.TEXT, outline: COLORS.OUTLINE, strokeWidth };

  ctx.textBaseline = 'top';
  ctx.font = fontString(fontSize, family);
  lines.forEach((line, i) => {
    drawOutlinedText(ctx, line, offsets[i] + strokeWidth, y0 + i * lineHeight, style);
  });
}

/**
 * Explicit marker so an image-less grid never looks blank.
 */
export function drawNoImagesNotice(ctx: SKRSContext2D, width: number, height: number, family: string): LayoutBox {
  const scale = Math.min(width, height) / 1024;
  const notice: LayoutBox = {
    x0: 0,
    y0: Math.round(height * 0.195),
    x1: width,
    y1: Math.round(height * 0.352),
  };
  const hint: LayoutBox = {
    x0: 0,
    y0: Math.round(height * 0.361),
    x1: width,
    y1: Math.round(height * 0.44),
  };
  drawTextBox(ctx, notice, NO_IMAGES_NOTICE, Math.max(10, Math.round(80 * scale)), family);
  drawTextBox(ctx, hint, NO_IMAGES_HINT, Math.max(8, Math.round(40 * scale)), family);
  return notice;
}

// ============ Promo Card ============

export interface PromoCopy {
  headline: string;
  punchline: string;
  cta: string;
  footer: string;
}

function roundRect(ctx: SKRSContext2D, x: number, y: number, w: number, h: number, r: number) {
  ctx.beginPath();
  ctx.moveTo(x + r, y);
  ctx.lineTo(x + w - r, y);
  ctx.quadraticCurveTo(x + w, y, x + w, y + r);
  ctx.lineTo(x + w, y + h - r);
  ctx.quadraticCurveTo(x + w, y + h, x + w - r, y + h);
  ctx.lineTo(x + r, y + h);
  ctx.quadraticCurveTo(x, y + h, x, y + h - r);
  ctx.lineTo(x, y + r);
  ctx.quadraticCurveTo(x, y, x + r, y);
  ctx.closePath();
}

function shadowText(ctx: SKRSContext2D, text: string, x: number, y: number, fill: string) {
  ctx.fillStyle = '#000000';
  ctx.fillText(text, x + 3, y + 3);
  ctx.fillText(text, x + 2, y + 2);
  ctx.fillStyle = fill;
  ctx.fillText(text, x, y);
}

/**
 * Text-only promo card: gradient background, shadowed headline and
 * punchline, rounded CTA banner, footer line.
 */
export function renderPromoCard(copy: PromoCopy, family: string, width = 1024, height = 1024): Buffer {
  const canvas = createCanvas(width, height);
  const ctx = canvas.getContext('2d');
  const scale = Math.min(width, height) / 1024;
  const pad = Math.round(64 * scale);
  const maxW = width - pad * 2;
  const measurer = createCanvasMeasurer(ctx, family);

  // Background
  const grad = ctx.createLinearGradient(0, 0, 0, height);
  grad.addColorStop(0, 'rgb(10, 20, 50)');
  grad.addColorStop(1, 'rgb(40, 60, 130)');
  ctx.fillStyle = grad;
  ctx.fillRect(0, 0, width, height);
  ctx.textBaseline = 'top';

  // Headline
  const headSize = Math.round(84 * scale);
  let y = pad;
  for (const line of wrapText(measurer, copy.headline.toUpperCase(), headSize, maxW)) {
    ctx.font = fontString(headSize, family);
    shadowText(ctx, line, pad, y, COLORS.TEXT);
    y += Math.floor(headSize * 1.05);
  }

  // Punchline
  const punchSize = Math.round(44 * scale);
  y += Math.round(16 * scale);
  for (const line of wrapText(measurer, copy.punchline, punchSize, maxW)) {
    ctx.font = fontString(punchSize, family);
    shadowText(ctx, line, pad, y, '#e6f0ff');
    y += Math.floor(punchSize * 1.25);
  }

  // CTA banner
  const ctaSize = Math.round(64 * scale);
  const bannerH = Math.round(160 * scale);
  const bannerY = height - pad - bannerH;
  roundRect(ctx, pad, bannerY, maxW, bannerH, Math.round(28 * scale));
  ctx.fillStyle = COLORS.CTA_BG;
  ctx.fill();

  let ctaY = bannerY + Math.round(24 * scale);
  for (const line of wrapText(measurer, copy.cta.toUpperCase(), ctaSize, maxW - 40).slice(0, 2)) {
    ctx.font = fontString(ctaSize, family);
    ctx.fillStyle = COLORS.CTA_TEXT;
    ctx.fillText(line, pad + Math.round(24 * scale), ctaY);
    ctaY += Math.floor(ctaSize * 1.05);
  }

  // Footer
  ctx.font = fontString(Math.round(28 * scale), family, 'normal');
  ctx.fillStyle = '#c8d2e6';
  ctx.fillText(copy.footer, pad, height - pad + Math.round(12 * scale));

  return encodePng(canvas);
}

// ============ Encoding ============

export function encodePng(canvas: Canvas): Buffer {
  return Buffer.from(canvas.toBuffer('image/png'));
}
