/**
 * Buzz Meme Shared Constants
 */

// ============ Vibe Constants ============

// Mean polarity must be strictly above/below these to leave NEUTRAL
export const MOOD_THRESHOLD = 0.2;

// Per-post polarity needed to count as aligned with a non-neutral mood
export const ALIGNMENT_THRESHOLD = 0.1;

export const KEYWORD_TOP_K = 6;
export const MIN_TOKEN_LENGTH = 3;

// ============ Canvas Constants ============

export const CANVAS_SIZE = {
  WIDTH: 1024,
  HEIGHT: 1024,
} as const;

export const ALLOWED_TILES = [1, 2, 4] as const;

export const COLORS = {
  GRID_BG: '#0a0f1e',
  PLACEHOLDER: '#1e233c',
  TEXT: '#ffffff',
  OUTLINE: '#000000',
  BOX: '#000000',
  CTA_BG: '#ffd54f',
  CTA_TEXT: '#0f141e',
} as const;

// ============ Layout Constants ============

export const LINE_HEIGHT_RATIO = 1.1;
export const FONT_STEP = 4;
export const MIN_FONT_SIZE = 18;
export const MAX_TOKEN_CHARS = 40;

export const BLUR_RADIUS = 18;
export const DARKEN_ALPHA = 0.18;
export const CONTAIN_INSET = 40;

// ============ Fetch Constants ============

export const IMAGE_FETCH_TIMEOUT_MS = 10_000;
export const POST_FETCH_TIMEOUT_MS = 8_000;
export const IMAGE_CACHE_TTL_SECONDS = 600;
export const WIKI_CACHE_TTL_SECONDS = 300;
export const IMAGE_CACHE_MAX_ENTRIES = 200;
export const WIKI_CACHE_MAX_ENTRIES = 500;
export const MAX_IMAGE_BYTES = 8 * 1024 * 1024;

export const USER_AGENT = 'buzz-meme/0.1';

// ============ Route Defaults ============

export const MEME_DEFAULTS = {
  BUSINESS: 'local pizza shop',
  OFFER: '15% OFF',
  QUERY: 'super bowl',
  SUBREDDIT: 'nfl',
  TILES: 4,
} as const;
