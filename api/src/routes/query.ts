/**
 * Querystring parsing shared by the routes
 *
 * Numeric ranges are clamped, as the listing routes always have been.
 * Enumerations and flags are strict: a bad value is a 400.
 */

import type { MemeStyleName } from '../../../shared/types.js';
import { MEME_DEFAULTS } from '../../../shared/constants.js';

export class BadRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BadRequestError';
  }
}

export function text(value: string | undefined, fallback: string): string {
  const trimmed = value?.trim();
  return trimmed ? trimmed : fallback;
}

export function clampedInt(value: string | undefined, fallback: number, min: number, max: number): number {
  return Math.min(Math.max(parseInt(value || String(fallback), 10) || fallback, min), max);
}

export function strictInt(name: string, value: string | undefined, fallback: number, min: number, max: number): number {
  if (value === undefined || value === '') return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
    throw new BadRequestError(`${name} must be an integer between ${min} and ${max}`);
  }
  return parsed;
}

const TRUE_VALUES = new Set(['true', '1', 'yes', 'on']);
const FALSE_VALUES = new Set(['false', '0', 'no', 'off']);

export function flag(name: string, value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') return fallback;
  const lower = value.toLowerCase();
  if (TRUE_VALUES.has(lower)) return true;
  if (FALSE_VALUES.has(lower)) return false;
  throw new BadRequestError(`${name} must be true or false`);
}

export function memeStyle(value: string | undefined): MemeStyleName {
  if (value === undefined || value === '' || value === 'grid') return 'grid';
  if (value === 'classic') return 'classic';
  throw new BadRequestError('style must be grid or classic');
}

// ============ Shared query shapes ============

export interface FeedQuery {
  subreddit?: string;
  q?: string;
  limit?: string;
}

export interface FeedParams {
  subreddit: string;
  query: string;
  limit: number;
}

export const FEED_LIMIT = { DEFAULT: 25, MIN: 5, MAX: 50 } as const;

export function feedParams(q: FeedQuery): FeedParams {
  return {
    subreddit: text(q.subreddit, MEME_DEFAULTS.SUBREDDIT),
    query: q.q?.trim() ?? MEME_DEFAULTS.QUERY,
    limit: clampedInt(q.limit, FEED_LIMIT.DEFAULT, FEED_LIMIT.MIN, FEED_LIMIT.MAX),
  };
}
