/**
 * Vibe Classifier
 *
 * Scores post polarity and folds a batch into a single mood.
 * Polarity comes from VADER (lexicon + rules: negation, intensifiers,
 * punctuation and caps emphasis). The scorer is pluggable so tests and
 * alternative lexicons can stand in for it.
 */

import vader from 'vader-sentiment';
import { MoodState } from '../../../shared/types.js';
import type { EventTag, MoodLabel, Post, RawPost } from '../../../shared/types.js';
import { MOOD_THRESHOLD } from '../../../shared/constants.js';

// ============ Polarity ============

export interface PolarityScorer {
  /** Returns a polarity score; callers clamp into [-1, 1]. */
  score(text: string): number;
}

export const vaderScorer: PolarityScorer = {
  score(text: string): number {
    return vader.SentimentIntensityAnalyzer.polarity_scores(text).compound;
  },
};

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

export function scorePolarity(text: string, scorer: PolarityScorer = vaderScorer): number {
  if (!text || !text.trim()) return 0;
  const raw = scorer.score(text);
  if (!Number.isFinite(raw)) return 0;
  return clamp(raw, -1, 1);
}

// ============ Event Detection ============

const EVENT_PATTERNS: Array<[RegExp, EventTag]> = [
  [/\btouchdown\b/i, 'TOUCHDOWN'],
  [/\bfumble\b/i, 'FUMBLE'],
  [/\binterception\b/i, 'INTERCEPTION'],
  [/\bhalftime\b/i, 'HALFTIME'],
  [/\bcommercial\b|\bad\b/i, 'COMMERCIAL'],
];

/**
 * Coarse "moment" label for a post, first matching pattern wins.
 */
export function detectEvent(text: string): EventTag | null {
  for (const [pattern, tag] of EVENT_PATTERNS) {
    if (pattern.test(text)) return tag;
  }
  return null;
}

export function topEvent(posts: Post[]): EventTag | null {
  for (const p of posts) {
    if (p.event) return p.event;
  }
  return null;
}

// ============ Classification ============

export function postText(post: Pick<RawPost, 'title' | 'body'>): string {
  return `${post.title}\n${post.body}`.trim();
}

export function classifyPosts(posts: RawPost[], scorer: PolarityScorer = vaderScorer): Post[] {
  return posts.map(p => {
    const text = postText(p);
    return {
      ...p,
      polarity: scorePolarity(text, scorer),
      event: detectEvent(text),
    };
  });
}

export function meanPolarity(posts: Array<Pick<Post, 'polarity'>>): number {
  if (posts.length === 0) return 0;
  let sum = 0;
  for (const p of posts) sum += p.polarity;
  return sum / posts.length;
}

/**
 * Boundaries are exclusive: a mean of exactly +threshold is NEUTRAL.
 */
export function classifyMood(mean: number, threshold: number = MOOD_THRESHOLD): MoodState {
  if (mean > threshold) return MoodState.POSITIVE;
  if (mean < -threshold) return MoodState.NEGATIVE;
  return MoodState.NEUTRAL;
}

export function moodLabel(mood: MoodState): MoodLabel {
  switch (mood) {
    case MoodState.POSITIVE:
      return 'HYPE';
    case MoodState.NEGATIVE:
      return 'SALTY';
    default:
      return 'NEUTRAL';
  }
}
