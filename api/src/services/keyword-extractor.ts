/**
 * Keyword Extractor
 *
 * Frequency-ranked keywords taken from the posts that agree with the
 * batch mood. Keyword extraction always runs after mood classification.
 */

import { MoodState } from '../../../shared/types.js';
import type { Post } from '../../../shared/types.js';
import { ALIGNMENT_THRESHOLD, KEYWORD_TOP_K, MIN_TOKEN_LENGTH } from '../../../shared/constants.js';

const TOKEN_REGEX = new RegExp(`[a-z]{${MIN_TOKEN_LENGTH},}`, 'g');

export const STOP_WORDS = new Set([
  // articles, conjunctions, prepositions
  'the', 'and', 'but', 'for', 'with', 'from',
  // verbs and pronouns
  'are', 'was', 'were', 'been', 'being', 'its', 'this', 'that', 'these', 'those',
  'you', 'your', 'our', 'they', 'their',
  // feed noise
  'game', 'thread', 'highlight', 'report', 'per', 'new', 'today', 'team', 'teams',
  'season', 'super', 'bowl', 'nfl',
  // url fragments
  'http', 'https', 'www', 'com', 'amp',
]);

export interface KeywordOptions {
  topK?: number;
  alignmentThreshold?: number;
}

/**
 * Posts whose polarity agrees with the mood. NEUTRAL keeps everything.
 */
export function alignedPosts(posts: Post[], mood: MoodState, threshold: number = ALIGNMENT_THRESHOLD): Post[] {
  switch (mood) {
    case MoodState.POSITIVE:
      return posts.filter(p => p.polarity >= threshold);
    case MoodState.NEGATIVE:
      return posts.filter(p => p.polarity <= -threshold);
    default:
      return posts;
  }
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(TOKEN_REGEX) ?? [];
}

/**
 * Rank tokens by frequency; Map insertion order keeps first-seen tie-breaks
 * because Array.prototype.sort is stable.
 */
export function rankTokens(texts: string[], topK: number): string[] {
  const counts = new Map<string, number>();
  for (const text of texts) {
    for (const token of tokenize(text)) {
      if (STOP_WORDS.has(token)) continue;
      counts.set(token, (counts.get(token) ?? 0) + 1);
    }
  }

  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, Math.max(topK, 0))
    .map(([token]) => token);
}

export function extractKeywords(posts: Post[], mood: MoodState, options: KeywordOptions = {}): string[] {
  const topK = options.topK ?? KEYWORD_TOP_K;
  const aligned = alignedPosts(posts, mood, options.alignmentThreshold ?? ALIGNMENT_THRESHOLD);
  const corpus = aligned.length > 0 ? aligned : posts;
  return rankTokens(corpus.map(p => `${p.title}\n${p.body}`), topK);
}
