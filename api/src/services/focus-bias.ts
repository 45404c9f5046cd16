/**
 * Focus Bias
 *
 * Steers a meme toward a fixed set of people/teams: focus labels go to the
 * front of the keyword list, and candidate posts are narrowed to the ones
 * that mention a focus term.
 *
 * Matching is plain case-insensitive substring containment, so very short
 * terms can over-match.
 */

import type { FocusTerm, RawPost } from '../../../shared/types.js';
import { KEYWORD_TOP_K } from '../../../shared/constants.js';
import { pickOne } from '../utils/random.js';
import type { RandomSource } from '../utils/random.js';

// ============ Focus Pools ============
// Editable demo pools, not authoritative rosters.

export const FOCUS_HEADLINERS = ['Bad Bunny'];

export const FOCUS_SEAHAWKS_PLAYERS = [
  'Geno Smith',
  'DK Metcalf',
  'Tyler Lockett',
  'Kenneth Walker',
  'Devon Witherspoon',
];

export const FOCUS_PATRIOTS_PLAYERS = [
  'Drake Maye',
  'Rhamondre Stevenson',
  'Christian Gonzalez',
  'Jabrill Peppers',
  'Kyle Dugger',
];

export const FOCUS_TEAM_ANCHORS = ['Seattle Seahawks', 'New England Patriots'];

// Long label fragment (lowercase) → short display alias
const FOCUS_ALIASES: Array<[string, string]> = [
  ['seattle seahawks', 'Seahawks'],
  ['new england patriots', 'Patriots'],
];

// ============ Helpers ============

function dedupeCaseInsensitive(items: string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const item of items) {
    const key = item.toLowerCase().trim();
    if (!key || seen.has(key)) continue;
    seen.add(key);
    out.push(item);
  }
  return out;
}

export function aliasFor(term: string): string {
  const lower = term.toLowerCase();
  for (const [fragment, alias] of FOCUS_ALIASES) {
    if (lower.includes(fragment)) return alias;
  }
  return term;
}

export function toFocusTerm(label: string): FocusTerm {
  const alias = aliasFor(label);
  return alias === label ? { label } : { label, alias };
}

// ============ Public API ============

/**
 * One headliner, one player per team, then both team anchors.
 */
export function pickFocusTerms(random: RandomSource): string[] {
  const picks = [
    pickOne(random, FOCUS_HEADLINERS),
    pickOne(random, FOCUS_SEAHAWKS_PLAYERS),
    pickOne(random, FOCUS_PATRIOTS_PLAYERS),
  ].filter((t): t is string => t !== undefined);

  return dedupeCaseInsensitive([...picks, ...FOCUS_TEAM_ANCHORS]);
}

export function biasKeywords(keywords: string[], focusTerms: readonly string[], topK: number = KEYWORD_TOP_K): string[] {
  const labels = focusTerms.map(t => toFocusTerm(t)).map(t => t.alias ?? t.label);
  const base = keywords.filter(k => k);
  return dedupeCaseInsensitive([...labels, ...base]).slice(0, Math.max(topK, 0));
}

export function mentionsFocus(post: Pick<RawPost, 'title' | 'body'>, focusTerms: readonly string[]): boolean {
  const text = `${post.title}\n${post.body}`.toLowerCase();
  return focusTerms.some(t => {
    const needle = t.toLowerCase().trim();
    return needle.length > 0 && text.includes(needle);
  });
}

/**
 * Focus hits, or the input unchanged when nothing matches.
 */
export function filterByFocus<T extends Pick<RawPost, 'title' | 'body'>>(posts: T[], focusTerms: readonly string[]): T[] {
  if (focusTerms.length === 0) return posts;
  const hits = posts.filter(p => mentionsFocus(p, focusTerms));
  return hits.length > 0 ? hits : posts;
}
