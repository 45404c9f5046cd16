/**
 * Buzz Summary
 *
 * Read-only views over a classified post batch: the vibe digest behind
 * /buzz and the mention-ranked people behind /celebs.
 */

import type { EventTag, MoodLabel, MoodState, Post, RawPost } from '../../../shared/types.js';
import { MOOD_THRESHOLD } from '../../../shared/constants.js';
import { classifyMood, meanPolarity, moodLabel, postText, topEvent } from './vibe-classifier.js';
import { extractNameCandidates } from './wiki-client.js';
import type { PersonInfo } from './wiki-client.js';

const MAX_LISTED_POSTS = 20;
const MAX_SEED_LINES = 5;
const MAX_EVIDENCE = 3;
const MAX_CANDIDATES = 30;

export interface BuzzSummary {
  query: string;
  subreddit: string;
  count: number;
  avgPolarity: number;
  mood: MoodState;
  moodLabel: MoodLabel;
  topEvent: EventTag | null;
  posts: Post[];
  memeSeed: {
    vibe: MoodLabel;
    event: EventTag | null;
    topLines: string[];
  };
}

export function summarizeBuzz(
  posts: Post[],
  source: { query: string; subreddit: string },
  moodThreshold: number = MOOD_THRESHOLD,
): BuzzSummary {
  const avgPolarity = meanPolarity(posts);
  const mood = classifyMood(avgPolarity, moodThreshold);
  const label = moodLabel(mood);
  const event = topEvent(posts);

  return {
    query: source.query,
    subreddit: source.subreddit,
    count: posts.length,
    avgPolarity,
    mood,
    moodLabel: label,
    topEvent: event,
    posts: posts.slice(0, MAX_LISTED_POSTS),
    memeSeed: {
      vibe: label,
      event,
      topLines: posts.slice(0, MAX_SEED_LINES).map(postText),
    },
  };
}

// ============ Celebs ============

export interface Evidence {
  id: string;
  title: string;
  url: string | null;
}

export interface NameMention {
  name: string;
  mentions: number;
  evidence: Evidence[];
}

export interface Celeb extends PersonInfo {
  mentions: number;
  evidence: Evidence[];
}

/**
 * Candidate names by mention count, ties in first-seen order. Titles are
 * scanned; untitled posts fall back to their body.
 */
export function countNameMentions(posts: RawPost[]): NameMention[] {
  const byName = new Map<string, NameMention>();

  for (const post of posts) {
    for (const name of extractNameCandidates(post.title || postText(post))) {
      let entry = byName.get(name);
      if (!entry) {
        entry = { name, mentions: 0, evidence: [] };
        byName.set(name, entry);
      }
      entry.mentions++;
      if (entry.evidence.length < MAX_EVIDENCE) {
        entry.evidence.push({ id: post.id, title: post.title, url: post.url });
      }
    }
  }

  // Array.prototype.sort is stable, so ties keep insertion order
  return [...byName.values()].sort((a, b) => b.mentions - a.mentions);
}

/**
 * Resolves the most-mentioned candidates in order until `topN` verified
 * people are found.
 */
export async function rankCelebs(
  posts: RawPost[],
  lookup: (name: string) => Promise<PersonInfo | null>,
  topN: number,
): Promise<Celeb[]> {
  const results: Celeb[] = [];
  for (const mention of countNameMentions(posts).slice(0, MAX_CANDIDATES)) {
    const person = await lookup(mention.name);
    if (!person) continue;
    results.push({ ...person, mentions: mention.mentions, evidence: mention.evidence });
    if (results.length >= topN) break;
  }
  return results;
}
