/**
 * Caption Templates
 *
 * Top/bottom meme copy picked at random from a shared catalog plus the
 * catalog for the current mood. The only source of randomness in caption
 * text; callers pass the random source in.
 */

import type { EventTag, MoodLabel } from '../../../shared/types.js';
import { randomIndex } from '../utils/random.js';
import type { RandomSource } from '../utils/random.js';

export interface CaptionInput {
  mood: MoodLabel;
  keywords: string[];
  topic: string;
  business: string;
  offer: string;
  event?: EventTag | null;
}

export interface Caption {
  headline: string;
  subline: string;
}

interface Slots {
  mood: string;
  k1: string;
  k2: string;
  k3: string;
  ev: string;
  q: string;
}

type Template = (s: Slots) => [string, string];

// Embellishment odds
export const OFFER_TAG_CHANCE = 0.25;
export const BUSINESS_TAG_CHANCE = 0.1;

// ============ Catalogs ============

const SHARED_TEMPLATES: Template[] = [
  s => ['LIVE REACTION CHECK', `${s.mood}: ${s.k1} • ${s.k2} • ${s.k3}`],
  s => ['EVERYONE RN', `${s.k1} JUST HIT • ${s.mood} MODE ACTIVATED`],
  s => ['POV:', `YOU HEAR '${s.k1}' AND SUDDENLY IT'S ${s.mood}`],
  s => ['THE GROUP CHAT:', `${s.k1} ${s.k2} ${s.k3} (VOLUME: MAX)`],
  s => ['THIS IS FINE', `(${s.mood}) ${s.k1} ${s.k2} ${s.k3}`],
];

const MOOD_TEMPLATES: Record<MoodLabel, Template[]> = {
  HYPE: [
    s => ['WE ARE SO BACK', `${s.ev || s.q} GOT ME LIKE ${s.k1}`],
    s => ['ENERGY LEVEL:', `${s.k1} • ${s.k2} • ${s.k3}`],
    s => ["I'M UP", `AND IT'S BECAUSE OF ${s.k1}`],
    s => ['SAY IT WITH ME', `${s.k1} = ${s.mood}`],
  ],
  SALTY: [
    s => ['WHO WROTE THIS SCRIPT', `${s.k1} AGAIN?? I'M ${s.mood}`],
    s => ['I CAN\'T BELIEVE', `${s.ev || s.q} DID THAT • ${s.k1}`],
    s => ['ME TRYING TO BE CHILL', `BUT ${s.k1} HAS OTHER PLANS`],
    s => ['THE VIBES ARE OFF', `${s.k1} • ${s.k2} • ${s.mood}`],
  ],
  NEUTRAL: [
    s => ['CURRENT STATUS:', `${s.k1} • ${s.k2} • ${s.k3}`],
    s => ['OBSERVING', `${s.q} LIKE: ${s.k1}`],
    s => ['NO THOUGHTS', `JUST ${s.k1}`],
    s => ['REAL-TIME MOODBOARD', `${s.k1} • ${s.k2} • ${s.k3}`],
  ],
};

export function templateCount(mood: MoodLabel): number {
  return SHARED_TEMPLATES.length + MOOD_TEMPLATES[mood].length;
}

function buildSlots(input: CaptionInput): Slots {
  const kws = input.keywords.filter(k => k);
  return {
    mood: input.mood,
    k1: (kws[0] ?? input.topic).toUpperCase(),
    k2: (kws[1] ?? 'VIBES').toUpperCase(),
    k3: (kws[2] ?? 'CHAOS').toUpperCase(),
    ev: (input.event ?? '').trim().toUpperCase(),
    q: (input.topic.trim() || 'THE GAME').toUpperCase(),
  };
}

/**
 * Draws from the source in a fixed order: template, offer tag, business tag.
 */
export function selectCaption(input: CaptionInput, random: RandomSource): Caption {
  const pool = [...SHARED_TEMPLATES, ...MOOD_TEMPLATES[input.mood]];
  const template = pool[randomIndex(random, pool.length)];
  let [headline, subline] = template(buildSlots(input));

  if (random() < OFFER_TAG_CHANCE) {
    subline = `${subline} • ${input.offer.toUpperCase()}`;
  }
  if (random() < BUSINESS_TAG_CHANCE) {
    headline = `${headline} @ ${input.business}`.toUpperCase();
  }

  return { headline, subline };
}

// ============ Promo Card ============

export interface PromoCopyInput {
  mood: MoodLabel;
  event: EventTag | null;
  business: string;
  offer: string;
  celeb?: string | null;
}

const PROMO_PUNCHLINES: Record<MoodLabel, string> = {
  HYPE: 'HYPE MODE ON.',
  SALTY: 'SALTY CHAT. NEED A RESET.',
  NEUTRAL: 'LIVE REACTIONS INCOMING.',
};

/**
 * Deterministic food/bev copy for the promo card.
 */
export function buildPromoCopy(input: PromoCopyInput): { headline: string; punchline: string; cta: string } {
  const event = input.event ?? 'SUPER BOWL';
  const feat = input.celeb ? ` Feat: ${input.celeb}.` : '';
  return {
    headline: `${event} REACTION`,
    punchline: `${PROMO_PUNCHLINES[input.mood]}${feat} ${input.business}: fuel up now.`,
    cta: input.offer,
  };
}
