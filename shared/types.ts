/**
 * Buzz Meme Shared Types
 *
 * Type definitions shared between the pipeline, the routes and the tests
 */

// ============ Post Types ============

export enum MoodState {
  POSITIVE = 'POSITIVE',
  NEGATIVE = 'NEGATIVE',
  NEUTRAL = 'NEUTRAL',
}

export type MoodLabel = 'HYPE' | 'SALTY' | 'NEUTRAL';

export type EventTag = 'TOUCHDOWN' | 'FUMBLE' | 'INTERCEPTION' | 'HALFTIME' | 'COMMERCIAL';

export interface RawPost {
  id: string;
  title: string;
  body: string;
  createdAt: number | null;  // Unix seconds from the source, if given
  url: string | null;        // Permalink
  imageUrls: string[];       // Ordered, deduplicated
}

export interface Post extends RawPost {
  polarity: number;          // [-1, 1]
  event: EventTag | null;
}

// ============ Focus Types ============

export interface FocusTerm {
  label: string;
  alias?: string;            // Short display label, e.g. "Patriots"
}

// ============ Layout Types ============

export interface LayoutBox {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

// ============ Style Types ============

export type MemeStyleName = 'grid' | 'classic';
export type TileCount = 1 | 2 | 4;

export interface StyleConfig {
  style: MemeStyleName;
  tiles: TileCount;
  focusBias: boolean;
  twoImageBackground: boolean;  // classic only
  topic: string;
  business: string;
  offer: string;
  width?: number;
  height?: number;
  showCta?: boolean;            // classic only
}

// ============ Output Types ============

export interface MemeMetadata {
  mood: MoodState;
  moodLabel: MoodLabel;
  avgPolarity: number;
  keywords: string[];
  focusTerms: string[];
  event: EventTag | null;
  style: MemeStyleName;
  tilesRequested: TileCount;
  tilesUsed: number;
  imagesFound: number;        // posts carrying at least one image URL
  imagesRequested: number;
  imagesUsed: number;
  imageUrlsUsed: string[];
  headline: string | null;    // classic only
  subline: string | null;     // classic only
}

export interface RenderedMeme {
  png: Buffer;
  width: number;
  height: number;
  caption: string;
  metadata: MemeMetadata;
}

// ============ API Response Types ============

export interface ApiResponse<T> {
  success: boolean;
  data?: T;
  error?: string;
}
