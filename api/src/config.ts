/**
 * Buzz Meme API Configuration
 *
 * Loads configuration from environment variables
 */

import 'dotenv/config';
import {
  MOOD_THRESHOLD,
  ALIGNMENT_THRESHOLD,
  KEYWORD_TOP_K,
  IMAGE_FETCH_TIMEOUT_MS,
  POST_FETCH_TIMEOUT_MS,
  IMAGE_CACHE_TTL_SECONDS,
  WIKI_CACHE_TTL_SECONDS,
  USER_AGENT,
} from '../../shared/constants.js';

export interface Config {
  // Server
  port: number;
  host: string;
  nodeEnv: string;

  // Upstream sources
  redditUserAgent: string;
  postFetchTimeoutMs: number;
  imageFetchTimeoutMs: number;
  imageCacheTtlSeconds: number;
  wikiCacheTtlSeconds: number;

  // Limits
  memeRateLimit: number;

  // Vibe pipeline
  moodThreshold: number;
  alignmentThreshold: number;
  keywordTopK: number;

  // Rendering
  fontPath: string;
}

function optionalEnv(name: string, defaultValue: string): string {
  return process.env[name] || defaultValue;
}

function optionalEnvInt(name: string, defaultValue: number): number {
  const value = process.env[name];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new Error(`Invalid integer for ${name}: ${value}`);
  }
  return parsed;
}

function optionalEnvFloat(name: string, defaultValue: number): number {
  const value = process.env[name];
  if (!value) return defaultValue;
  const parsed = parseFloat(value);
  if (isNaN(parsed)) {
    throw new Error(`Invalid number for ${name}: ${value}`);
  }
  return parsed;
}

/**
 * Load configuration from environment
 */
export function loadConfig(): Config {
  return {
    // Server
    port: optionalEnvInt('PORT', 3000),
    host: optionalEnv('HOST', '0.0.0.0'),
    nodeEnv: optionalEnv('NODE_ENV', 'development'),

    // Upstream sources
    redditUserAgent: optionalEnv('REDDIT_USER_AGENT', USER_AGENT),
    postFetchTimeoutMs: optionalEnvInt('POST_FETCH_TIMEOUT_MS', POST_FETCH_TIMEOUT_MS),
    imageFetchTimeoutMs: optionalEnvInt('IMAGE_FETCH_TIMEOUT_MS', IMAGE_FETCH_TIMEOUT_MS),
    imageCacheTtlSeconds: optionalEnvInt('IMAGE_CACHE_TTL_SECONDS', IMAGE_CACHE_TTL_SECONDS), // 10 minutes
    wikiCacheTtlSeconds: optionalEnvInt('WIKI_CACHE_TTL_SECONDS', WIKI_CACHE_TTL_SECONDS),    // 5 minutes

    // Limits
    memeRateLimit: optionalEnvInt('MEME_RATE_LIMIT', 30),

    // Vibe pipeline
    moodThreshold: optionalEnvFloat('MOOD_THRESHOLD', MOOD_THRESHOLD),
    alignmentThreshold: optionalEnvFloat('ALIGNMENT_THRESHOLD', ALIGNMENT_THRESHOLD),
    keywordTopK: optionalEnvInt('KEYWORD_TOP_K', KEYWORD_TOP_K),

    // Rendering
    fontPath: optionalEnv('MEME_FONT_PATH', ''),
  };
}

/**
 * Validate configuration
 */
export function validateConfig(config: Config): string[] {
  const errors: string[] = [];

  if (config.moodThreshold <= 0 || config.moodThreshold >= 1) {
    errors.push('MOOD_THRESHOLD must be between 0 and 1 (exclusive)');
  }
  if (config.alignmentThreshold < 0 || config.alignmentThreshold >= 1) {
    errors.push('ALIGNMENT_THRESHOLD must be in [0, 1)');
  }
  if (config.keywordTopK < 1) {
    errors.push('KEYWORD_TOP_K must be at least 1');
  }
  if (config.imageFetchTimeoutMs < 100) {
    errors.push('IMAGE_FETCH_TIMEOUT_MS must be at least 100');
  }
  if (config.nodeEnv === 'production' && config.redditUserAgent === USER_AGENT) {
    console.warn('  WARNING: REDDIT_USER_AGENT not set — Reddit may rate-limit the default agent');
  }

  return errors;
}

// Export singleton config
let config: Config | null = null;

export function getConfig(): Config {
  if (!config) {
    config = loadConfig();
  }
  return config;
}
