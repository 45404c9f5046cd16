/**
 * Buzz Meme App
 *
 * Builds the Fastify instance with its plugins and routes. Upstream
 * collaborators are injected so tests can run the whole surface in process.
 */

import Fastify from 'fastify';
import type { FastifyInstance, FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';

import { getConfig } from './config.js';
import type { Config } from './config.js';
import { configureRateLimits } from './middleware/rate-limit.js';
import { buzzRoutes } from './routes/buzz.js';
import { memeRoutes } from './routes/meme.js';
import { fetchRedditPosts } from './services/reddit-client.js';
import type { PostSource } from './services/reddit-client.js';
import { fetchImageBytes } from './services/image-fetcher.js';
import type { ImageFetcher } from './services/meme-composer.js';
import { lookupPerson } from './services/wiki-client.js';
import type { PersonInfo } from './services/wiki-client.js';
import type { PolarityScorer } from './services/vibe-classifier.js';
import type { RandomSource } from './utils/random.js';

export interface AppDeps {
  config: Config;
  postSource: PostSource;
  fetchImage: ImageFetcher;
  lookupPerson: (name: string) => Promise<PersonInfo | null>;
  random?: RandomSource;
  scorer?: PolarityScorer;
}

export function defaultDeps(config: Config = getConfig()): AppDeps {
  return {
    config,
    postSource: fetchRedditPosts,
    fetchImage: fetchImageBytes,
    lookupPerson: name => lookupPerson(name),
  };
}

export async function buildApp(
  deps: AppDeps,
  logger: FastifyServerOptions['logger'] = false,
): Promise<FastifyInstance> {
  const fastify = Fastify({ logger });

  // Register plugins
  await fastify.register(cors, {
    origin: true, // Public read-only API
  });

  // Tighter budget for the renderers; its onRoute hook has to run before
  // the rate-limit plugin's own
  configureRateLimits(fastify, deps.config.memeRateLimit);

  await fastify.register(rateLimit, {
    max: 100,
    timeWindow: '1 minute',
  });

  // Health check
  fastify.get('/health', async () => ({
    status: 'ok',
    timestamp: new Date().toISOString(),
  }));

  // API info
  fastify.get('/', async () => ({
    name: 'Buzz Meme API',
    version: '0.1.0',
    description: 'Live social buzz turned into promo memes',
  }));

  // Register routes
  await fastify.register(buzzRoutes, deps);
  await fastify.register(memeRoutes, deps);

  return fastify;
}
