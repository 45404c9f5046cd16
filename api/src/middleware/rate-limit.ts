/**
 * Rate Limiting Configuration
 *
 * Rendering routes get a tighter per-IP budget than the JSON routes
 */

import { FastifyInstance } from 'fastify';

export const RENDER_ROUTES = ['/meme', '/meme.png', '/meme_card.png'];

/**
 * Apply the render budget to the meme routes. Call before registering
 * @fastify/rate-limit so this hook fills in the route config first.
 */
export function configureRateLimits(fastify: FastifyInstance, renderMax: number): void {
  // Renders: renderMax per minute per IP (MEME_RATE_LIMIT, default 30)
  fastify.addHook('onRoute', (routeOptions) => {
    if (RENDER_ROUTES.includes(routeOptions.url) && routeOptions.method === 'GET') {
      routeOptions.config = {
        ...routeOptions.config,
        rateLimit: {
          max: renderMax,
          timeWindow: '1 minute',
        },
      };
    }
  });
}
