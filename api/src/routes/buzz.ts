/**
 * Buzz Routes
 *
 * Live feed digests: vibe and event summary, resolved people, and the
 * combined trend view. Public endpoints, no authentication required.
 */

import { FastifyInstance } from 'fastify';
import type { AppDeps } from '../app.js';
import { classifyPosts } from '../services/vibe-classifier.js';
import { rankCelebs, summarizeBuzz } from '../services/buzz-summary.js';
import type { BuzzSummary } from '../services/buzz-summary.js';
import { sendError } from './errors.js';
import type { FeedParams, FeedQuery } from './query.js';
import { clampedInt, feedParams } from './query.js';

export async function loadBuzz(deps: AppDeps, params: FeedParams, signal?: AbortSignal): Promise<BuzzSummary> {
  const raw = await deps.postSource(params, signal);
  return summarizeBuzz(classifyPosts(raw, deps.scorer), params, deps.config.moodThreshold);
}

export async function buzzRoutes(fastify: FastifyInstance, deps: AppDeps): Promise<void> {

  /**
   * GET /buzz?subreddit=nfl&q=super+bowl&limit=25
   */
  fastify.get<{
    Querystring: FeedQuery;
  }>('/buzz', async (request, reply) => {
    try {
      const buzz = await loadBuzz(deps, feedParams(request.query));
      return reply.send({ success: true, data: buzz });
    } catch (err) {
      return sendError(reply, err, 'Buzz failed');
    }
  });

  /**
   * GET /celebs?subreddit=nfl&q=super+bowl&limit=25&top_n=5
   */
  fastify.get<{
    Querystring: FeedQuery & { top_n?: string };
  }>('/celebs', async (request, reply) => {
    const params = feedParams(request.query);
    const topN = clampedInt(request.query.top_n, 5, 1, 10);

    try {
      const raw = await deps.postSource(params);
      const celebs = await rankCelebs(raw, deps.lookupPerson, topN);
      return reply.send({
        success: true,
        data: {
          query: params.query,
          subreddit: params.subreddit,
          count: celebs.length,
          celebs,
        },
      });
    } catch (err) {
      return sendError(reply, err, 'Celeb lookup failed');
    }
  });

  /**
   * GET /trend?subreddit=nfl&q=super+bowl
   *
   * Buzz plus the single most-mentioned verified person.
   */
  fastify.get<{
    Querystring: Omit<FeedQuery, 'limit'>;
  }>('/trend', async (request, reply) => {
    const params = feedParams({ ...request.query, limit: undefined });

    try {
      const raw = await deps.postSource(params);
      const buzz = summarizeBuzz(classifyPosts(raw, deps.scorer), params, deps.config.moodThreshold);
      const [topCeleb] = await rankCelebs(raw, deps.lookupPerson, 1);
      return reply.send({ success: true, data: { buzz, topCeleb: topCeleb ?? null } });
    } catch (err) {
      return sendError(reply, err, 'Trend failed');
    }
  });
}
