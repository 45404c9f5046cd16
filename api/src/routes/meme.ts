/**
 * Meme Routes
 *
 * Live feed → composed meme, as JSON (with a data URL) or as a raw PNG,
 * plus the text-only suggestion and the legacy promo card.
 */

import { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { AppDeps } from '../app.js';
import type { RenderedMeme, StyleConfig } from '../../../shared/types.js';
import { MEME_DEFAULTS } from '../../../shared/constants.js';
import { composeMeme, normalizeTiles } from '../services/meme-composer.js';
import { buildPromoCopy } from '../services/caption-templates.js';
import { renderPromoCard } from '../services/image-compositor.js';
import { resolveFontFamily } from '../services/text-layout.js';
import { loadBuzz } from './buzz.js';
import { sendError } from './errors.js';
import type { FeedParams } from './query.js';
import { FEED_LIMIT, flag, memeStyle, strictInt, text } from './query.js';

interface PromoQuery {
  business?: string;
  offer?: string;
  q?: string;
  subreddit?: string;
}

interface MemeQuery extends PromoQuery {
  tiles?: string;
  style?: string;
  focus?: string;
  bg_random_1_or_2?: string;
}

export interface PromoParams {
  feed: FeedParams;
  business: string;
  offer: string;
}

/**
 * Text-only parameters; rendering options are not read here.
 */
export function parsePromoQuery(query: PromoQuery): PromoParams {
  return {
    feed: {
      subreddit: text(query.subreddit, MEME_DEFAULTS.SUBREDDIT),
      query: query.q?.trim() ?? MEME_DEFAULTS.QUERY,
      limit: FEED_LIMIT.DEFAULT,
    },
    business: text(query.business, MEME_DEFAULTS.BUSINESS),
    offer: text(query.offer, MEME_DEFAULTS.OFFER),
  };
}

export function parseMemeQuery(query: MemeQuery): { feed: FeedParams; style: StyleConfig } {
  const { feed, business, offer } = parsePromoQuery(query);
  return {
    feed,
    style: {
      style: memeStyle(query.style),
      tiles: normalizeTiles(strictInt('tiles', query.tiles, MEME_DEFAULTS.TILES, 1, 4)),
      focusBias: flag('focus', query.focus, false),
      twoImageBackground: flag('bg_random_1_or_2', query.bg_random_1_or_2, true),
      topic: feed.query,
      business,
      offer,
    },
  };
}

/**
 * Aborts once the client goes away before the response is written.
 */
function clientSignal(reply: FastifyReply): AbortSignal {
  const controller = new AbortController();
  reply.raw.on('close', () => {
    if (!reply.raw.writableEnded) controller.abort();
  });
  return controller.signal;
}

export async function memeRoutes(fastify: FastifyInstance, deps: AppDeps): Promise<void> {
  const { config } = deps;

  async function render(request: FastifyRequest<{ Querystring: MemeQuery }>, reply: FastifyReply): Promise<RenderedMeme> {
    const { feed, style } = parseMemeQuery(request.query);
    const signal = clientSignal(reply);
    const posts = await deps.postSource(feed, signal);

    const meme = await composeMeme(posts, style, {
      fetchImage: deps.fetchImage,
      random: deps.random,
      scorer: deps.scorer,
      log: request.log,
      signal,
      fetchTimeoutMs: config.imageFetchTimeoutMs,
      moodThreshold: config.moodThreshold,
      alignmentThreshold: config.alignmentThreshold,
      topK: config.keywordTopK,
      fontPath: config.fontPath,
    });

    request.log.info({
      style: meme.metadata.style,
      mood: meme.metadata.moodLabel,
      imagesUsed: meme.metadata.imagesUsed,
    }, 'Meme rendered');
    return meme;
  }

  /**
   * GET /meme?business=&offer=&q=&subreddit=&tiles=4&style=grid&focus=false&bg_random_1_or_2=true
   */
  fastify.get<{
    Querystring: MemeQuery;
  }>('/meme', async (request, reply) => {
    try {
      const meme = await render(request, reply);
      return reply.send({
        success: true,
        data: {
          caption: meme.caption,
          imageDataUrl: `data:image/png;base64,${meme.png.toString('base64')}`,
          width: meme.width,
          height: meme.height,
          metadata: meme.metadata,
        },
      });
    } catch (err) {
      return sendError(reply, err, 'Meme render failed');
    }
  });

  /**
   * GET /meme.png (same parameters as /meme)
   */
  fastify.get<{
    Querystring: MemeQuery;
  }>('/meme.png', async (request, reply) => {
    try {
      const meme = await render(request, reply);
      reply.header('Cache-Control', 'no-store');
      return reply.type('image/png').send(meme.png);
    } catch (err) {
      return sendError(reply, err, 'Meme render failed');
    }
  });

  /**
   * GET /meme_suggestion?business=&offer=&q=
   *
   * Caption and an image prompt only, for external generators.
   */
  fastify.get<{
    Querystring: PromoQuery;
  }>('/meme_suggestion', async (request, reply) => {
    try {
      const { feed, business, offer } = parsePromoQuery(request.query);
      const buzz = await loadBuzz(deps, feed);
      const event = buzz.topEvent;
      const vibe = buzz.moodLabel;

      return reply.send({
        success: true,
        data: {
          buzz: {
            avgPolarity: buzz.avgPolarity,
            topEvent: event,
            count: buzz.count,
            query: buzz.query,
          },
          caption: `${event ?? 'Super Bowl'} vibes: ${vibe}. ${offer} at ${business} tonight.`,
          imagePrompt:
            `Create a bold, funny Super Bowl reaction meme for a ${business}. ` +
            `Tone: ${vibe}. Event: ${event ?? 'game moment'}. ` +
            `Include big readable text: '${offer} TONIGHT'.`,
        },
      });
    } catch (err) {
      return sendError(reply, err, 'Suggestion failed');
    }
  });

  /**
   * GET /meme_card.png?business=&offer=&q=&subreddit=
   *
   * Legacy promo card: gradient background, copy and CTA banner.
   */
  fastify.get<{
    Querystring: PromoQuery;
  }>('/meme_card.png', async (request, reply) => {
    try {
      const { feed, business, offer } = parsePromoQuery(request.query);
      const buzz = await loadBuzz(deps, feed);
      const copy = buildPromoCopy({
        mood: buzz.moodLabel,
        event: buzz.topEvent,
        business,
        offer,
      });
      const footer = `Live signal: r/${feed.subreddit} • query='${feed.query}' • sentiment=${buzz.avgPolarity.toFixed(2)}`;
      const png = renderPromoCard({ ...copy, footer }, resolveFontFamily(config.fontPath));

      reply.header('Cache-Control', 'no-store');
      return reply.type('image/png').send(png);
    } catch (err) {
      return sendError(reply, err, 'Promo card render failed');
    }
  });
}
