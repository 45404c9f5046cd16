/**
 * Route error mapping
 *
 * Bad input → 400, upstream feed failure → 502, anything else → 500.
 * All in the usual { success: false, error } envelope.
 */

import { FastifyReply } from 'fastify';
import { UpstreamError } from '../services/reddit-client.js';
import { BadRequestError } from './query.js';

export function sendError(reply: FastifyReply, err: unknown, failure: string): FastifyReply {
  if (err instanceof BadRequestError) {
    return reply.status(400).send({ success: false, error: err.message });
  }
  if (err instanceof UpstreamError) {
    reply.log.error({ err }, 'Upstream fetch failed');
    return reply.status(502).send({ success: false, error: `Upstream unavailable: ${err.upstream}` });
  }
  reply.log.error({ err }, failure);
  return reply.status(500).send({ success: false, error: failure });
}
