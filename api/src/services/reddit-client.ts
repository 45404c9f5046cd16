/**
 * Reddit API Client
 *
 * Read-only client for public subreddit listings (no credentials).
 * Supplies the raw post batch for the meme pipeline.
 */

import { getConfig } from '../config.js';
import type { RawPost } from '../../../shared/types.js';
import {
  asArray,
  asNumber,
  asRecord,
  asString,
  getPath,
  safeJsonParse,
  unescapeHtml,
} from '../utils/json.js';
import type { JsonRecord } from '../utils/json.js';

const REDDIT_BASE = 'https://www.reddit.com';
const MIN_TEXT_LENGTH = 6;
const MAX_TEXT_LENGTH = 2000;
const MAX_PREVIEW_IMAGES = 4;

// ============ Errors ============

/**
 * A hard upstream failure: there is nothing to render.
 */
export class UpstreamError extends Error {
  constructor(
    readonly upstream: string,
    readonly reason: 'timeout' | 'request_error' | 'bad_status' | 'bad_payload',
    readonly status?: number,
    cause?: unknown,
  ) {
    super(`${upstream} ${reason}${status !== undefined ? ` (${status})` : ''}`, { cause });
    this.name = 'UpstreamError';
  }
}

// ============ Types ============

export interface PostQuery {
  subreddit: string;
  query: string;
  limit: number;
}

export type PostSource = (query: PostQuery, signal?: AbortSignal) => Promise<RawPost[]>;

// ============ Helpers ============

function makeHeaders(): Record<string, string> {
  return {
    'Accept': 'application/json',
    'User-Agent': getConfig().redditUserAgent,
  };
}

/**
 * Settles with `work`, or rejects as soon as `signal` aborts. A body stream
 * that stalls after the headers would otherwise never settle.
 */
function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new Error('aborted'));
    if (signal.aborted) onAbort();
    else signal.addEventListener('abort', onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

export function buildListingUrl({ subreddit, query, limit }: PostQuery): string {
  const sub = encodeURIComponent(subreddit);
  if (query.trim()) {
    const params = new URLSearchParams({
      q: query,
      sort: 'new',
      restrict_sr: '1',
      limit: String(limit),
    });
    return `${REDDIT_BASE}/r/${sub}/search.json?${params.toString()}`;
  }
  return `${REDDIT_BASE}/r/${sub}/new.json?limit=${limit}`;
}

function looksLikeImage(url: string): boolean {
  const lower = url.toLowerCase();
  return ['.jpg', '.jpeg', '.png', '.webp'].some(ext => lower.endsWith(ext))
    || lower.includes('i.redd.it/')
    || lower.includes('preview.redd.it/');
}

/**
 * Best-effort image URLs from a listing child: gallery items, the first
 * crosspost, preview sources, then the direct link.
 */
export function extractImageUrls(data: JsonRecord): string[] {
  const urls: string[] = [];
  const add = (value: unknown) => {
    const raw = asString(value);
    if (!raw) return;
    const url = unescapeHtml(raw);
    if (!urls.includes(url)) urls.push(url);
  };

  // Galleries
  const metadata = asRecord(data.media_metadata);
  if (data.is_gallery === true && metadata) {
    for (const item of Object.values(metadata)) {
      add(getPath(item, 's', 'u'));
    }
  }

  // Crossposts can carry media the parent lacks
  const crosspost = asRecord(asArray(data.crosspost_parent_list)[0]);
  if (crosspost) {
    for (const url of extractImageUrls(crosspost)) add(url);
  }

  // Preview sources
  for (const image of asArray(getPath(data, 'preview', 'images')).slice(0, MAX_PREVIEW_IMAGES)) {
    add(getPath(image, 'source', 'url'));
  }

  // Direct link
  const direct = asString(data.url_overridden_by_dest) ?? asString(data.url);
  if (direct && looksLikeImage(unescapeHtml(direct))) {
    add(direct);
  }

  return urls.filter(looksLikeImage);
}

export function parseListing(payload: unknown): RawPost[] {
  const children = asArray(getPath(payload, 'data', 'children'));
  const posts: RawPost[] = [];

  for (const child of children) {
    const data = asRecord(getPath(child, 'data'));
    if (!data) continue;

    const title = asString(data.title) ?? '';
    const selftext = asString(data.selftext) ?? '';
    const text = `${title}\n${selftext}`.trim();
    if (text.length < MIN_TEXT_LENGTH) continue;

    const id = asString(data.name) ?? asString(data.id);
    if (!id) continue;

    const permalink = asString(data.permalink);
    // Title and body together stay within MAX_TEXT_LENGTH
    const cappedTitle = title.slice(0, MAX_TEXT_LENGTH);
    posts.push({
      id,
      title: cappedTitle,
      body: selftext.slice(0, Math.max(0, MAX_TEXT_LENGTH - cappedTitle.length - 1)),
      createdAt: asNumber(data.created_utc),
      url: permalink ? `${REDDIT_BASE}${permalink}` : asString(data.url),
      imageUrls: extractImageUrls(data),
    });
  }

  return posts;
}

// ============ Public API ============

/**
 * Newest posts matching a query (or the plain "new" listing when the query
 * is blank). Throws UpstreamError on timeout, network error or a non-200.
 */
export async function fetchRedditPosts(query: PostQuery, signal?: AbortSignal): Promise<RawPost[]> {
  const config = getConfig();
  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, config.postFetchTimeoutMs);
  const onAbort = () => controller.abort();
  if (signal?.aborted) controller.abort();
  signal?.addEventListener('abort', onAbort, { once: true });

  // The timer and the caller's signal stay armed until the body is read
  let text: string;
  try {
    const response = await fetch(buildListingUrl(query), {
      headers: makeHeaders(),
      redirect: 'follow',
      signal: controller.signal,
    });
    if (response.status !== 200) {
      throw new UpstreamError('reddit', 'bad_status', response.status);
    }
    text = await untilAborted(response.text(), controller.signal);
  } catch (err) {
    if (err instanceof UpstreamError) throw err;
    throw new UpstreamError('reddit', timedOut ? 'timeout' : 'request_error', undefined, err);
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener('abort', onAbort);
  }

  const payload = safeJsonParse(text);
  if (!asRecord(payload)) {
    throw new UpstreamError('reddit', 'bad_payload');
  }
  return parseListing(payload);
}
