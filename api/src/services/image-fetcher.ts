/**
 * Background Image Fetcher
 *
 * Downloads image bytes for meme backgrounds through a short-lived cache so
 * repeated renders of the same feed stay fast. Never throws: any failure is
 * "no image". Bodies over MAX_IMAGE_BYTES are dropped mid-stream.
 */

import { getConfig } from '../config.js';
import { TtlCache } from '../utils/ttl-cache.js';
import { IMAGE_CACHE_MAX_ENTRIES, MAX_IMAGE_BYTES } from '../../../shared/constants.js';
import type { ImageFetcher } from './meme-composer.js';

let cache: TtlCache<Buffer> | null = null;

function getCache(): TtlCache<Buffer> {
  if (!cache) {
    cache = new TtlCache<Buffer>(getConfig().imageCacheTtlSeconds * 1000, Date.now, IMAGE_CACHE_MAX_ENTRIES);
  }
  return cache;
}

export function clearImageCache(): void {
  cache?.clear();
}

/**
 * Body bytes, or null once more than `maxBytes` have been announced or read.
 */
export async function readCappedBody(response: Response, maxBytes: number): Promise<Buffer | null> {
  const declared = Number(response.headers.get('content-length'));
  if (declared > maxBytes) {
    await response.body?.cancel();
    return null;
  }
  if (!response.body) return null;

  const reader = response.body.getReader();
  const chunks: Uint8Array[] = [];
  let total = 0;
  for (;;) {
    const { done, value } = await reader.read();
    if (done) break;
    total += value.byteLength;
    if (total > maxBytes) {
      await reader.cancel();
      return null;
    }
    chunks.push(value);
  }
  return Buffer.concat(chunks, total);
}

export const fetchImageBytes: ImageFetcher = async (url, signal) => {
  const cached = getCache().get(url);
  if (cached) return cached;

  try {
    const response = await fetch(url, {
      headers: { 'User-Agent': getConfig().redditUserAgent },
      redirect: 'follow',
      signal,
    });
    if (response.status !== 200) return null;

    const bytes = await readCappedBody(response, MAX_IMAGE_BYTES);
    if (!bytes || bytes.length === 0) return null;
    getCache().set(url, bytes);
    return bytes;
  } catch {
    // Timeouts and network errors both mean "no image for this slot"
    return null;
  }
};
