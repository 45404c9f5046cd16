/**
 * Wikipedia / Wikidata Client
 *
 * Turns capitalised name candidates from post titles into verified people:
 * Wikipedia search, a token-overlap sanity check, the page summary, then a
 * Wikidata "instance of human" check. Results (including misses) are cached.
 */

import { getConfig } from '../config.js';
import { TtlCache } from '../utils/ttl-cache.js';
import { WIKI_CACHE_MAX_ENTRIES } from '../../../shared/constants.js';
import { asArray, asRecord, asString, getPath, safeJsonParse } from '../utils/json.js';

const WIKI_API = 'https://en.wikipedia.org/w/api.php';
const WIKI_SUMMARY = 'https://en.wikipedia.org/api/rest_v1/page/summary/';
const WIKIDATA_ENTITY = 'https://www.wikidata.org/wiki/Special:EntityData/';
const WIKI_TIMEOUT_MS = 10_000;
const HUMAN_QID = 'Q5';

export interface PersonInfo {
  name: string;
  title: string;
  description: string | null;
  extract: string | null;
  thumbnail: string | null;
  wikidataQid: string | null;
  url: string | null;
}

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

// ============ Name Candidates ============

const NAME_PATTERN = /\b([A-Z][a-z]+(?:\s+[A-Z][a-z]+){1,3})\b/g;

const STOP_PHRASES = new Set([
  'Super Bowl',
  'NFL',
  'SportsCenter',
  'Washington Times',
  'New England Patriots',
  'Seattle Seahawks',
  'AFC',
  'NFC',
]);
const STOP_PREFIXES = ['Team ', 'Report ', 'Highlight ', 'Game Thread'];
const STOP_TOKENS = new Set(['NFL', 'SB', 'Super', 'Bowl']);
const GENERIC_PAIRS = new Set(['new england', 'seattle seahawks', 'new england patriots']);

/**
 * Runs of 2-4 capitalised words, minus league, team and thread noise.
 * Duplicates are kept so callers can count mentions.
 */
export function extractNameCandidates(text: string): string[] {
  const out: string[] = [];
  for (const match of text.matchAll(NAME_PATTERN)) {
    const candidate = match[1].trim();
    if (STOP_PREFIXES.some(p => candidate.startsWith(p))) continue;
    if (candidate.includes('Franchise Tag') || candidate.includes('Thread')) continue;
    if (STOP_PHRASES.has(candidate)) continue;
    if (candidate.split(/\s+/).some(tok => STOP_TOKENS.has(tok))) continue;
    if (GENERIC_PAIRS.has(candidate.toLowerCase())) continue;
    out.push(candidate);
  }
  return out;
}

// ============ Lookup ============

const HUMAN_DESCRIPTION_HINTS = [
  'actor', 'actress', 'singer', 'rapper', 'musician', 'comedian',
  'american football', 'quarterback', 'athlete', 'player',
];

function nameTokens(text: string): Set<string> {
  return new Set((text.match(/[A-Za-z]+/g) ?? []).map(t => t.toLowerCase()));
}

export function sharesToken(name: string, title: string): boolean {
  const titleTokens = nameTokens(title);
  for (const token of nameTokens(name)) {
    if (titleTokens.has(token)) return true;
  }
  return false;
}

export function isHumanEntity(entityPayload: unknown, qid: string): boolean {
  const claims = asArray(getPath(entityPayload, 'entities', qid, 'claims', 'P31'));
  return claims.some(stmt => getPath(stmt, 'mainsnak', 'datavalue', 'value', 'id') === HUMAN_QID);
}

export function descriptionLooksHuman(description: string | null): boolean {
  const desc = (description ?? '').toLowerCase();
  return HUMAN_DESCRIPTION_HINTS.some(hint => desc.includes(hint));
}

let cache: TtlCache<PersonInfo | null> | null = null;

function getCache(): TtlCache<PersonInfo | null> {
  if (!cache) {
    cache = new TtlCache<PersonInfo | null>(
      getConfig().wikiCacheTtlSeconds * 1000,
      Date.now,
      WIKI_CACHE_MAX_ENTRIES,
    );
  }
  return cache;
}

export function clearWikiCache(): void {
  cache?.clear();
}

async function getJson(fetchImpl: FetchLike, url: string): Promise<unknown> {
  const response = await fetchImpl(url, {
    headers: { 'User-Agent': getConfig().redditUserAgent, 'Accept': 'application/json' },
    signal: AbortSignal.timeout(WIKI_TIMEOUT_MS),
  });
  if (response.status !== 200) return null;
  return safeJsonParse(await response.text());
}

async function resolvePerson(name: string, fetchImpl: FetchLike): Promise<PersonInfo | null> {
  // 1) Search
  const params = new URLSearchParams({
    action: 'query',
    list: 'search',
    srsearch: name,
    srlimit: '1',
    format: 'json',
  });
  const search = await getJson(fetchImpl, `${WIKI_API}?${params.toString()}`);
  const title = asString(getPath(asArray(getPath(search, 'query', 'search'))[0], 'title'));
  if (!title || !sharesToken(name, title)) return null;

  // 2) Summary
  const summary = asRecord(await getJson(fetchImpl, `${WIKI_SUMMARY}${encodeURIComponent(title)}`));
  if (!summary) return null;
  const qid = asString(summary.wikibase_item);
  const description = asString(summary.description);

  // 3) Human check, description hints when Wikidata can't confirm
  let human = false;
  if (qid) {
    const entity = await getJson(fetchImpl, `${WIKIDATA_ENTITY}${encodeURIComponent(qid)}.json`);
    human = isHumanEntity(entity, qid);
  }
  if (!human) human = descriptionLooksHuman(description);
  if (!human) return null;

  return {
    name,
    title,
    description,
    extract: asString(summary.extract),
    thumbnail: asString(getPath(summary, 'thumbnail', 'source')),
    wikidataQid: qid,
    url: asString(getPath(summary, 'content_urls', 'desktop', 'page')),
  };
}

/**
 * Verified person for a name, or null. Network failures count as a miss
 * and are not cached.
 */
export async function lookupPerson(name: string, fetchImpl: FetchLike = fetch): Promise<PersonInfo | null> {
  const cached = getCache().get(name);
  if (cached !== undefined) return cached;

  let person: PersonInfo | null;
  try {
    person = await resolvePerson(name, fetchImpl);
  } catch (err) {
    console.warn(`Wikipedia lookup failed for "${name}":`, err instanceof Error ? err.message : err);
    return null;
  }

  getCache().set(name, person);
  return person;
}
