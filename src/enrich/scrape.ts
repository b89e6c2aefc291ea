import type { HttpClient } from '../http/client.js';
import { NOT_AVAILABLE, type Counter } from '../shared/format.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

const SCRAPED_KEYS = [
  'play_count',
  'danmaku_count',
  'like_count',
  'coin_count',
  'favorite_count',
  'share_count',
] as const;

type ScrapedKey = (typeof SCRAPED_KEYS)[number];
export type ScrapedStats = Record<ScrapedKey, Counter>;

export type ExtractResult = { matched: true; stats: ScrapedStats } | { matched: false };
export type StatsExtractor = (html: string) => ExtractResult;

const NUM = '(\\d+(?:,\\d+)*)';

/** Digit group with thousands separators removed. */
export function parseCount(group: string | undefined): Counter {
  if (group === undefined) return NOT_AVAILABLE;
  const digits = group.replace(/,/g, '');
  return /^\d+$/.test(digits) ? Number(digits) : NOT_AVAILABLE;
}

function patternExtractor(pattern: RegExp): StatsExtractor {
  return (html) => {
    const m = pattern.exec(html);
    if (!m) return { matched: false };
    return {
      matched: true,
      stats: {
        play_count: parseCount(m[1]),
        danmaku_count: parseCount(m[2]),
        like_count: parseCount(m[3]),
        coin_count: parseCount(m[4]),
        favorite_count: parseCount(m[5]),
        share_count: parseCount(m[6]),
      },
    };
  };
}

/**
 * Tried in order against the detail page; the first match wins. The page
 * carries the counters in its description meta text, e.g.
 * `视频播放量 1234、弹幕量 56、点赞数 78、投硬币枚数 9、收藏人数 10、转发人数 11`.
 */
export const DEFAULT_EXTRACTORS: readonly StatsExtractor[] = [
  patternExtractor(
    new RegExp(
      `视频播放量 ${NUM}、弹幕量 ${NUM}、点赞数 ${NUM}、投硬币枚数 ${NUM}、收藏人数 ${NUM}、转发人数 ${NUM}`,
    ),
  ),
  patternExtractor(
    new RegExp(
      `播放量 ${NUM}.*弹幕量 ${NUM}.*点赞数 ${NUM}.*投硬币枚数 ${NUM}.*收藏人数 ${NUM}.*转发人数 ${NUM}`,
    ),
  ),
];

export function unavailableStats(): ScrapedStats {
  return {
    play_count: NOT_AVAILABLE,
    danmaku_count: NOT_AVAILABLE,
    like_count: NOT_AVAILABLE,
    coin_count: NOT_AVAILABLE,
    favorite_count: NOT_AVAILABLE,
    share_count: NOT_AVAILABLE,
  };
}

export function extractStats(
  html: string,
  extractors: readonly StatsExtractor[] = DEFAULT_EXTRACTORS,
): ExtractResult {
  for (const extract of extractors) {
    const result = extract(html);
    if (result.matched) return result;
  }
  return { matched: false };
}

/**
 * Fetch the video page and pull the six counters out of its text.
 * Never throws; every failure yields all counters as N/A.
 */
export async function scrapeVideoStats(
  client: HttpClient,
  bvid: string,
  videoPageUrl: string,
  extractors: readonly StatsExtractor[] = DEFAULT_EXTRACTORS,
): Promise<ScrapedStats> {
  const url = `${videoPageUrl}${encodeURIComponent(bvid)}`;
  try {
    const html = await client.getText(url, 'detail');
    const result = extractStats(html, extractors);
    if (result.matched) return result.stats;
    logger.debug({ bvid }, 'No stats pattern matched on video page');
  } catch (err) {
    logger.warn({ bvid, error: errorMessage(err) }, 'Video page fetch failed');
  }
  return unavailableStats();
}
