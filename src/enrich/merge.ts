import { NOT_AVAILABLE, UNKNOWN, isCount, type Counter } from '../shared/format.js';
import type { ScrapedStats } from './scrape.js';
import type { DetailStats } from './detail.js';
import type { MergedStats } from './record.js';

function preferScraped(scraped: Counter, structured: number | undefined): Counter {
  if (isCount(scraped)) return scraped;
  if (structured !== undefined && Number.isInteger(structured) && structured >= 0) return structured;
  return NOT_AVAILABLE;
}

/**
 * Field-by-field merge of the two secondary sources.
 *
 * - play/danmaku/like/coin/favorite/share: page value, else view API value, else N/A
 * - reply: view API only, else N/A
 * - duration, pubdate: view API only, else 0
 * - cid: view API only, else null
 * - category: view API only, else "unknown"
 */
export function mergeStats(scraped: ScrapedStats, detail: DetailStats): MergedStats {
  return {
    play_count: preferScraped(scraped.play_count, detail.view),
    danmaku_count: preferScraped(scraped.danmaku_count, detail.danmaku),
    like_count: preferScraped(scraped.like_count, detail.like),
    coin_count: preferScraped(scraped.coin_count, detail.coin),
    favorite_count: preferScraped(scraped.favorite_count, detail.favorite),
    share_count: preferScraped(scraped.share_count, detail.share),
    reply_count: preferScraped(NOT_AVAILABLE, detail.reply),
    duration: detail.duration ?? 0,
    pubdate: detail.pubdate ?? 0,
    cid: detail.cid ?? null,
    category: detail.category || UNKNOWN,
  };
}
