import type { HttpClient } from '../http/client.js';
import type { RawListItem } from '../source/schemas.js';
import type { EnrichedRecord } from './record.js';
import { scrapeVideoStats, type StatsExtractor, DEFAULT_EXTRACTORS } from './scrape.js';
import { fetchVideoDetail } from './detail.js';
import { mergeStats } from './merge.js';
import { formatDateTime, formatDuration, formatTimestamp } from '../shared/format.js';

export interface EnrichOptions {
  viewUrl: string;
  videoPageUrl: string;
  timeZone: string;
  extractors?: readonly StatsExtractor[];
  now?: () => Date;
}

/**
 * Build the record for one listed item. Both secondary fetches absorb their
 * own failures, so this always resolves; the worst case is a record whose
 * counters are all N/A.
 */
export async function enrichItem(
  client: HttpClient,
  item: RawListItem,
  rank: number,
  options: EnrichOptions,
): Promise<EnrichedRecord> {
  const { timeZone, now = () => new Date() } = options;

  const scraped = await scrapeVideoStats(
    client,
    item.bvid,
    options.videoPageUrl,
    options.extractors ?? DEFAULT_EXTRACTORS,
  );
  const detail = await fetchVideoDetail(client, item.bvid, options.viewUrl);
  const stats = mergeStats(scraped, detail);

  const record: EnrichedRecord = {
    rank,
    title: item.title,
    desc: item.desc,
    bvid: item.bvid,
    short_link: item.short_link_v2,
    pic: item.pic,
    first_frame: item.first_frame,
    pub_location: item.pub_location,
    owner_name: item.owner.name,
    owner_mid: item.owner.mid,
    owner_face: item.owner.face,
    play_count: stats.play_count,
    danmaku_count: stats.danmaku_count,
    like_count: stats.like_count,
    coin_count: stats.coin_count,
    favorite_count: stats.favorite_count,
    share_count: stats.share_count,
    reply_count: stats.reply_count,
    duration: stats.duration,
    duration_formatted: formatDuration(stats.duration),
    pubdate: stats.pubdate,
    publish_time: formatTimestamp(stats.pubdate, timeZone),
    cid: stats.cid,
    category: stats.category,
    fetch_time: formatDateTime(now(), timeZone),
  };

  await client.pause('item');
  return record;
}
