import type { EnrichedRecord } from '../enrich/record.js';
import { formatNumber } from '../shared/format.js';

export function describeRecord(r: EnrichedRecord): string[] {
  return [
    `[#${r.rank}] ${r.title}`,
    `   Uploader: ${r.owner_name} | Category: ${r.category}`,
    `   Plays: ${formatNumber(r.play_count)} | Danmaku: ${formatNumber(r.danmaku_count)} | Likes: ${formatNumber(r.like_count)}`,
    `   Coins: ${formatNumber(r.coin_count)} | Favorites: ${formatNumber(r.favorite_count)} | Shares: ${formatNumber(r.share_count)}`,
    `   BV: ${r.bvid}`,
    `   Duration: ${r.duration_formatted} | Published: ${r.publish_time}`,
    '-'.repeat(60),
  ];
}
