import type { Counter } from '../shared/format.js';

/**
 * One listed video with its merged statistics. Built once per listed item and
 * not modified afterwards.
 */
export interface EnrichedRecord {
  rank: number;
  title: string;
  desc: string;
  bvid: string;
  short_link: string;
  pic: string;
  first_frame: string;
  pub_location: string;
  owner_name: string;
  owner_mid: number;
  owner_face: string;
  play_count: Counter;
  danmaku_count: Counter;
  like_count: Counter;
  coin_count: Counter;
  favorite_count: Counter;
  share_count: Counter;
  reply_count: Counter;
  /** Seconds; 0 when unknown. */
  duration: number;
  duration_formatted: string;
  /** Epoch seconds; 0 when unknown. */
  pubdate: number;
  publish_time: string;
  cid: number | null;
  category: string;
  fetch_time: string;
}

export type MergedStats = Pick<
  EnrichedRecord,
  | 'play_count'
  | 'danmaku_count'
  | 'like_count'
  | 'coin_count'
  | 'favorite_count'
  | 'share_count'
  | 'reply_count'
  | 'duration'
  | 'pubdate'
  | 'cid'
  | 'category'
>;
