import type { EnrichedRecord } from '../../enrich/record.js';

export function makeRecord(overrides: Partial<EnrichedRecord> = {}): EnrichedRecord {
  return {
    rank: 1,
    title: 'First video',
    desc: '',
    bvid: 'BV1',
    short_link: 'https://b23.example.test/1',
    pic: 'https://img.example.test/1.jpg',
    first_frame: '',
    pub_location: 'Shanghai',
    owner_name: 'Alice',
    owner_mid: 42,
    owner_face: 'https://img.example.test/alice.jpg',
    play_count: 1000,
    danmaku_count: 20,
    like_count: 300,
    coin_count: 40,
    favorite_count: 50,
    share_count: 6,
    reply_count: 7,
    duration: 65,
    duration_formatted: '1:05',
    pubdate: 1700000000,
    publish_time: '2023-11-15 06:13:20',
    cid: 1001,
    category: 'Music',
    fetch_time: '2024-05-01 20:00:00',
    ...overrides,
  };
}
