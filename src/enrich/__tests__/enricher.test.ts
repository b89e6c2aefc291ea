import { describe, it, expect, vi, afterEach } from 'vitest';
import { enrichItem, type EnrichOptions } from '../enricher.js';
import { HttpClient } from '../../http/client.js';
import type { RawListItem } from '../../source/schemas.js';
import type { Config } from '../../shared/config.js';

const HTTP: Config['http'] = {
  user_agent: 'test-agent/1.0',
  referer: 'https://www.example.test/',
  listing_timeout_ms: 1000,
  detail_timeout_ms: 1000,
  page_delay_ms: 0,
  item_delay_ms: 0,
};

const OPTIONS: EnrichOptions = {
  viewUrl: 'https://api.example.test/view',
  videoPageUrl: 'https://www.example.test/video/',
  timeZone: 'UTC',
  now: () => new Date('2024-05-01T12:00:00Z'),
};

const ITEM: RawListItem = {
  bvid: 'BV1ab411c7xy',
  title: 'A popular video',
  desc: 'Some description',
  pic: 'https://img.example.test/cover.jpg',
  pub_location: 'Beijing',
  short_link_v2: 'https://b23.example.test/abc',
  first_frame: 'https://img.example.test/frame.jpg',
  owner: { name: 'Uploader', mid: 42, face: 'https://img.example.test/face.jpg' },
};

const PAGE = '<meta name="description" content="视频播放量 5000、弹幕量 60、点赞数 700、投硬币枚数 80、收藏人数 90、转发人数 10">';

const VIEW = {
  code: 0,
  data: {
    stat: { view: 4000, danmaku: 50, like: 600, coin: 70, favorite: 85, share: 9, reply: 33 },
    duration: 3665,
    pubdate: 1700000000,
    cid: 1234,
    tname: 'Music',
  },
};

function route(handlers: { page?: () => Response; view?: () => Response }) {
  const mockFetch = vi.fn().mockImplementation(async (url: string) => {
    if (url.startsWith(OPTIONS.videoPageUrl)) {
      if (!handlers.page) throw new Error('page unavailable');
      return handlers.page();
    }
    if (url.startsWith(OPTIONS.viewUrl)) {
      if (!handlers.view) throw new Error('view unavailable');
      return handlers.view();
    }
    throw new Error(`unexpected url ${url}`);
  });
  globalThis.fetch = mockFetch;
  return mockFetch;
}

describe('enrichItem', () => {
  const originalFetch = globalThis.fetch;
  const client = new HttpClient({ http: HTTP });

  afterEach(() => {
    globalThis.fetch = originalFetch;
    vi.restoreAllMocks();
  });

  it('merges both sources into one record', async () => {
    route({
      page: () => new Response(PAGE, { status: 200 }),
      view: () => new Response(JSON.stringify(VIEW), { status: 200 }),
    });

    const record = await enrichItem(client, ITEM, 3, OPTIONS);

    expect(record).toEqual({
      rank: 3,
      title: 'A popular video',
      desc: 'Some description',
      bvid: 'BV1ab411c7xy',
      short_link: 'https://b23.example.test/abc',
      pic: 'https://img.example.test/cover.jpg',
      first_frame: 'https://img.example.test/frame.jpg',
      pub_location: 'Beijing',
      owner_name: 'Uploader',
      owner_mid: 42,
      owner_face: 'https://img.example.test/face.jpg',
      play_count: 5000,
      danmaku_count: 60,
      like_count: 700,
      coin_count: 80,
      favorite_count: 90,
      share_count: 10,
      reply_count: 33,
      duration: 3665,
      duration_formatted: '1:01:05',
      pubdate: 1700000000,
      publish_time: '2023-11-14 22:13:20',
      cid: 1234,
      category: 'Music',
      fetch_time: '2024-05-01 12:00:00',
    });
  });

  it('uses API counters when the page cannot be scraped', async () => {
    route({
      page: () => new Response('<html>changed markup</html>', { status: 200 }),
      view: () => new Response(JSON.stringify(VIEW), { status: 200 }),
    });

    const record = await enrichItem(client, ITEM, 1, OPTIONS);

    expect(record.play_count).toBe(4000);
    expect(record.danmaku_count).toBe(50);
    expect(record.share_count).toBe(9);
  });

  it('still produces a ranked record when both sources fail', async () => {
    route({});

    const record = await enrichItem(client, ITEM, 7, OPTIONS);

    expect(record).toMatchObject({
      rank: 7,
      bvid: 'BV1ab411c7xy',
      title: 'A popular video',
      play_count: 'N/A',
      danmaku_count: 'N/A',
      like_count: 'N/A',
      coin_count: 'N/A',
      favorite_count: 'N/A',
      share_count: 'N/A',
      reply_count: 'N/A',
      duration: 0,
      duration_formatted: 'N/A',
      pubdate: 0,
      publish_time: 'unknown',
      cid: null,
      category: 'unknown',
    });
  });

  it('queries the page and the API for the same bvid', async () => {
    const mockFetch = route({
      page: () => new Response(PAGE, { status: 200 }),
      view: () => new Response(JSON.stringify(VIEW), { status: 200 }),
    });

    await enrichItem(client, ITEM, 1, OPTIONS);

    expect(mockFetch.mock.calls.map((c) => c[0])).toEqual([
      'https://www.example.test/video/BV1ab411c7xy',
      'https://api.example.test/view?bvid=BV1ab411c7xy',
    ]);
  });
});
