import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { runAnalysis, type PipelineHooks } from '../pipeline.js';
import { HttpClient } from '../../http/client.js';
import { ConfigSchema, type Config } from '../../shared/config.js';

function makeConfig(outDir: string): Config {
  return ConfigSchema.parse({
    http: { page_delay_ms: 0, item_delay_ms: 0, listing_timeout_ms: 1000, detail_timeout_ms: 1000 },
    endpoints: {
      popular_url: 'https://api.example.test/popular',
      view_url: 'https://api.example.test/view',
      video_page_url: 'https://www.example.test/video/',
      space_url: 'https://space.example.test/',
    },
    output: { dir: outDir, time_zone: 'UTC' },
  });
}

function listEntry(bvid: string) {
  return { bvid, title: `Video ${bvid}`, owner: { name: `Owner ${bvid}`, mid: 1, face: '' } };
}

interface Upstream {
  pages: string[][];
  failingView?: Set<string>;
}

function mockUpstream(upstream: Upstream) {
  const mockFetch = vi.fn().mockImplementation(async (url: string) => {
    const parsed = new URL(url);
    if (parsed.pathname === '/popular') {
      const pn = Number(parsed.searchParams.get('pn'));
      const list = (upstream.pages[pn - 1] ?? []).map(listEntry);
      return new Response(JSON.stringify({ code: 0, message: '0', data: { list } }), { status: 200 });
    }
    if (parsed.pathname === '/view') {
      const bvid = parsed.searchParams.get('bvid') ?? '';
      if (upstream.failingView?.has(bvid)) throw new Error('ECONNRESET');
      return new Response(
        JSON.stringify({ code: 0, data: { stat: { view: 100, reply: 1 }, duration: 65, pubdate: 0, tname: 'Music' } }),
        { status: 200 },
      );
    }
    if (parsed.pathname.startsWith('/video/')) {
      return new Response('<html></html>', { status: 200 });
    }
    throw new Error(`unexpected url ${url}`);
  });
  globalThis.fetch = mockFetch;
  return mockFetch;
}

describe('runAnalysis', () => {
  const originalFetch = globalThis.fetch;
  let tmpDir: string;
  let config: Config;
  let client: HttpClient;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'bilirank-pipeline-'));
    config = makeConfig(tmpDir);
    client = new HttpClient({ http: config.http });
  });

  afterEach(() => {
    globalThis.fetch = originalFetch;
    vi.restoreAllMocks();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('ranks records 1..N in listing order across pages', async () => {
    mockUpstream({ pages: [['BV1', 'BV2'], ['BV3']] });
    const hooks: PipelineHooks = { chooseFormats: async () => [] };

    const result = await runAnalysis(client, config, { pageSize: 2, startPage: 1, maxPages: 3 }, hooks);

    expect(result.records.map((r) => [r.rank, r.bvid])).toEqual([
      [1, 'BV1'],
      [2, 'BV2'],
      [3, 'BV3'],
    ]);
    expect(result.exports).toEqual([]);
  });

  it('keeps a record whose enrichment failed', async () => {
    mockUpstream({ pages: [['BV1', 'BV2', 'BV3']], failingView: new Set(['BV2']) });

    const result = await runAnalysis(
      client,
      config,
      { pageSize: 3, startPage: 1, maxPages: 1 },
      { chooseFormats: async () => [] },
    );

    expect(result.records).toHaveLength(3);
    expect(result.records[1]).toMatchObject({ rank: 2, bvid: 'BV2', play_count: 'N/A', category: 'unknown' });
    expect(result.records[0]).toMatchObject({ play_count: 100, reply_count: 1, duration_formatted: '1:05' });
  });

  it('reports progress for every item', async () => {
    mockUpstream({ pages: [['BV1', 'BV2']] });
    const onListed = vi.fn();
    const onEnriching = vi.fn();
    const onRecord = vi.fn();

    await runAnalysis(
      client,
      config,
      { pageSize: 2, startPage: 1, maxPages: 1 },
      { onListed, onEnriching, onRecord, chooseFormats: async () => [] },
    );

    expect(onListed).toHaveBeenCalledWith(2, [{ status: 'ok', page: 1, count: 2 }]);
    expect(onEnriching.mock.calls).toEqual([
      [1, 2, 'Video BV1'],
      [2, 2, 'Video BV2'],
    ]);
    expect(onRecord).toHaveBeenCalledTimes(2);
  });

  it('writes the formats chosen after enrichment', async () => {
    mockUpstream({ pages: [['BV1']] });
    const chooseFormats = vi.fn().mockResolvedValue(['json', 'csv']);

    const result = await runAnalysis(
      client,
      config,
      { pageSize: 1, startPage: 1, maxPages: 1 },
      { chooseFormats },
      { filenames: { json: 'out.json', csv: 'out.csv' } },
    );

    expect(chooseFormats).toHaveBeenCalledTimes(1);
    expect(chooseFormats.mock.calls[0][0]).toHaveLength(1);
    expect(result.exports).toEqual([
      { format: 'json', ok: true, path: path.join(tmpDir, 'out.json') },
      { format: 'csv', ok: true, path: path.join(tmpDir, 'out.csv') },
    ]);
    expect(JSON.parse(fs.readFileSync(path.join(tmpDir, 'out.json'), 'utf-8'))).toEqual(result.records);
  });

  it('stops early when the listing is empty', async () => {
    const mockFetch = mockUpstream({ pages: [] });
    const onEmpty = vi.fn();
    const chooseFormats = vi.fn().mockResolvedValue(['json']);

    const result = await runAnalysis(
      client,
      config,
      { pageSize: 10, startPage: 1, maxPages: 2 },
      { onEmpty, chooseFormats },
    );

    expect(result.records).toEqual([]);
    expect(onEmpty).toHaveBeenCalledWith([{ status: 'empty', page: 1 }]);
    expect(chooseFormats).not.toHaveBeenCalled();
    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(fs.readdirSync(tmpDir)).toEqual([]);
  });
});
