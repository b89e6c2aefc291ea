import type { EnrichedRecord } from '../enrich/record.js';

export const CSV_COLUMNS = [
  'rank',
  'title',
  'owner_name',
  'play_count',
  'danmaku_count',
  'like_count',
  'coin_count',
  'favorite_count',
  'share_count',
  'reply_count',
  'duration_formatted',
  'publish_time',
  'bvid',
  'pub_location',
  'category',
] as const satisfies ReadonlyArray<keyof EnrichedRecord>;

export type CsvColumn = (typeof CSV_COLUMNS)[number];
export type CsvRow = Record<CsvColumn, string>;

const NEEDS_QUOTING = /[",\r\n]/;

export function escapeCsvField(value: string): string {
  return NEEDS_QUOTING.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function toCsvRow(record: EnrichedRecord): CsvRow {
  return {
    rank: String(record.rank),
    title: record.title,
    owner_name: record.owner_name,
    play_count: String(record.play_count),
    danmaku_count: String(record.danmaku_count),
    like_count: String(record.like_count),
    coin_count: String(record.coin_count),
    favorite_count: String(record.favorite_count),
    share_count: String(record.share_count),
    reply_count: String(record.reply_count),
    duration_formatted: record.duration_formatted,
    publish_time: record.publish_time,
    bvid: record.bvid,
    pub_location: record.pub_location,
    category: record.category,
  };
}

/**
 * Header plus one line per record, CRLF-terminated, quoted per RFC 4180.
 */
export function renderCsv(records: readonly EnrichedRecord[]): string {
  const lines = [CSV_COLUMNS.join(',')];
  for (const record of records) {
    const row = toCsvRow(record);
    lines.push(CSV_COLUMNS.map((c) => escapeCsvField(row[c])).join(','));
  }
  return `${lines.join('\r\n')}\r\n`;
}

/**
 * Read RFC 4180 text back into rows of fields. A leading BOM is ignored.
 */
export function parseCsv(text: string): string[][] {
  const input = text.startsWith('\uFEFF') ? text.slice(1) : text;
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;

  for (let i = 0; i < input.length; i++) {
    const ch = input[i];

    if (inQuotes) {
      if (ch === '"') {
        if (input[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += ch;
      }
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
    } else if (ch === ',') {
      row.push(field);
      field = '';
    } else if (ch === '\r' || ch === '\n') {
      if (ch === '\r' && input[i + 1] === '\n') i++;
      row.push(field);
      rows.push(row);
      row = [];
      field = '';
    } else {
      field += ch;
    }
  }

  if (field !== '' || row.length > 0) {
    row.push(field);
    rows.push(row);
  }

  return rows;
}
