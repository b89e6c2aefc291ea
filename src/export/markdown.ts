import type { EnrichedRecord } from '../enrich/record.js';
import { NOT_AVAILABLE, UNKNOWN, formatNumber, isCount } from '../shared/format.js';

export interface PlayCountSummary {
  total: number | typeof NOT_AVAILABLE;
  average: number | typeof NOT_AVAILABLE;
  max: number | typeof NOT_AVAILABLE;
  min: number | typeof NOT_AVAILABLE;
  counted: number;
}

export interface CategoryShare {
  category: string;
  count: number;
  percentage: number;
}

export interface ReportOptions {
  /** Already formatted generation time. */
  generatedAt: string;
  videoPageUrl: string;
  spaceUrl: string;
}

/**
 * Totals over records whose play count is a known integer; records with an
 * N/A play count are left out of all four figures.
 */
export function summarizePlayCounts(records: readonly EnrichedRecord[]): PlayCountSummary {
  const plays = records.map((r) => r.play_count).filter(isCount);
  if (plays.length === 0) {
    return { total: NOT_AVAILABLE, average: NOT_AVAILABLE, max: NOT_AVAILABLE, min: NOT_AVAILABLE, counted: 0 };
  }

  const total = plays.reduce((sum, n) => sum + n, 0);
  return {
    total,
    average: Math.floor(total / plays.length),
    max: Math.max(...plays),
    min: Math.min(...plays),
    counted: plays.length,
  };
}

/** Sorted by descending count; equal counts keep first-seen order. */
export function categoryDistribution(records: readonly EnrichedRecord[]): CategoryShare[] {
  const counts = new Map<string, number>();
  for (const r of records) {
    const category = r.category || UNKNOWN;
    counts.set(category, (counts.get(category) ?? 0) + 1);
  }

  return [...counts.entries()]
    .map(([category, count]) => ({
      category,
      count,
      percentage: (count / records.length) * 100,
    }))
    .sort((a, b) => b.count - a.count);
}

function orUnknown(value: string): string {
  return value ? value : UNKNOWN;
}

function renderRecord(r: EnrichedRecord, options: ReportOptions): string[] {
  const lines = [
    `### ${r.rank}. ${r.title}`,
    '',
    `**Uploader**: [${r.owner_name}](${options.spaceUrl}${r.owner_mid})`,
    '',
    '**Stats**:',
    `- Plays: ${formatNumber(r.play_count)} | Danmaku: ${formatNumber(r.danmaku_count)} | Likes: ${formatNumber(r.like_count)}`,
    `- Coins: ${formatNumber(r.coin_count)} | Favorites: ${formatNumber(r.favorite_count)} | Shares: ${formatNumber(r.share_count)}`,
    `- Replies: ${formatNumber(r.reply_count)}`,
    '',
    '**Info**:',
    `- Published: ${orUnknown(r.publish_time)}`,
    `- Duration: ${orUnknown(r.duration_formatted)}`,
    `- Location: ${orUnknown(r.pub_location)}`,
    `- Category: ${orUnknown(r.category)}`,
    '',
    `**Link**: [Watch](${options.videoPageUrl}${r.bvid})`,
    '',
    `**Cover**: ![${[...r.title].slice(0, 20).join('')}](${r.pic})`,
    '',
  ];

  if (r.desc) {
    lines.push(`**Description**: ${r.desc}`, '');
  }

  lines.push('---', '');
  return lines;
}

export function renderMarkdownReport(records: readonly EnrichedRecord[], options: ReportOptions): string {
  const summary = summarizePlayCounts(records);
  const lines = [
    '# Bilibili Popular Videos Report',
    '',
    '## Report Info',
    `- **Generated at**: ${options.generatedAt}`,
    `- **Videos analysed**: ${records.length}`,
    '',
    '## Play Count Summary',
    `- **Total plays**: ${formatNumber(summary.total)}`,
    `- **Average plays**: ${formatNumber(summary.average)}`,
    `- **Max plays**: ${formatNumber(summary.max)}`,
    `- **Min plays**: ${formatNumber(summary.min)}`,
    '',
    '## Category Distribution',
  ];

  for (const share of categoryDistribution(records)) {
    lines.push(`- **${share.category}**: ${share.count} videos (${share.percentage.toFixed(1)}%)`);
  }
  lines.push('', '## Video Details', '');

  for (const record of records) {
    lines.push(...renderRecord(record, options));
  }

  return lines.join('\n');
}
