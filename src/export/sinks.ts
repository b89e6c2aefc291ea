import fs from 'node:fs';
import path from 'node:path';
import type { EnrichedRecord } from '../enrich/record.js';
import { renderJson } from './json.js';
import { renderCsv } from './csv.js';
import { renderMarkdownReport } from './markdown.js';
import { formatDateTime, formatFileStamp } from '../shared/format.js';
import { ExportError, errorMessage } from '../shared/errors.js';
import { resolvePath } from '../shared/utils.js';
import { logger } from '../shared/logger.js';

export const EXPORT_FORMATS = ['json', 'csv', 'markdown'] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some((f) => f === value);
}

export interface ExportOptions {
  dir: string;
  timeZone: string;
  videoPageUrl: string;
  spaceUrl: string;
  /** Explicit file names per format; generated from the timestamp otherwise. */
  filenames?: Partial<Record<ExportFormat, string>>;
  now?: Date;
}

export type ExportOutcome =
  | { format: ExportFormat; ok: true; path: string }
  | { format: ExportFormat; ok: false; error: string };

const BOM = '\uFEFF';

export function defaultFilename(format: ExportFormat, stamp: string): string {
  switch (format) {
    case 'json':
      return `bilibili_hot_videos_${stamp}.json`;
    case 'csv':
      return `bilibili_hot_videos_${stamp}.csv`;
    case 'markdown':
      return `bilibili_hot_videos_report_${stamp}.md`;
  }
}

function render(format: ExportFormat, records: readonly EnrichedRecord[], options: ExportOptions, now: Date): string {
  switch (format) {
    case 'json':
      return renderJson(records);
    case 'csv':
      // BOM so spreadsheet tools pick UTF-8
      return BOM + renderCsv(records);
    case 'markdown':
      return renderMarkdownReport(records, {
        generatedAt: formatDateTime(now, options.timeZone),
        videoPageUrl: options.videoPageUrl,
        spaceUrl: options.spaceUrl,
      });
  }
}

export function writeExport(
  format: ExportFormat,
  records: readonly EnrichedRecord[],
  options: ExportOptions,
): string {
  const now = options.now ?? new Date();
  const filename = options.filenames?.[format] ?? defaultFilename(format, formatFileStamp(now, options.timeZone));
  const filePath = path.join(resolvePath(options.dir), filename);

  try {
    const content = render(format, records, options, now);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content, 'utf-8');
  } catch (err) {
    throw new ExportError(`Failed to write ${format} export: ${errorMessage(err)}`, {
      format,
      path: filePath,
    });
  }

  logger.info({ format, path: filePath, records: records.length }, 'Export written');
  return filePath;
}

/**
 * Write each requested format independently. A failing sink is logged and
 * reported in the outcome list; the remaining formats are still written.
 */
export function writeExports(
  records: readonly EnrichedRecord[],
  formats: readonly ExportFormat[],
  options: ExportOptions,
): ExportOutcome[] {
  const now = options.now ?? new Date();
  const outcomes: ExportOutcome[] = [];

  for (const format of new Set(formats)) {
    try {
      const filePath = writeExport(format, records, { ...options, now });
      outcomes.push({ format, ok: true, path: filePath });
    } catch (err) {
      const error = errorMessage(err);
      logger.error({ format, error }, 'Export failed');
      outcomes.push({ format, ok: false, error });
    }
  }

  return outcomes;
}
