/**
 * Listing, then per-item enrichment in listing order, then the chosen
 * exports. Format choice and progress output come from the caller's hooks.
 */

import type { Config } from '../shared/config.js';
import type { HttpClient } from '../http/client.js';
import type { EnrichedRecord } from '../enrich/record.js';
import { fetchListing, type ListingParams, type PageOutcome } from '../source/listing.js';
import { enrichItem, type EnrichOptions } from '../enrich/enricher.js';
import { writeExports, type ExportFormat, type ExportOutcome } from '../export/sinks.js';
import { logger } from '../shared/logger.js';

export interface PipelineHooks {
  onListed?(count: number, pages: PageOutcome[]): void;
  onEnriching?(index: number, total: number, title: string): void;
  onRecord?(record: EnrichedRecord, total: number): void;
  /** Called when the listing produced nothing; the run ends here. */
  onEmpty?(pages: PageOutcome[]): void;
  /** Pick the exports once all records are built. */
  chooseFormats(records: readonly EnrichedRecord[]): Promise<ExportFormat[]>;
}

export interface PipelineOptions {
  /** Explicit export file names, keyed by format. */
  filenames?: Partial<Record<ExportFormat, string>>;
  outputDir?: string;
  enrich?: Partial<Pick<EnrichOptions, 'extractors' | 'now'>>;
}

export interface PipelineResult {
  records: EnrichedRecord[];
  pages: PageOutcome[];
  exports: ExportOutcome[];
  durationMs: number;
}

export async function runAnalysis(
  client: HttpClient,
  config: Config,
  params: ListingParams,
  hooks: PipelineHooks,
  options: PipelineOptions = {},
): Promise<PipelineResult> {
  const startTime = Date.now();

  const { items, pages } = await fetchListing(client, params, {
    popularUrl: config.endpoints.popular_url,
  });

  if (items.length === 0) {
    hooks.onEmpty?.(pages);
    logger.warn({ pages }, 'Listing returned no videos');
    return { records: [], pages, exports: [], durationMs: Date.now() - startTime };
  }

  hooks.onListed?.(items.length, pages);

  const enrichOptions: EnrichOptions = {
    viewUrl: config.endpoints.view_url,
    videoPageUrl: config.endpoints.video_page_url,
    timeZone: config.output.time_zone,
    ...options.enrich,
  };

  const records: EnrichedRecord[] = [];
  for (const [i, item] of items.entries()) {
    hooks.onEnriching?.(i + 1, items.length, item.title);
    const record = await enrichItem(client, item, i + 1, enrichOptions);
    records.push(record);
    hooks.onRecord?.(record, items.length);
  }

  const formats = await hooks.chooseFormats(records);
  const exports =
    formats.length > 0
      ? writeExports(records, formats, {
          dir: options.outputDir ?? config.output.dir,
          timeZone: config.output.time_zone,
          videoPageUrl: config.endpoints.video_page_url,
          spaceUrl: config.endpoints.space_url,
          filenames: options.filenames,
        })
      : [];

  const durationMs = Date.now() - startTime;
  logger.info(
    { records: records.length, exports: exports.filter((e) => e.ok).length, durationMs },
    'Analysis complete',
  );

  return { records, pages, exports, durationMs };
}
