import { z } from 'zod';
import type { HttpClient } from '../http/client.js';
import { PopularEnvelopeSchema, RawListItemSchema, type RawListItem } from './schemas.js';
import { ListingError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export const ListingParamsSchema = z.object({
  pageSize: z.number().int().min(1).max(100),
  startPage: z.number().int().min(1),
  maxPages: z.number().int().min(1),
});

export type ListingParams = z.infer<typeof ListingParamsSchema>;

export interface ListingOptions {
  popularUrl: string;
}

export type PageOutcome =
  | { status: 'ok'; page: number; count: number }
  | { status: 'empty'; page: number }
  | { status: 'upstream_error'; page: number; code: number; message: string }
  | { status: 'failed'; page: number; error: string };

export interface ListingResult {
  items: RawListItem[];
  pages: PageOutcome[];
}

function buildPageUrl(baseUrl: string, pageSize: number, page: number): string {
  const url = new URL(baseUrl);
  url.searchParams.set('ps', String(pageSize));
  url.searchParams.set('pn', String(page));
  return url.toString();
}

/**
 * Walk the popular-list pages starting at `startPage`. Stops at the first
 * empty page, non-success code or failed request, keeping what was already
 * collected. Items keep page order, so an item's index is its rank.
 */
export async function fetchListing(
  client: HttpClient,
  params: ListingParams,
  options: ListingOptions,
): Promise<ListingResult> {
  const checked = ListingParamsSchema.safeParse(params);
  if (!checked.success) {
    throw new ListingError('Invalid listing parameters', {
      errors: checked.error.flatten().fieldErrors,
    });
  }
  const { pageSize, startPage, maxPages } = checked.data;

  const items: RawListItem[] = [];
  const pages: PageOutcome[] = [];

  for (let page = startPage; page < startPage + maxPages; page++) {
    const url = buildPageUrl(options.popularUrl, pageSize, page);
    logger.info({ page }, 'Fetching popular page');

    let body: unknown;
    try {
      body = await client.getJson(url, 'listing');
    } catch (err) {
      const error = errorMessage(err);
      logger.error({ page, error }, 'Popular page fetch failed');
      pages.push({ status: 'failed', page, error });
      break;
    }

    const parsed = PopularEnvelopeSchema.safeParse(body);
    if (!parsed.success) {
      const error = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      logger.error({ page, error }, 'Popular page response could not be parsed');
      pages.push({ status: 'failed', page, error });
      break;
    }

    const envelope = parsed.data;
    if (envelope.code !== 0) {
      logger.warn({ page, code: envelope.code, message: envelope.message }, 'Popular API returned an error');
      pages.push({ status: 'upstream_error', page, code: envelope.code, message: envelope.message });
      break;
    }

    const list = envelope.data?.list ?? [];
    if (list.length === 0) {
      logger.info({ page }, 'No more popular videos');
      pages.push({ status: 'empty', page });
      break;
    }

    const accepted: RawListItem[] = [];
    for (const entry of list.slice(0, pageSize)) {
      const item = RawListItemSchema.safeParse(entry);
      if (item.success) {
        accepted.push(item.data);
      } else {
        logger.debug({ page, issues: item.error.issues.length }, 'Skipping malformed list entry');
      }
    }
    items.push(...accepted);
    pages.push({ status: 'ok', page, count: accepted.length });
    logger.info({ page, count: accepted.length }, 'Popular page fetched');

    await client.pause('page');
  }

  return { items, pages };
}
