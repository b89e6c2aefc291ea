import type { HttpClient } from '../http/client.js';
import { ViewEnvelopeSchema } from '../source/schemas.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

/** Fields read from the structured view API. Every field may be missing. */
export interface DetailStats {
  view?: number;
  danmaku?: number;
  like?: number;
  coin?: number;
  favorite?: number;
  share?: number;
  reply?: number;
  duration?: number;
  pubdate?: number;
  cid?: number;
  category?: string;
}

/**
 * Query the view API for one video. Any non-zero code, transport error or
 * unparseable body yields `{}`.
 */
export async function fetchVideoDetail(
  client: HttpClient,
  bvid: string,
  viewUrl: string,
): Promise<DetailStats> {
  const url = new URL(viewUrl);
  url.searchParams.set('bvid', bvid);

  let body: unknown;
  try {
    body = await client.getJson(url.toString(), 'detail');
  } catch (err) {
    logger.warn({ bvid, error: errorMessage(err) }, 'View API fetch failed');
    return {};
  }

  const parsed = ViewEnvelopeSchema.safeParse(body);
  if (!parsed.success || parsed.data.code !== 0 || !parsed.data.data) {
    logger.debug(
      { bvid, code: parsed.success ? parsed.data.code : undefined },
      'View API returned no usable data',
    );
    return {};
  }

  const data = parsed.data.data;
  return {
    ...data.stat,
    duration: data.duration,
    pubdate: data.pubdate,
    cid: data.cid,
    category: data.tname || data.category_name || undefined,
  };
}
