import type { Config } from '../shared/config.js';
import { HttpError, errorMessage } from '../shared/errors.js';
import { sleep } from '../shared/utils.js';
import { logger } from '../shared/logger.js';

export type RequestKind = 'listing' | 'detail';
export type PauseKind = 'page' | 'item';

export interface HttpClientOptions {
  http: Config['http'];
  /** Session cookie sent with every request when present. */
  cookie?: string;
}

/**
 * Outbound HTTP for one run. Holds the fixed request headers, the per-kind
 * timeouts and the fixed delays; constructed once and passed to every stage.
 */
export class HttpClient {
  private readonly headers: Readonly<Record<string, string>>;
  private readonly timeouts: Readonly<Record<RequestKind, number>>;
  private readonly delays: Readonly<Record<PauseKind, number>>;

  constructor(options: HttpClientOptions) {
    const headers: Record<string, string> = {
      'User-Agent': options.http.user_agent,
      Referer: options.http.referer,
    };
    if (options.cookie) {
      headers['Cookie'] = options.cookie;
    }
    this.headers = headers;
    this.timeouts = {
      listing: options.http.listing_timeout_ms,
      detail: options.http.detail_timeout_ms,
    };
    this.delays = {
      page: options.http.page_delay_ms,
      item: options.http.item_delay_ms,
    };
  }

  hasCookie(): boolean {
    return 'Cookie' in this.headers;
  }

  async getText(url: string, kind: RequestKind): Promise<string> {
    return this.get(url, kind, 'text/html,application/xhtml+xml,*/*');
  }

  async getJson(url: string, kind: RequestKind): Promise<unknown> {
    const text = await this.get(url, kind, 'application/json, text/plain, */*');
    try {
      const data: unknown = JSON.parse(text);
      return data;
    } catch {
      throw new HttpError(`Response is not valid JSON: ${url}`, { url });
    }
  }

  /** Wait the fixed delay configured for the given boundary. */
  async pause(kind: PauseKind): Promise<void> {
    await sleep(this.delays[kind]);
  }

  /** GET and read the body; the timeout covers both. */
  private async get(url: string, kind: RequestKind, accept: string): Promise<string> {
    const timeoutMs = this.timeouts[kind];
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetch(url, {
        headers: { ...this.headers, Accept: accept },
        signal: controller.signal,
        redirect: 'follow',
      });

      if (!response.ok) {
        throw new HttpError(`Request failed: ${response.status} from ${url}`, {
          url,
          status: response.status,
        });
      }

      const body = await readBody(response, controller.signal);
      logger.debug({ url, status: response.status }, 'HTTP GET');
      return body;
    } catch (err) {
      if (err instanceof HttpError) throw err;
      if (err instanceof Error && err.name === 'AbortError') {
        throw new HttpError(`Request timed out after ${timeoutMs}ms: ${url}`, {
          url,
          timeout: timeoutMs,
        });
      }
      throw new HttpError(`Request failed: ${errorMessage(err)}`, { url });
    } finally {
      clearTimeout(timer);
    }
  }
}

function abortError(): Error {
  return Object.assign(new Error('The operation was aborted'), { name: 'AbortError' });
}

// Rejects on abort even when the body stream ignores the signal.
function readBody(response: Response, signal: AbortSignal): Promise<string> {
  if (signal.aborted) return Promise.reject(abortError());
  return new Promise<string>((resolve, reject) => {
    const onAbort = (): void => reject(abortError());
    signal.addEventListener('abort', onAbort, { once: true });
    void response
      .text()
      .then(resolve, reject)
      .finally(() => signal.removeEventListener('abort', onAbort));
  });
}
