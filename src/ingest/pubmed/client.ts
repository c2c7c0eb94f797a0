import fetch, { FetchError } from 'node-fetch';
import type { AppConfig } from '../../config';
import { RequestError, isTransientStatus } from '../../errors';
import { children, path, parser, textOf, validateXml } from '../../parse/xml';
import { LaneLimiter, type Lane } from '../../utils/limiter';
import { silentLogger, type Logger } from '../../utils/logger';
import { withRetry } from '../../utils/retry';

export type HttpResponse = {
  ok: boolean;
  status: number;
  statusText?: string;
  text(): Promise<string>;
};

export type HttpFetch = (
  url: string,
  init?: { timeout?: number; headers?: Record<string, string> }
) => Promise<HttpResponse>;

export type PubMedClientOptions = Pick<
  AppConfig,
  'eutilsBaseUrl' | 'apiKey' | 'email' | 'tool' | 'database' | 'timeoutMs' | 'retries' | 'fetchConcurrency'
> & {
  fetchImpl?: HttpFetch;
  logger?: Logger;
  retryBaseMs?: number;
  retryJitterMs?: number;
};

/** Splits ids into consecutive batches of at most `size`. */
export function batchIds(ids: readonly string[], size: number): string[][] {
  if (size < 1) throw new RangeError(`Batch size must be positive, got ${size}`);
  const batches: string[][] = [];
  for (let i = 0; i < ids.length; i += size) {
    batches.push(ids.slice(i, i + size));
  }
  return batches;
}

function redactUrl(url: string): string {
  return url.replace(/api_key=[^&]+/, 'api_key=***');
}

export class PubMedClient {
  private fetchImpl: HttpFetch;
  private limiter: LaneLimiter;
  private logger: Logger;

  constructor(private options: PubMedClientOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.limiter = new LaneLimiter({ esearch: 1, efetch: options.fetchConcurrency });
    this.logger = options.logger ?? silentLogger;
  }

  get fetchConcurrency(): number {
    return this.limiter.size('efetch');
  }

  private buildUrl(endpoint: string, params: Record<string, string>): string {
    const query = new URLSearchParams({ db: this.options.database, ...params, retmode: 'xml' });
    if (this.options.tool) query.set('tool', this.options.tool);
    if (this.options.email) query.set('email', this.options.email);
    if (this.options.apiKey) query.set('api_key', this.options.apiKey);
    return `${this.options.eutilsBaseUrl}/${endpoint}?${query.toString()}`;
  }

  private async request(lane: Lane, url: string): Promise<string> {
    const redacted = redactUrl(url);
    const attempt = async (): Promise<string> => {
      let res: HttpResponse;
      try {
        res = await this.fetchImpl(url, { timeout: this.options.timeoutMs });
      } catch (e) {
        const timedOut = e instanceof FetchError && e.type === 'request-timeout';
        const reason = e instanceof Error ? e.message : String(e);
        throw new RequestError(
          timedOut
            ? `PubMed request timed out after ${this.options.timeoutMs}ms: ${redacted}`
            : `PubMed request failed: ${reason}`,
          redacted,
          undefined,
          true,
          e
        );
      }
      if (!res.ok) {
        const body = await res.text().catch(() => '');
        throw new RequestError(
          `PubMed request failed: ${res.status} ${body.slice(0, 200)}`.trim(),
          redacted,
          res.status,
          isTransientStatus(res.status)
        );
      }
      return res.text();
    };

    return this.limiter.limit(lane, () =>
      withRetry(attempt, {
        tries: this.options.retries,
        baseMs: this.options.retryBaseMs,
        jitterMs: this.options.retryJitterMs,
        onRetry: (err, n, delayMs) =>
          this.logger.warn(`Retrying ${lane} (attempt ${n + 1}) in ${delayMs}ms`, {
            reason: err.message,
          }),
      })
    );
  }

  async search(query: string, maxResults: number): Promise<string[]> {
    if (maxResults <= 0) return [];

    const url = this.buildUrl('esearch.fcgi', { term: query, retmax: String(maxResults) });
    this.logger.debug('esearch', { query, maxResults });
    const xml = await this.request('esearch', url);

    const invalid = validateXml(xml);
    if (invalid) {
      throw new RequestError(`PubMed search returned malformed XML: ${invalid}`, redactUrl(url));
    }
    const doc: unknown = parser.parse(xml);
    const result = path(doc, 'eSearchResult');
    const error = textOf(path(result, 'ERROR'));
    if (error) {
      throw new RequestError(`PubMed search error: ${error}`, redactUrl(url));
    }

    const ids = children(path(result, 'IdList'), 'Id').map(textOf).filter(Boolean);
    return ids.slice(0, maxResults);
  }

  async fetch(ids: readonly string[]): Promise<string> {
    if (ids.length === 0) return '';
    const url = this.buildUrl('efetch.fcgi', { id: ids.join(',') });
    this.logger.debug('efetch', { count: ids.length });
    return this.request('efetch', url);
  }
}
