import pRetry from 'p-retry';
import { z } from 'zod';
import type { SaasApiSpec, SaasObject } from '../../config/types';
import type { ConnectorHandle, SourceConnector } from '../source';
import { ExtractionHandle } from '../../engine/cursor';
import { ConnectionError, ExtractionError, RateLimitExceeded, SyncError, errorMessage } from '../../engine/errors';
import { log } from '../../engine/logger';
import type { Batch, ExtractedRecord } from '../../engine/types';

const MAX_RETRY_AFTER_MS = 60_000;
const MAX_BACKOFF_MS = 30_000;
const REQUEST_TIMEOUT_MS = 30_000;

const PageSchema = z.object({
  results: z.array(z.record(z.unknown())),
  paging: z
    .object({
      next: z.object({ after: z.union([z.string(), z.number()]).transform(String) }).optional(),
    })
    .optional(),
});

type Page = z.infer<typeof PageSchema>;

export type SaasApiOptions = {
  /** Custom fetch implementation (for testing) */
  fetchFn?: typeof fetch;
};

/** A 429 from the API; retried, then surfaced as RateLimitExceeded. */
class RateLimited extends Error {
  constructor(
    readonly url: string,
    readonly retryAfterMs: number
  ) {
    super(`429 Too Many Requests for ${url}`);
    this.name = 'RateLimited';
  }
}

/** No response within REQUEST_TIMEOUT_MS; retried like a 5xx. */
class RequestTimeout extends Error {
  constructor(readonly url: string) {
    super(`no response within ${REQUEST_TIMEOUT_MS}ms from ${url}`);
    this.name = 'RequestTimeout';
  }
}

/** fetch rejected without a response (reset, DNS, refused); retried like a 5xx. */
class NetworkError extends Error {
  constructor(
    readonly url: string,
    detail: string,
    options?: { cause?: unknown }
  ) {
    super(`${detail} for ${url}`, options);
    this.name = 'NetworkError';
  }
}

/** A 5xx from the API; retried, then surfaced as ExtractionError. */
class ServerError extends Error {
  constructor(
    readonly status: number,
    readonly url: string
  ) {
    super(`${status} from ${url}`);
    this.name = 'ServerError';
  }
}

const retryAfterMs = (headers: Headers): number => {
  const raw = headers.get('Retry-After');
  if (!raw) return 0;
  const seconds = Number.parseInt(raw, 10);
  if (Number.isNaN(seconds) || seconds <= 0) return 0;
  return Math.min(seconds * 1000, MAX_RETRY_AFTER_MS);
};

const backoffMs = (baseMs: number, attemptNumber: number): number =>
  Math.min(baseMs * 2 ** (attemptNumber - 1), Math.max(baseMs, MAX_BACKOFF_MS));

/** Resolves after `ms`, or as soon as `signal` aborts. */
const delay = (ms: number, signal: AbortSignal): Promise<void> =>
  new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done);
  });

/** Release the connection of a response whose body is never read. */
const discard = async (res: Response): Promise<void> => {
  await res.body?.cancel();
};

/** `{ id, ...properties }` for CRM-style items, the item itself otherwise */
const toRecord = (item: Record<string, unknown>): ExtractedRecord => {
  const { properties } = item;
  if (properties !== null && typeof properties === 'object' && !Array.isArray(properties)) {
    return { id: item.id, ...properties };
  }
  return item;
};

/**
 * Open handle over a cursor-paginated REST API.
 * Each page is one batch; objects are read in configured order.
 */
class SaasApiHandle extends ExtractionHandle implements ConnectorHandle {
  private readonly abortController = new AbortController();
  private closed = false;

  constructor(
    private readonly spec: SaasApiSpec,
    private readonly fetchFn: typeof fetch
  ) {
    super(spec.name);
  }

  buildUrl(object: SaasObject, limit: number, after?: string): string {
    const url = new URL(`${this.spec.connection.baseUrl}${object.path}`);
    url.searchParams.set('limit', String(limit));
    if (after !== undefined) {
      url.searchParams.set('after', after);
    }
    if (object.properties.length > 0) {
      url.searchParams.set('properties', object.properties.join(','));
    }
    return url.toString();
  }

  /** One GET attempt, bounded by the request timeout and by `close()`. */
  private async request(url: string, apiKey: string): Promise<Response> {
    const attempt = new AbortController();
    const onClose = () => attempt.abort();
    const timer = setTimeout(() => attempt.abort(), REQUEST_TIMEOUT_MS);
    this.abortController.signal.addEventListener('abort', onClose);

    try {
      if (this.abortController.signal.aborted) {
        attempt.abort();
      }
      return await this.fetchFn(url, {
        method: 'GET',
        headers: {
          Authorization: `Bearer ${apiKey}`,
          Accept: 'application/json',
        },
        signal: attempt.signal,
      });
    } catch (err) {
      if (this.abortController.signal.aborted) {
        throw new pRetry.AbortError(this.aborted(url));
      }
      if (attempt.signal.aborted) {
        throw new RequestTimeout(url);
      }
      throw new NetworkError(url, errorMessage(err), { cause: err });
    } finally {
      clearTimeout(timer);
      this.abortController.signal.removeEventListener('abort', onClose);
    }
  }

  private aborted(url: string): ExtractionError {
    return new ExtractionError(this.sourceName, `request aborted for ${url}`);
  }

  /**
   * GET one page. Retries 429, 5xx, timeouts and network failures with exponential
   * backoff, waiting at least Retry-After; auth failures and other 4xx are not retried.
   * `close()` cuts both the request and the wait short.
   */
  async fetchPage(url: string): Promise<Page> {
    const { apiKey, maxRetries, retryBaseMs } = this.spec.connection;
    let attempts = 0;

    const response = await pRetry(
      async () => {
        attempts++;
        const res = await this.request(url, apiKey.reveal());

        if (res.status === 429) {
          await discard(res);
          throw new RateLimited(url, retryAfterMs(res.headers));
        }

        if (res.status === 401 || res.status === 403) {
          await discard(res);
          throw new pRetry.AbortError(
            new ConnectionError(this.sourceName, `authentication rejected (${res.status}) for ${url}`)
          );
        }

        if (res.status >= 500) {
          await discard(res);
          throw new ServerError(res.status, url);
        }

        if (!res.ok) {
          await discard(res);
          throw new pRetry.AbortError(
            new ExtractionError(this.sourceName, `${[res.status, res.statusText].filter(Boolean).join(' ')} for ${url}`)
          );
        }

        return res;
      },
      {
        retries: maxRetries,
        // Waits happen in onFailedAttempt, where close() can interrupt them
        minTimeout: 0,
        maxTimeout: 0,
        onFailedAttempt: async (error) => {
          if (error.retriesLeft === 0) return;

          const retryAfter = error instanceof RateLimited ? error.retryAfterMs : 0;
          const waitMs = Math.max(retryAfter, backoffMs(retryBaseMs, error.attemptNumber));
          log.debug(
            `${this.sourceName}: attempt ${error.attemptNumber} failed (${error.message}), retrying in ${waitMs}ms`
          );

          const { signal } = this.abortController;
          await delay(waitMs, signal);
          if (signal.aborted) {
            throw this.aborted(url);
          }
        },
      }
    ).catch((err: unknown) => {
      if (err instanceof RateLimited) {
        throw new RateLimitExceeded(this.sourceName, attempts, url);
      }
      if (err instanceof SyncError) {
        throw err;
      }
      throw new ExtractionError(this.sourceName, `request failed for ${url}: ${errorMessage(err)}`, { cause: err });
    });

    const body: unknown = await response.json().catch((err: unknown) => {
      throw new ExtractionError(this.sourceName, `invalid JSON from ${url}: ${errorMessage(err)}`, { cause: err });
    });

    const parsed = PageSchema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ExtractionError(
        this.sourceName,
        `unexpected page shape from ${url}: ${issue.path.join('.') || '(root)'} ${issue.message}`
      );
    }
    return parsed.data;
  }

  private async *readObject(object: SaasObject): AsyncGenerator<Batch, void, undefined> {
    const { pageSize } = this.spec.connection;
    let after: string | undefined;
    let sequence = 0;

    do {
      const page = await this.fetchPage(this.buildUrl(object, pageSize, after));
      after = page.paging?.next?.after;

      if (page.results.length === 0) continue;

      sequence++;
      log.debug(`${this.sourceName}: page ${sequence} of ${object.name} (${page.results.length} records)`);
      yield { dataset: object.name, sequence, records: page.results.map(toRecord) };
    } while (after !== undefined);
  }

  protected async *readBatches(): AsyncGenerator<Batch, void, undefined> {
    for (const object of this.spec.connection.objects) {
      yield* this.readObject(object);
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.abortController.abort();
  }
}

/**
 * SaaS API source connector.
 * Authenticates with a bearer API key and checks the first object on open.
 */
class SaasApiConnector implements SourceConnector<SaasApiSpec> {
  readonly kind = 'saas_api';

  constructor(private readonly fetchFn: typeof fetch) {}

  async open(spec: SaasApiSpec): Promise<ConnectorHandle> {
    const handle = new SaasApiHandle(spec, this.fetchFn);
    const [first] = spec.connection.objects;

    try {
      await handle.fetchPage(handle.buildUrl(first, 1));
    } catch (err) {
      await handle.close();
      if (err instanceof ConnectionError || err instanceof RateLimitExceeded) throw err;
      throw new ConnectionError(spec.name, `connectivity check on ${first.name} failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    log.debug(`${spec.name}: connected to ${spec.connection.baseUrl}`);
    return handle;
  }
}

export const saasApiConnector = (options: SaasApiOptions = {}): SourceConnector<SaasApiSpec> =>
  new SaasApiConnector(options.fetchFn ?? globalThis.fetch);
