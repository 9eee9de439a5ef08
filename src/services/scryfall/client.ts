import Bottleneck from 'bottleneck';
import { gunzipSync } from 'node:zlib';
import { createLogger } from '../logger/index.js';
import { ExternalFetchError, MalformedPayloadError, getErrorMessage } from '../../utils/errors.js';
import { bulkDataListSchema, errorBodySchema, listEnvelopeSchema } from './schemas.js';

const logger = createLogger('scryfall');

const SERVICE = 'Scryfall';
const GZIP_MAGIC = [0x1f, 0x8b];

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface ScryfallClientOptions {
  baseUrl: string;
  userAgent: string;
  /** Minimum spacing between two requests */
  requestDelayMs: number;
  timeoutMs: number;
  maxRetries?: number;
  /** First backoff step after a 429/5xx; doubles per attempt */
  retryBaseDelayMs?: number;
  fetch?: FetchFn;
}

type BulkDataType = 'default_cards' | 'oracle_cards' | 'unique_artwork' | 'all_cards';

/**
 * Read-only client for the catalog endpoints the pipeline consumes. Every call
 * is serialized through one limiter, so a batch never exceeds the configured
 * request rate however it is driven.
 */
export class ScryfallClient {
  private readonly limiter: Bottleneck;
  private readonly fetchFn: FetchFn;
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;

  constructor(private readonly options: ScryfallClientOptions) {
    this.limiter = new Bottleneck({
      maxConcurrent: 1,
      minTime: options.requestDelayMs,
    });
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.maxRetries = options.maxRetries ?? 3;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 1000;
  }

  /** All sets, as raw records. */
  async listSets(): Promise<unknown[]> {
    const body = await this.getJson(`${this.options.baseUrl}/sets`);
    return parseList(body, 'sets').data;
  }

  /**
   * Every printing in a set, one page of raw records at a time. Follows the
   * `next_page` cursor until the catalog reports no more results.
   */
  async *listSetCards(setCode: string): AsyncGenerator<unknown[], void, undefined> {
    const params = new URLSearchParams({
      q: `e:${setCode}`,
      unique: 'prints',
      order: 'set',
    });
    let url: string | undefined = `${this.options.baseUrl}/cards/search?${params}`;
    let page = 1;

    while (url) {
      // An empty search result comes back as 404
      const body = await this.getJson(url, { notFoundAsNull: true });
      if (body === null) {
        logger.info({ setCode }, 'No cards in set');
        return;
      }

      const envelope = parseList(body, `cards for set ${setCode}`);
      logger.debug({ setCode, page, count: envelope.data.length }, 'Fetched card page');
      yield envelope.data;

      url = envelope.has_more ? envelope.next_page : undefined;
      page++;
    }
  }

  /** One card by id, as a raw record. */
  async getCard(cardId: string): Promise<unknown> {
    return this.getJson(`${this.options.baseUrl}/cards/${encodeURIComponent(cardId)}`);
  }

  /**
   * Download a whole bulk-data corpus. The file is a single JSON array, and
   * may arrive gzip-compressed without a Content-Encoding header.
   */
  async downloadBulkCards(type: BulkDataType = 'default_cards'): Promise<unknown[]> {
    const index = bulkDataListSchema.safeParse(
      await this.getJson(`${this.options.baseUrl}/bulk-data`),
    );
    if (!index.success) {
      throw new MalformedPayloadError('Unexpected bulk-data index shape', {
        issues: index.error.issues.length,
      });
    }

    const entry = index.data.data.find((d) => d.type === type);
    if (!entry) {
      throw new MalformedPayloadError(`Bulk data type not offered: ${type}`);
    }

    logger.info({ type, url: entry.download_uri, size: entry.size }, 'Downloading bulk data');
    const res = await this.request(entry.download_uri);
    let payload: Buffer = Buffer.from(await res.arrayBuffer());
    if (payload[0] === GZIP_MAGIC[0] && payload[1] === GZIP_MAGIC[1]) {
      payload = gunzipSync(payload);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(payload.toString('utf8'));
    } catch (err) {
      throw new MalformedPayloadError(`Bulk data is not JSON: ${getErrorMessage(err)}`);
    }
    if (!Array.isArray(parsed)) {
      throw new MalformedPayloadError('Bulk data is not an array');
    }

    logger.info({ type, cards: parsed.length }, 'Bulk data loaded');
    return parsed;
  }

  // --- HTTP helpers ---

  /** Resolves to null for a 404 when `notFoundAsNull` is set. */
  private async getJson(url: string, opts: { notFoundAsNull?: boolean } = {}): Promise<unknown> {
    const res = await this.request(url, opts.notFoundAsNull ?? false);
    if (res.status === 404) return null;

    try {
      return await res.json();
    } catch (err) {
      throw new MalformedPayloadError(`Response from ${url} is not JSON`, {
        reason: getErrorMessage(err),
      });
    }
  }

  private async request(url: string, allowNotFound = false): Promise<Response> {
    for (let attempt = 1; ; attempt++) {
      let res: Response;
      try {
        res = await this.limiter.schedule(() =>
          this.fetchFn(url, {
            headers: {
              'User-Agent': this.options.userAgent,
              Accept: 'application/json',
            },
            signal: AbortSignal.timeout(this.options.timeoutMs),
          }),
        );
      } catch (err) {
        throw new ExternalFetchError(SERVICE, getErrorMessage(err), { url, cause: err });
      }

      if (res.ok || (allowNotFound && res.status === 404)) {
        return res;
      }

      if ((res.status === 429 || res.status >= 500) && attempt < this.maxRetries) {
        const delay = Math.pow(2, attempt - 1) * this.retryBaseDelayMs;
        logger.warn({ status: res.status, attempt, delay, url }, 'Retryable error, backing off');
        await new Promise((r) => setTimeout(r, delay));
        continue;
      }

      throw new ExternalFetchError(SERVICE, await describeFailure(res), {
        status: res.status,
        url,
      });
    }
  }
}

function parseList(body: unknown, what: string) {
  const envelope = listEnvelopeSchema.safeParse(body);
  if (!envelope.success) {
    throw new MalformedPayloadError(`Unexpected list shape for ${what}`, {
      issues: envelope.error.issues.map((i) => i.path.join('.')),
    });
  }
  return envelope.data;
}

async function describeFailure(res: Response): Promise<string> {
  const fallback = `${res.status} ${res.statusText}`.trim();
  const body: unknown = await res.json().catch(() => null);
  const parsed = errorBodySchema.safeParse(body);
  return parsed.success ? `${fallback} - ${parsed.data.details}` : fallback;
}
