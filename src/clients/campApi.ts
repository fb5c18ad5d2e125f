import type { ResponseCache } from '../cache/responseCache.js';
import type { CredentialHeaders, HttpMethod } from '../types/index.js';
import { randomBytes } from 'node:crypto';
import { CampApiError } from '../errors.js';
import { sleep } from '../utils/sleep.js';
import { generateTraceparent } from '../utils/trace.js';

export interface CredentialSource {
  getCredential(): Promise<string>;
  close(): Promise<void>;
}

export interface CampApiClientOptions {
  credentials: CredentialSource;
  cache: ResponseCache;
  baseUrl?: string;
  region?: number;
  language?: string;
  gameId?: number;
  deviceId?: string;
  userAgent?: string;
  timeoutMs?: number;
  maxRetries?: number;
  retryBackoffMs?: number;
  fetch?: typeof fetch;
  logger?: (message: string) => void;
}

export interface RequestOptions {
  useCache?: boolean;
}

export const DEFAULT_BASE_URL = 'https://api-camp.honorofkings.com';
export const DEFAULT_GAME_ID = 29134;
export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/136.0.0.0 Safari/537.36';

export class CampApiClient {
  private readonly credentials: CredentialSource;
  private readonly cache: ResponseCache;
  private readonly baseUrl: string;
  private readonly defaultHeaders: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryBackoffMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: ((message: string) => void) | undefined;

  constructor(options: CampApiClientOptions) {
    this.credentials = options.credentials;
    this.cache = options.cache;
    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.maxRetries = options.maxRetries ?? 3;
    this.retryBackoffMs = options.retryBackoffMs ?? 1000;
    this.fetchImpl = options.fetch ?? fetch;
    this.logger = options.logger;
    this.defaultHeaders = {
      accept: 'application/json, text/plain, */*',
      'camp-language': options.language ?? 'en',
      'camp-region': String(options.region ?? 608),
      campsource: 'HOK-CAMP',
      'content-type': 'application/json',
      // A fresh device id per client unless one is pinned.
      deviceid: options.deviceId ?? randomBytes(32).toString('hex'),
      gameid: String(options.gameId ?? DEFAULT_GAME_ID),
      'user-agent': options.userAgent ?? DEFAULT_USER_AGENT,
      origin: 'https://camp.honorofkings.com',
      referer: 'https://camp.honorofkings.com/',
    };
  }

  async request(
    method: HttpMethod,
    endpoint: string,
    payload?: unknown,
    options: RequestOptions = {},
  ): Promise<unknown> {
    const useCache = options.useCache ?? true;
    const cacheRequest = { method, endpoint, payload };
    if (useCache) {
      const cached = await this.cache.read(cacheRequest);
      if (cached !== null) {
        return cached;
      }
    }

    const body = await this.fetchLive(method, endpoint, payload);
    if (useCache) {
      await this.cache.write(cacheRequest, body);
    }
    return body;
  }

  async credentialHeaders(): Promise<CredentialHeaders> {
    return {
      specialencodeparam: await this.credentials.getCredential(),
      traceparent: generateTraceparent(),
    };
  }

  async close(): Promise<void> {
    await this.credentials.close();
  }

  private async fetchLive(method: HttpMethod, endpoint: string, payload: unknown): Promise<unknown> {
    const url = new URL(endpoint, this.baseUrl).toString();
    let backoffMs = this.retryBackoffMs;

    for (let attempt = 1; ; attempt += 1) {
      const isLastAttempt = attempt >= this.maxRetries;
      const headers = { ...this.defaultHeaders, ...(await this.credentialHeaders()) };

      let response: Response;
      try {
        response = await this.fetchImpl(url, {
          method,
          headers,
          ...(isEmptyPayload(payload) ? {} : { body: JSON.stringify(payload) }),
          signal: AbortSignal.timeout(this.timeoutMs),
        });
      } catch (error) {
        if (!isTimeout(error) || isLastAttempt) {
          throw error;
        }
        this.logger?.(`Request to ${endpoint} timed out. Retrying in ${backoffMs}ms (attempt ${attempt + 1}).`);
        await sleep(backoffMs);
        backoffMs *= 2;
        continue;
      }

      if (response.status === 429 && !isLastAttempt) {
        const waitMs = retryAfterMs(response.headers.get('retry-after')) ?? backoffMs;
        this.logger?.(`Hit camp API rate limit (429). Waiting ${Math.round(waitMs / 1000)}s before retry #${attempt}.`);
        await sleep(waitMs);
        backoffMs *= 2;
        continue;
      }

      if (!response.ok) {
        throw new CampApiError(`Camp API request to ${endpoint} failed with status ${response.status}`, response.status);
      }

      const body: unknown = await response.json();
      return body;
    }
  }
}

function isEmptyPayload(payload: unknown): boolean {
  if (payload === undefined || payload === null) {
    return true;
  }
  if (Array.isArray(payload)) {
    return payload.length === 0;
  }
  return typeof payload === 'object' && Object.keys(payload).length === 0;
}

function isTimeout(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'name' in error && error.name === 'TimeoutError';
}

function retryAfterMs(header: string | null): number | undefined {
  if (header === null || header.trim() === '') {
    return undefined;
  }
  const seconds = Number(header);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
}
