import type { CacheClient } from './cache.js';
import type { HttpMethod } from '../types/index.js';
import { checksumFrom } from '../utils/hash.js';

export interface CachedRequest {
  method: HttpMethod;
  endpoint: string;
  payload?: unknown;
}

export class ResponseCache {
  constructor(private readonly cache: CacheClient, private readonly namespace: string = 'camp-api') {}

  fingerprint(request: CachedRequest): string {
    return checksumFrom({
      namespace: this.namespace,
      method: request.method.toUpperCase(),
      endpoint: request.endpoint,
      payload: request.payload ?? null,
    });
  }

  async read(request: CachedRequest): Promise<unknown> {
    const body = await this.cache.getCache(this.fingerprint(request));
    if (body === null) {
      return null;
    }
    return JSON.parse(body);
  }

  async write(request: CachedRequest, value: unknown): Promise<void> {
    await this.cache.setCache(this.fingerprint(request), JSON.stringify(value));
  }
}
