export interface CacheEntry {
  key: string;
  value: string;
  storedAt: number;
}

export interface CacheClient {
  getCache(key: string): Promise<string | null>;
  setCache(key: string, value: string): Promise<void>;
}
