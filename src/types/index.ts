export interface CredentialRow {
  param: string;
  useCount: number;
  lastUsedAt: number;
}

export interface PoolStats {
  total: number;
  available: number;
  coolingDown: number;
  reusable: number;
}

export interface CredentialHeaders {
  specialencodeparam: string;
  traceparent: string;
}

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';
