import type { CredentialRow, PoolStats } from '../types/index.js';

export interface CredentialStore {
  /** Inserts unseen params with a zero use count; returns how many were new. */
  addCredentials(params: Iterable<string>): Promise<number>;
  countAvailable(): Promise<number>;
  /** Picks, marks as used and returns one credential, or null when none is eligible. */
  allocate(): Promise<string | null>;
}

export interface PoolInspector {
  poolStats(): Promise<PoolStats>;
  getCredentialRow(param: string): Promise<CredentialRow | null>;
}
