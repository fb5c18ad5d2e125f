import type { CredentialStore } from '../store/store.js';
import { PoolExhaustedError, RefillFailedError, describeError } from '../errors.js';
import { sleep } from '../utils/sleep.js';

export interface CredentialGenerator {
  requestBatch(size?: number, signal?: AbortSignal): Promise<string[]>;
  stop(): Promise<void>;
}

export interface CredentialPoolOptions {
  batchSize?: number;
  poolTarget?: number;
  lowWaterMark?: number;
  retryBackoffMs?: number;
  logger?: (message: string) => void;
}

export class CredentialPool {
  private readonly batchSize: number;
  private readonly poolTarget: number;
  private readonly lowWaterMark: number;
  private readonly retryBackoffMs: number;
  private readonly logger: ((message: string) => void) | undefined;
  private warmupTask: Promise<void> | null = null;
  private readonly shutdown = new AbortController();

  constructor(
    private readonly store: CredentialStore,
    private readonly generator: CredentialGenerator,
    options: CredentialPoolOptions = {},
  ) {
    this.batchSize = options.batchSize ?? 2;
    this.poolTarget = options.poolTarget ?? 100;
    this.lowWaterMark = options.lowWaterMark ?? 20;
    this.retryBackoffMs = options.retryBackoffMs ?? 5000;
    this.logger = options.logger;
  }

  get isWarmingUp(): boolean {
    return this.warmupTask !== null;
  }

  async getCredential(): Promise<string> {
    this.assertOpen();

    const param = (await this.store.allocate()) ?? (await this.emergencyRefill(new PoolExhaustedError()));

    const available = await this.store.countAvailable();
    if (available < this.lowWaterMark && !this.isWarmingUp) {
      this.logger?.(`Credential pool is low (${available} fresh). Triggering background refill.`);
      this.triggerWarmUp();
    }

    return param;
  }

  triggerWarmUp(): boolean {
    if (this.shutdown.signal.aborted || this.warmupTask) {
      return false;
    }

    this.warmupTask = this.runWarmUp(this.shutdown.signal).finally(() => {
      this.warmupTask = null;
    });
    return true;
  }

  async warmUp(): Promise<void> {
    this.triggerWarmUp();
    await this.warmupTask;
  }

  // Stopping the generator first ends any exchange the warm-up is blocked on.
  async close(): Promise<void> {
    this.shutdown.abort();
    await this.generator.stop();
    await this.warmupTask;
  }

  private async emergencyRefill(cause: PoolExhaustedError): Promise<string> {
    this.assertOpen();
    this.logger?.('Credential pool is empty. Fetching a batch from the generator...');
    const batch = await this.generator.requestBatch(this.batchSize, this.shutdown.signal);
    if (batch.length === 0) {
      throw new RefillFailedError('Generator returned no credentials during emergency refill.', { cause });
    }

    await this.store.addCredentials(batch);
    const param = await this.store.allocate();
    if (param === null) {
      throw new RefillFailedError('No credential available even after emergency refill.', { cause });
    }
    return param;
  }

  private assertOpen(): void {
    if (this.shutdown.signal.aborted) {
      throw new Error('Credential pool is closed.');
    }
  }

  private async runWarmUp(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        const available = await this.store.countAvailable();
        if (available >= this.poolTarget) {
          this.logger?.(`Credential pool is full (${available}/${this.poolTarget}).`);
          return;
        }
        if (signal.aborted) {
          return;
        }

        this.logger?.(`Replenishing credential pool (${available}/${this.poolTarget})...`);
        const batch = await this.generator.requestBatch(this.batchSize, signal);
        if (signal.aborted) {
          return;
        }

        const added = await this.store.addCredentials(batch);
        if (added === 0) {
          throw new Error('Generator returned no new credentials.');
        }
      } catch (error) {
        if (signal.aborted) {
          return;
        }
        this.logger?.(`Warm-up error: ${describeError(error)}. Retrying in ${this.retryBackoffMs / 1000}s...`);
        await sleep(this.retryBackoffMs, signal);
      }
    }
  }
}
