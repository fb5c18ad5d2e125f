export class PoolExhaustedError extends Error {
  constructor(message = 'Credential pool has no usable entry.', options?: ErrorOptions) {
    super(message, options);
    this.name = 'PoolExhaustedError';
  }
}

export class RefillFailedError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'RefillFailedError';
  }
}

export interface GeneratorErrorOptions extends ErrorOptions {
  stderr?: string;
}

export class GeneratorIPCError extends Error {
  readonly stderr: string;

  constructor(message: string, options: GeneratorErrorOptions = {}) {
    super(withStderr(message, options.stderr), options);
    this.name = 'GeneratorIPCError';
    this.stderr = options.stderr ?? '';
  }
}

export class GeneratorStartupError extends Error {
  readonly stderr: string;

  constructor(message: string, options: GeneratorErrorOptions = {}) {
    super(withStderr(message, options.stderr), options);
    this.name = 'GeneratorStartupError';
    this.stderr = options.stderr ?? '';
  }
}

export class StoreError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'StoreError';
  }
}

export class CampApiError extends Error {
  constructor(message: string, readonly status: number, options?: ErrorOptions) {
    super(message, options);
    this.name = 'CampApiError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

function withStderr(message: string, stderr: string | undefined): string {
  const trimmed = stderr?.trim();
  return trimmed ? `${message} Stderr: ${trimmed}` : message;
}
