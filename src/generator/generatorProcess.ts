import { spawn } from 'node:child_process';
import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import pLimit from 'p-limit';
import { GeneratorIPCError, GeneratorStartupError, describeError } from '../errors.js';

export const READY_TOKEN = 'READY';
const STDERR_TAIL_BYTES = 16 * 1024;

export type GeneratorState = 'stopped' | 'starting' | 'ready' | 'busy' | 'stopping' | 'failed';

export interface GeneratorChild {
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable;
  readonly closed: Promise<void>;
  isRunning(): boolean;
  kill(signal: NodeJS.Signals): void;
}

export type SpawnGenerator = (executablePath: string, args: readonly string[]) => GeneratorChild;

export interface GeneratorProcessOptions {
  executablePath: string;
  args?: readonly string[];
  batchSize?: number;
  startupTimeoutMs?: number;
  requestTimeoutMs?: number;
  stopTimeoutMs?: number;
  spawn?: SpawnGenerator;
  logger?: (message: string) => void;
}

export const spawnGenerator: SpawnGenerator = (executablePath, args) => {
  const child = spawn(executablePath, [...args], { stdio: ['pipe', 'pipe', 'pipe'] });
  let spawnFailed = false;
  const closed = new Promise<void>((resolve) => {
    child.once('close', () => resolve());
    child.once('error', () => {
      spawnFailed = true;
      resolve();
    });
  });
  // EPIPE surfaces through the write callback; without a listener it would crash the process.
  child.stdin.on('error', () => undefined);

  return {
    stdin: child.stdin,
    stdout: child.stdout,
    stderr: child.stderr,
    closed,
    isRunning: () => !spawnFailed && child.exitCode === null && child.signalCode === null,
    kill: (signal) => {
      child.kill(signal);
    },
  };
};

class LineReader {
  private readonly buffered: string[] = [];
  private readonly waiters: Array<(line: string | null) => void> = [];
  private ended = false;

  constructor(input: Readable) {
    const lines = createInterface({ input, crlfDelay: Infinity });
    lines.on('line', (line) => {
      const waiter = this.waiters.shift();
      if (waiter) {
        waiter(line);
      } else {
        this.buffered.push(line);
      }
    });
    lines.once('close', () => {
      this.ended = true;
      for (const waiter of this.waiters.splice(0)) {
        waiter(null);
      }
    });
  }

  next(): Promise<string | null> {
    const line = this.buffered.shift();
    if (line !== undefined) {
      return Promise.resolve(line);
    }
    if (this.ended) {
      return Promise.resolve(null);
    }
    return new Promise((resolve) => this.waiters.push(resolve));
  }
}

interface Session {
  child: GeneratorChild;
  lines: LineReader;
  stderr: () => string;
}

function openSession(child: GeneratorChild): Session {
  let captured = '';
  child.stderr.setEncoding('utf8');
  child.stderr.on('data', (chunk: string) => {
    captured = (captured + chunk).slice(-STDERR_TAIL_BYTES);
  });

  return {
    child,
    lines: new LineReader(child.stdout),
    stderr: () => captured.trim(),
  };
}

// Any IPC failure kills the child; the next request starts a fresh one.
export class GeneratorProcess {
  private readonly executablePath: string;
  private readonly args: readonly string[];
  private readonly batchSize: number;
  private readonly startupTimeoutMs: number;
  private readonly requestTimeoutMs: number;
  private readonly stopTimeoutMs: number;
  private readonly spawnChild: SpawnGenerator;
  private readonly logger: ((message: string) => void) | undefined;
  private readonly lifecycleLock = pLimit(1);
  private readonly commLock = pLimit(1);
  private session: Session | null = null;
  private currentState: GeneratorState = 'stopped';

  constructor(options: GeneratorProcessOptions) {
    this.executablePath = options.executablePath;
    this.args = options.args ?? ['server'];
    this.batchSize = options.batchSize ?? 2;
    this.startupTimeoutMs = options.startupTimeoutMs ?? 30_000;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 30_000;
    this.stopTimeoutMs = options.stopTimeoutMs ?? 3_000;
    this.spawnChild = options.spawn ?? spawnGenerator;
    this.logger = options.logger;
  }

  get state(): GeneratorState {
    return this.currentState;
  }

  async start(): Promise<void> {
    await this.lifecycleLock(() => this.startLocked());
  }

  async requestBatch(size: number = this.batchSize, signal?: AbortSignal): Promise<string[]> {
    if (!Number.isInteger(size) || size <= 0) {
      throw new RangeError(`Batch size must be a positive integer, got ${size}.`);
    }

    return this.commLock(async () => {
      if (signal?.aborted) {
        throw new GeneratorIPCError('Generator request was cancelled.');
      }
      if (!this.isReady()) {
        await this.start();
      }

      const session = this.session;
      if (!session) {
        throw new GeneratorIPCError('Generator is not running.');
      }

      this.currentState = 'busy';
      try {
        await writeLine(session.child.stdin, `cluster ${size}\n`);
        const line = await readLine(session, this.requestTimeoutMs);
        if (line === null) {
          throw new Error('Generator closed its output stream unexpectedly.');
        }
        const params = parseBatch(line);
        if (this.session === session) {
          this.currentState = 'ready';
        }
        return params;
      } catch (error) {
        this.logger?.(`Error communicating with generator: ${describeError(error)}. Restarting on next request.`);
        // stop() may already have taken the session; its own state wins then.
        const stillCurrent = this.session === session;
        await this.teardown(session);
        if (stillCurrent) {
          this.currentState = 'failed';
        }
        throw new GeneratorIPCError(describeError(error), { cause: error, stderr: session.stderr() });
      }
    });
  }

  async stop(): Promise<void> {
    await this.lifecycleLock(async () => {
      const session = this.session;
      this.session = null;
      if (!session) {
        this.currentState = 'stopped';
        return;
      }

      if (session.child.isRunning()) {
        this.currentState = 'stopping';
        this.logger?.('Stopping generator...');
        session.child.kill('SIGTERM');
        const exited = await settlesWithin(session.child.closed, this.stopTimeoutMs);
        if (!exited) {
          this.logger?.(`Generator ignored SIGTERM for ${this.stopTimeoutMs}ms; killing it.`);
          session.child.kill('SIGKILL');
        }
      }
      await session.child.closed;
      this.currentState = 'stopped';
    });
  }

  private isReady(): boolean {
    return this.currentState === 'ready' && this.session !== null && this.session.child.isRunning();
  }

  private async startLocked(): Promise<void> {
    if (this.session?.child.isRunning()) {
      return;
    }
    if (this.session) {
      await this.teardown(this.session);
    }

    this.currentState = 'starting';
    this.logger?.(`Starting generator ${this.executablePath}...`);

    let session: Session;
    try {
      session = openSession(this.spawnChild(this.executablePath, this.args));
    } catch (error) {
      this.currentState = 'failed';
      throw new GeneratorStartupError(`Failed to spawn generator: ${describeError(error)}`, { cause: error });
    }

    let readyLine: string | null;
    try {
      readyLine = await readLine(session, this.startupTimeoutMs);
    } catch (error) {
      await this.teardown(session);
      this.currentState = 'failed';
      throw new GeneratorStartupError(`Generator did not become ready: ${describeError(error)}`, {
        cause: error,
        stderr: session.stderr(),
      });
    }

    if (readyLine?.trim() !== READY_TOKEN) {
      await this.teardown(session);
      this.currentState = 'failed';
      const reason =
        readyLine === null ? 'it exited before signalling readiness' : `unexpected first line "${readyLine.trim()}"`;
      throw new GeneratorStartupError(`Generator failed to start: ${reason}.`, { stderr: session.stderr() });
    }

    this.session = session;
    this.currentState = 'ready';
    this.logger?.('Generator is ready.');
  }

  private async teardown(session: Session): Promise<void> {
    if (session.child.isRunning()) {
      session.child.kill('SIGKILL');
    }
    await session.child.closed;
    if (this.session === session) {
      this.session = null;
    }
  }
}

export function parseBatch(line: string): string[] {
  const start = line.indexOf('[');
  if (start === -1) {
    throw new Error(`Could not find a JSON array in generator output: ${line}`);
  }

  const parsed: unknown = JSON.parse(line.slice(start));
  if (!Array.isArray(parsed) || !parsed.every((item): item is string => typeof item === 'string')) {
    throw new Error(`Generator output is not an array of strings: ${line}`);
  }
  return parsed;
}

function writeLine(stream: Writable, line: string): Promise<void> {
  return new Promise((resolve, reject) => {
    stream.write(line, (error) => {
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    });
  });
}

async function readLine(session: Session, timeoutMs: number): Promise<string | null> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`No response from generator within ${timeoutMs}ms.`)), timeoutMs);
  });
  try {
    return await Promise.race([session.lines.next(), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

async function settlesWithin(promise: Promise<void>, timeoutMs: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<false>((resolve) => {
    timer = setTimeout(() => resolve(false), timeoutMs);
  });
  try {
    return await Promise.race([promise.then(() => true), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
