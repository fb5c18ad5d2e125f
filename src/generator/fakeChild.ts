import { PassThrough } from 'node:stream';
import { createInterface } from 'node:readline';
import type { GeneratorChild } from './generatorProcess.js';

export type FakeResponder = (command: string) => string | null | Promise<string | null>;

export interface FakeChildOptions {
  /** First stdout line; null closes stdout without one. */
  readyLine?: string | null;
  // Writes nothing at all until killed.
  silent?: boolean;
  stderr?: string;
  ignoreSigterm?: boolean;
}

// A string reply becomes one stdout line; null makes the process exit.
export class FakeGeneratorChild implements GeneratorChild {
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly closed: Promise<void>;
  readonly commands: string[] = [];
  readonly signals: NodeJS.Signals[] = [];
  private running = true;
  private readonly markClosed: () => void;

  constructor(private readonly respond: FakeResponder, private readonly options: FakeChildOptions = {}) {
    let resolveClosed: () => void = () => undefined;
    this.closed = new Promise((resolve) => {
      resolveClosed = resolve;
    });
    this.markClosed = resolveClosed;

    if (options.stderr) {
      this.stderr.write(options.stderr);
    }

    const readyLine = options.readyLine === undefined ? 'READY' : options.readyLine;
    if (readyLine === null) {
      this.exit();
    } else if (!options.silent) {
      this.stdout.write(`${readyLine}\n`);
    }

    createInterface({ input: this.stdin }).on('line', (command) => {
      this.commands.push(command);
      void this.reply(command);
    });
  }

  isRunning(): boolean {
    return this.running;
  }

  kill(signal: NodeJS.Signals): void {
    this.signals.push(signal);
    if (signal === 'SIGTERM' && this.options.ignoreSigterm) {
      return;
    }
    setImmediate(() => this.exit());
  }

  exit(): void {
    if (!this.running) {
      return;
    }
    this.running = false;
    this.stdout.end();
    this.stderr.end();
    this.markClosed();
  }

  private async reply(command: string): Promise<void> {
    const response = await this.respond(command);
    if (!this.running) {
      return;
    }
    if (response === null) {
      this.exit();
    } else {
      this.stdout.write(`${response}\n`);
    }
  }
}
