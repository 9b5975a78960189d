import { createWriteStream, mkdirSync, WriteStream } from 'node:fs';
import { join, resolve } from 'node:path';
import { randomUUID } from 'node:crypto';

export interface TraceLoggerOptions {
  enabled: boolean;
  dir: string;
}

/**
 * Lightweight trace logger that records tool calls when HOHMANN_TRACE is set.
 */
export class TraceLogger {
  private stream: WriteStream | null = null;
  readonly filePath: string | null = null;

  constructor(private readonly context: string, options: TraceLoggerOptions) {
    if (!options.enabled) {
      return;
    }

    const dir = resolve(options.dir);
    mkdirSync(dir, { recursive: true });

    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    const id = randomUUID().split('-')[0];
    this.filePath = join(dir, `hohmann-trace-${context}-${timestamp}-${id}.log`);
    this.stream = createWriteStream(this.filePath, { flags: 'a' });
    this.stream.write(`# Trace start ${new Date().toISOString()} (${context})\n`);
  }

  get enabled(): boolean {
    return this.stream !== null;
  }

  logCall(tool: string, args: Record<string, unknown>): void {
    this.write('CALL', `${tool} ${JSON.stringify(args)}`);
  }

  logResult(tool: string, text: string): void {
    this.write('RESULT', `${tool} ${JSON.stringify(text)}`);
  }

  logInfo(message: string): void {
    this.write('INFO', message);
  }

  logError(tool: string, error: unknown): void {
    const msg = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
    this.write('ERROR', `${tool} ${msg}`);
  }

  /**
   * Flush and close the trace file. Resolves once everything is on disk.
   */
  close(): Promise<void> {
    const stream = this.stream;
    if (!stream) {
      return Promise.resolve();
    }
    this.stream = null;

    return new Promise((resolvePromise, reject) => {
      stream.once('error', reject);
      stream.end(`# Trace end ${new Date().toISOString()}\n`, () => resolvePromise());
    });
  }

  private write(type: 'CALL' | 'RESULT' | 'INFO' | 'ERROR', payload: string): void {
    if (!this.stream) {
      return;
    }

    const stamp = new Date().toISOString();
    this.stream.write(`[${stamp}] [${this.context}] ${type}: ${payload}\n`);
  }
}
