import type { Sink } from '../sinks';

export type LogRecord = Record<string, unknown>;

/**
 * In-memory sink that keeps every line it receives
 */
export class MemorySink implements Sink {
  readonly lines: string[] = [];
  flushCount = 0;
  flushError: Error | null = null;
  writeError: Error | null = null;
  closed = false;

  write(msg: string): void {
    if (this.writeError) {
      throw this.writeError;
    }
    for (const line of msg.split('\n')) {
      if (line.length > 0) {
        this.lines.push(line);
      }
    }
  }

  flush(cb: (err?: Error | null) => void): void {
    this.flushCount += 1;
    cb(this.flushError);
  }

  close(): void {
    this.closed = true;
  }

  records(): LogRecord[] {
    return this.lines.map((line): LogRecord => JSON.parse(line));
  }

  last(): LogRecord | undefined {
    return this.records().at(-1);
  }
}

/**
 * Sinks created through a registered scheme, keyed by URL host
 * (`mem://orders` lands in `sinks.get('orders')`)
 */
export class MemorySinkRegistry {
  private readonly sinks = new Map<string, MemorySink>();

  readonly factory = (url: URL): MemorySink => {
    const sink = new MemorySink();
    this.sinks.set(url.host, sink);
    return sink;
  };

  get(host: string): MemorySink {
    const sink = this.sinks.get(host);
    if (!sink) {
      throw new Error(`No memory sink was opened for "${host}"`);
    }
    return sink;
  }

  has(host: string): boolean {
    return this.sinks.has(host);
  }

  clear(): void {
    this.sinks.clear();
  }
}
