import { fileURLToPath } from 'node:url';
import pino, { type DestinationStream } from 'pino';
import { ConfigurationError, toError } from '../../types/errors';

/**
 * A destination for serialized records. `write` receives one JSON line per
 * record; `flush`, when present, forces buffered lines out; `close`, when
 * present, releases the sink if the logger that opened it fails to build.
 */
export interface Sink extends DestinationStream {
  flush?(cb: (err?: Error | null) => void): void;
  close?(): void;
}

/**
 * Builds a sink for a registered scheme from the parsed sink URL
 */
export type SinkFactory = (url: URL) => Sink;

export interface OpenedSink {
  path: string;
  /** Guarded stream: a failed write is kept in `lastError` instead of thrown */
  stream: Sink;
  close?: () => void;
  /** Last write failure not yet reported by a flush */
  lastError?: Error;
}

type FileDestination = ReturnType<typeof pino.destination>;

const SCHEME_PATTERN = /^[a-zA-Z][a-zA-Z0-9+.-]*$/;
const URL_PREFIX_PATTERN = /^([a-zA-Z][a-zA-Z0-9+.-]*):/;

const sinkFactories = new Map<string, SinkFactory>();

/**
 * Register a factory for sink URLs of the form `<scheme>:...`
 *
 * @throws ConfigurationError if the scheme is malformed, reserved or taken
 */
export function registerSink(scheme: string, factory: SinkFactory): void {
  const key = scheme.toLowerCase();

  if (!SCHEME_PATTERN.test(scheme)) {
    throw new ConfigurationError(`Invalid sink scheme "${scheme}"`, {
      configKey: 'scheme',
      actualValue: scheme,
    });
  }
  if (key === 'file') {
    throw new ConfigurationError('The "file" sink scheme is built in', {
      configKey: 'scheme',
      actualValue: scheme,
    });
  }
  if (sinkFactories.has(key)) {
    throw new ConfigurationError(`A sink is already registered for scheme "${scheme}"`, {
      configKey: 'scheme',
      actualValue: scheme,
    });
  }

  sinkFactories.set(key, factory);
}

function openFile(path: string, sinkPath: string): FileDestination {
  try {
    // sync mode opens the file in the constructor, so failures throw here
    return pino.destination({ dest: path, sync: true, append: true, mkdir: false });
  } catch (error) {
    throw new ConfigurationError(`Cannot open log file for sink "${sinkPath}"`, {
      configKey: 'outputPaths',
      actualValue: sinkPath,
      cause: toError(error),
    });
  }
}

function openFileUrl(sinkPath: string): FileDestination {
  let url: URL;
  try {
    url = new URL(sinkPath);
  } catch (error) {
    throw new ConfigurationError(`Malformed sink URL "${sinkPath}"`, {
      configKey: 'outputPaths',
      actualValue: sinkPath,
      cause: toError(error),
    });
  }

  if (url.search !== '' || url.hash !== '') {
    throw new ConfigurationError(
      `File sink "${sinkPath}" must not have a query or fragment`,
      { configKey: 'outputPaths', actualValue: sinkPath }
    );
  }

  let path: string;
  try {
    path = fileURLToPath(url);
  } catch (error) {
    throw new ConfigurationError(`Invalid file sink "${sinkPath}"`, {
      configKey: 'outputPaths',
      actualValue: sinkPath,
      cause: toError(error),
    });
  }
  return openFile(path, sinkPath);
}

function openRegistered(scheme: string, sinkPath: string): Sink {
  const factory = sinkFactories.get(scheme);
  if (!factory) {
    throw new ConfigurationError(`No sink registered for scheme "${scheme}"`, {
      configKey: 'outputPaths',
      actualValue: sinkPath,
    });
  }

  let url: URL;
  try {
    url = new URL(sinkPath);
  } catch (error) {
    throw new ConfigurationError(`Malformed sink URL "${sinkPath}"`, {
      configKey: 'outputPaths',
      actualValue: sinkPath,
      cause: toError(error),
    });
  }

  try {
    return factory(url);
  } catch (error) {
    throw new ConfigurationError(`Sink factory for "${scheme}" failed`, {
      configKey: 'outputPaths',
      actualValue: sinkPath,
      cause: toError(error),
    });
  }
}

function guard(path: string, target: Sink, close?: () => void): OpenedSink {
  const entry: OpenedSink = { path, stream: target, close };
  entry.stream = {
    write(msg: string): void {
      try {
        target.write(msg);
      } catch (error) {
        entry.lastError = toError(error);
      }
    },
    flush(cb: (err?: Error | null) => void): void {
      if (target.flush) {
        target.flush(cb);
      } else {
        cb();
      }
    },
  };
  return entry;
}

function fromDestination(
  path: string,
  destination: FileDestination,
  close?: () => void
): OpenedSink {
  const entry = guard(path, destination, close);
  // an unheard 'error' event would be rethrown into the log call
  destination.on('error', (error: Error) => {
    entry.lastError = error;
  });
  return entry;
}

function openEntry(sinkPath: string): OpenedSink {
  if (sinkPath === 'stdout') {
    return fromDestination(sinkPath, pino.destination({ dest: 1, sync: true }));
  }
  if (sinkPath === 'stderr') {
    return fromDestination(sinkPath, pino.destination({ dest: 2, sync: true }));
  }

  const match = URL_PREFIX_PATTERN.exec(sinkPath);
  // single letters are drive names (C:\logs\app.log), not schemes
  if (!match || match[1].length === 1) {
    const file = openFile(sinkPath, sinkPath);
    return fromDestination(sinkPath, file, () => file.destroy());
  }

  const scheme = match[1].toLowerCase();
  if (scheme === 'file') {
    const file = openFileUrl(sinkPath);
    return fromDestination(sinkPath, file, () => file.destroy());
  }

  const sink = openRegistered(scheme, sinkPath);
  return guard(sinkPath, sink, () => sink.close?.());
}

/**
 * Open a single sink. The returned stream never throws from `write`.
 *
 * - `stdout` / `stderr`: the process streams
 * - `file:///abs/path` or a plain path: a file opened for append
 * - `<scheme>://...`: a sink from `registerSink`
 */
export function openSink(sinkPath: string): Sink {
  return openEntry(sinkPath).stream;
}

/**
 * Open every sink, in order. If one fails, sinks already opened are closed.
 *
 * @throws ConfigurationError for the first sink that cannot be opened
 */
export function openSinks(sinkPaths: readonly string[]): OpenedSink[] {
  const opened: OpenedSink[] = [];
  try {
    for (const path of sinkPaths) {
      opened.push(openEntry(path));
    }
  } catch (error) {
    for (const sink of opened) {
      sink.close?.();
    }
    throw error;
  }
  return opened;
}

/**
 * Force a sink's buffered records out. Sinks without `flush` resolve at once.
 */
export function flushSink(sink: Sink): Promise<void> {
  return new Promise((resolve, reject) => {
    if (!sink.flush) {
      resolve();
      return;
    }
    sink.flush((err) => (err ? reject(err) : resolve()));
  });
}
