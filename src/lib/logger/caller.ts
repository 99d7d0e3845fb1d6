import { relative } from 'node:path';
import { fileURLToPath } from 'node:url';

const FRAME_LOCATION = /\(?([^\s()]+):(\d+):\d+\)?$/;

function toRelativePath(file: string): string {
  const path = file.startsWith('file://') ? fileURLToPath(file) : file;
  return relative(process.cwd(), path) || path;
}

/**
 * Location (`file:line`) of the code that called `anchor`.
 * Returns undefined when the stack has no usable frame.
 */
export function captureCaller(anchor: (...args: never[]) => unknown): string | undefined {
  const holder: { stack?: string } = {};
  Error.captureStackTrace(holder, anchor);

  const frame = holder.stack?.split('\n')[1];
  const match = frame ? FRAME_LOCATION.exec(frame.trim()) : null;
  if (!match) {
    return undefined;
  }
  return `${toRelativePath(match[1])}:${match[2]}`;
}
