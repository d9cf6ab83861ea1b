import fs from 'fs';
import { StringDecoder } from 'string_decoder';
import { TableAccessError, errorCode } from './errors';
import { logger } from './logger';

const log = logger('scanner');

const CHUNK_SIZE = 64 * 1024;

export const TABLE_LABELS = {
  functionTree: 'Function tree file',
  macros: 'Macros CSV',
  globalVars: 'GlobalVars CSV',
  classes: 'Classes CSV',
} as const;

export function toTableAccessError(err: unknown, filePath: string, label: string): TableAccessError {
  const code = errorCode(err);
  if (code === 'ENOENT') return new TableAccessError('missing', label, filePath, err);
  if (code === 'EACCES' || code === 'EPERM') return new TableAccessError('permission', label, filePath, err);
  return new TableAccessError('os', label, filePath, err);
}

/**
 * Lazily yields the raw lines of a table file, line terminators included.
 * The descriptor is closed however iteration ends, including when the
 * consumer stops early.
 */
export function* scanTableLines(filePath: string, label: string): Generator<string, void, undefined> {
  let fd: number;
  try {
    fd = fs.openSync(filePath, 'r');
  } catch (err) {
    throw toTableAccessError(err, filePath, label);
  }
  log('scanning %s (%s)', label, filePath);
  try {
    const buffer = Buffer.alloc(CHUNK_SIZE);
    const decoder = new StringDecoder('utf8');
    let pending = '';
    for (;;) {
      let bytesRead: number;
      try {
        bytesRead = fs.readSync(fd, buffer, 0, CHUNK_SIZE, null);
      } catch (err) {
        throw toTableAccessError(err, filePath, label);
      }
      if (bytesRead === 0) break;
      pending += decoder.write(buffer.subarray(0, bytesRead));
      let newline = pending.indexOf('\n');
      while (newline !== -1) {
        yield pending.slice(0, newline + 1);
        pending = pending.slice(newline + 1);
        newline = pending.indexOf('\n');
      }
    }
    pending += decoder.end();
    if (pending) yield pending;
  } finally {
    fs.closeSync(fd);
  }
}
