import type { FunctionRecord, LookupResult } from '@finding-lookup/shared';
import { parseCsvRow } from './csv_row';
import { parseLineNumber, stripQuotes } from './names';
import { found, notFound } from './results';
import { TABLE_LABELS, scanTableLines } from './row_scanner';
import { getFunctionByLine } from './resolvers';
import { FUNCTION_KEYS } from './tables';

export const CALLER_NOT_FOUND =
  'Caller function was not found. Make sure you are using the correct tool with the correct args.';

export interface CallerLocation {
  file: string;
  line: number;
}

/**
 * Decodes a caller id of the form `<marker><file>:<line>`, e.g.
 * `"/src/foo.c":42`. The first character of the file part is the marker and
 * is dropped. Returns undefined when the id does not have exactly one
 * file/line split or the line is not an integer.
 */
export function decodeCallerLocation(callerId: string): CallerLocation | undefined {
  const raw = callerId.trim();
  const colon = raw.indexOf(':');
  if (colon === -1) return undefined;
  const filePart = raw.slice(0, colon);
  const linePart = raw.slice(colon + 1);
  if (linePart.includes(':')) return undefined;
  const line = parseLineNumber(linePart);
  if (line === undefined) return undefined;
  return { file: stripQuotes(filePart.slice(1)), line };
}

/**
 * Resolves the function that calls `fn`: first by matching `caller_id`
 * against `function_id`, then by decoding `caller_id` as a file:line
 * location and looking up the function that covers it.
 */
export function getCallerFunction(functionTreeFile: string, fn: FunctionRecord): LookupResult<FunctionRecord> {
  const callerId = stripQuotes(fn.caller_id).trim();

  if (callerId) {
    for (const line of scanTableLines(functionTreeFile, TABLE_LABELS.functionTree)) {
      if (!line.includes(callerId)) continue;
      const row = parseCsvRow(line, FUNCTION_KEYS);
      if (!row) continue;
      if (stripQuotes(row.function_id).trim() === callerId) return found(row);
    }
  }

  const location = decodeCallerLocation(fn.caller_id);
  if (location) {
    const caller = getFunctionByLine(functionTreeFile, location.file, location.line);
    if (caller) return found(caller);
  }

  return notFound(CALLER_NOT_FOUND);
}
