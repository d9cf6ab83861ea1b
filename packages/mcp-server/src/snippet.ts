import fs from 'fs';
import path from 'path';
import AdmZip from 'adm-zip';
import type { ExtractedFunction, FunctionRecord } from '@finding-lookup/shared';
import { ArchiveError, LookupError, errorCode } from './errors';
import { parseLineNumber, stripQuotes } from './names';

export const SOURCE_ARCHIVE = 'src.zip';

/**
 * Archive entry for a table `file` field: quotes removed, then the leading
 * marker character dropped (`"/src/net.c"` -> `src/net.c`).
 */
export function archiveEntryPath(fileField: string): string {
  return stripQuotes(fileField).slice(1);
}

export function readArchiveText(archivePath: string, entryPath: string): string {
  try {
    fs.statSync(archivePath);
  } catch (err) {
    if (errorCode(err) === 'ENOENT') {
      throw new ArchiveError(`Source archive not found: ${archivePath}`, archivePath, entryPath, err);
    }
    throw new ArchiveError(`Failed to read source archive: ${archivePath}`, archivePath, entryPath, err);
  }

  let zip: AdmZip;
  try {
    zip = new AdmZip(archivePath);
  } catch (err) {
    throw new ArchiveError(`Failed to read source archive: ${archivePath}`, archivePath, entryPath, err);
  }
  const entry = zip.getEntry(entryPath);
  if (!entry || entry.isDirectory) {
    throw new ArchiveError(`File '${entryPath}' not found in source archive: ${archivePath}`, archivePath, entryPath);
  }
  return entry.getData().toString('utf8');
}

/** Any record that locates a range of lines in a source file. */
export type SourceSpan = Pick<FunctionRecord, 'file' | 'start_line' | 'end_line'>;

function requireLine(span: SourceSpan, key: 'start_line' | 'end_line'): number {
  const value = parseLineNumber(span[key]);
  if (value === undefined) {
    throw new LookupError(`Invalid ${key} for ${span.file}: ${span[key]}`);
  }
  return value;
}

/**
 * Reads the source file of `fn` from `<dbPath>/src.zip`. The returned lines
 * cover the whole file; callers slice `[startLine, endLine]` themselves,
 * for instance with `sliceFunctionLines`.
 */
export function extractFunctionLines(dbPath: string, fn: SourceSpan, archiveName = SOURCE_ARCHIVE): ExtractedFunction {
  const archivePath = path.join(dbPath, archiveName);
  const filePath = archiveEntryPath(fn.file);
  const lines = readArchiveText(archivePath, filePath).split('\n');
  return {
    filePath,
    startLine: requireLine(fn, 'start_line'),
    endLine: requireLine(fn, 'end_line'),
    lines,
  };
}

/** Lines `startLine..endLine` (1-based, inclusive), clamped to the file. */
export function sliceFunctionLines(extracted: ExtractedFunction): string[] {
  const start = Math.max(1, extracted.startLine);
  const end = Math.min(extracted.lines.length, extracted.endLine);
  if (end < start) return [];
  return extracted.lines.slice(start - 1, end);
}

export function formatNumberedSnippet(filePath: string, startLine: number, snippetLines: readonly string[]): string {
  const body = snippetLines.map((text, i) => `${startLine + i}: ${text}`).join('\n');
  return `file: ${filePath}\n${body}`;
}
