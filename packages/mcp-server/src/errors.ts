export class LookupError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'LookupError';
  }
}

export type TableAccessReason = 'missing' | 'permission' | 'os';

/**
 * Raised when a table file cannot be opened or read. The message carries the
 * table label and path so every table reports failures the same way.
 */
export class TableAccessError extends LookupError {
  constructor(
    readonly reason: TableAccessReason,
    readonly label: string,
    readonly filePath: string,
    cause?: unknown,
  ) {
    super(tableAccessMessage(reason, label, filePath), cause);
    this.name = 'TableAccessError';
  }
}

function tableAccessMessage(reason: TableAccessReason, label: string, filePath: string): string {
  switch (reason) {
    case 'missing':
      return `${label} not found: ${filePath}`;
    case 'permission':
      return `Permission denied reading ${label}: ${filePath}`;
    case 'os':
      return `OS error while reading ${label}: ${filePath}`;
  }
}

export class ArchiveError extends LookupError {
  constructor(
    message: string,
    readonly archivePath: string,
    readonly entry?: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = 'ArchiveError';
  }
}

export function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err) {
    return typeof err.code === 'string' ? err.code : undefined;
  }
  return undefined;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
