import type { LookupResult } from '@finding-lookup/shared';

export function found<T>(record: T): LookupResult<T> {
  return { found: true, record };
}

export function notFound<T>(message: string): LookupResult<T> {
  return { found: false, message };
}
