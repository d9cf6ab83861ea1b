import type { FunctionRecord } from '@finding-lookup/shared';
import type { DbLookup } from './db_lookup';
import { stripQuotes, unqualified } from './names';

/**
 * Functions seen while triaging one finding. By-name lookups only search
 * rows reachable from these, so the list grows as the tool loop explores
 * callers and callees.
 */
export class LookupSession {
  private known: FunctionRecord[] = [];

  constructor(readonly lookup: DbLookup) {}

  knownFunctions(): readonly FunctionRecord[] {
    return this.known;
  }

  remember(fn: FunctionRecord): void {
    const duplicate = this.known.some(
      k => k.function_id === fn.function_id && k.file === fn.file && k.start_line === fn.start_line,
    );
    if (!duplicate) this.known.push(fn);
  }

  latest(): FunctionRecord | undefined {
    return this.known[this.known.length - 1];
  }

  /** Most recently remembered function whose unqualified name is `name`. */
  findKnown(name: string): FunctionRecord | undefined {
    const term = unqualified(name);
    for (let i = this.known.length - 1; i >= 0; i--) {
      if (unqualified(stripQuotes(this.known[i].function_name)) === term) return this.known[i];
    }
    return undefined;
  }

  reset(): void {
    this.known = [];
  }
}
