/**
 * Lookups bound to one analysis database directory. Each call scans the
 * relevant table from disk; nothing is cached between calls.
 */
import path from 'path';
import type {
  ClassRecord,
  ExtractedFunction,
  FunctionMatch,
  FunctionRecord,
  GlobalVarRecord,
  LookupResult,
  MacroRecord,
} from '@finding-lookup/shared';
import { defaults, type AppConfig } from './config';
import { getCallerFunction } from './caller_chain';
import { getClass, getFunctionByLine, getFunctionByName, getGlobalVar, getMacro } from './resolvers';
import { extractFunctionLines, type SourceSpan } from './snippet';

export class DbLookup {
  readonly dbPath: string;
  private config: AppConfig;

  constructor(dbPath: string, config: AppConfig = defaults()) {
    this.dbPath = path.resolve(dbPath);
    this.config = config;
  }

  tablePath(table: keyof AppConfig['tables']): string {
    return path.join(this.dbPath, this.config.tables[table]);
  }

  getFunctionByLine(file: string, line: number): FunctionRecord | undefined {
    return getFunctionByLine(this.tablePath('functionTree'), file, line);
  }

  getFunctionByName(
    functionName: string,
    knownFunctions: readonly FunctionRecord[],
    lessStrict = false,
  ): LookupResult<FunctionMatch> {
    return getFunctionByName(this.tablePath('functionTree'), functionName, knownFunctions, lessStrict);
  }

  getMacro(macroName: string, lessStrict = false): LookupResult<MacroRecord> {
    return getMacro(this.tablePath('macros'), macroName, lessStrict);
  }

  getGlobalVar(globalVarName: string, lessStrict = false): LookupResult<GlobalVarRecord> {
    return getGlobalVar(this.tablePath('globalVars'), globalVarName, lessStrict);
  }

  getClass(className: string, lessStrict = false): LookupResult<ClassRecord> {
    return getClass(this.tablePath('classes'), className, lessStrict);
  }

  getCallerFunction(fn: FunctionRecord): LookupResult<FunctionRecord> {
    return getCallerFunction(this.tablePath('functionTree'), fn);
  }

  extractFunctionLines(fn: SourceSpan): ExtractedFunction {
    return extractFunctionLines(this.dbPath, fn, this.config.archive);
  }
}

export { getCallerFunction, decodeCallerLocation, CALLER_NOT_FOUND } from './caller_chain';
export { getClass, getFunctionByLine, getFunctionByName, getGlobalVar, getMacro } from './resolvers';
export { extractFunctionLines, formatNumberedSnippet, sliceFunctionLines, type SourceSpan } from './snippet';
export { scanTableLines } from './row_scanner';
export { parseCsvRow } from './csv_row';
export { ArchiveError, LookupError, TableAccessError } from './errors';
