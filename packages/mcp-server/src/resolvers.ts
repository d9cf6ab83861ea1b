import type {
  ClassRecord,
  FunctionMatch,
  FunctionRecord,
  GlobalVarRecord,
  LookupResult,
  MacroRecord,
} from '@finding-lookup/shared';
import { parseCsvRow } from './csv_row';
import { MATCH_PASSES, nameMatches, parseLineNumber, unqualified, type MatchMode } from './names';
import { found, notFound } from './results';
import { TABLE_LABELS, scanTableLines } from './row_scanner';
import { CLASS_KEYS, FUNCTION_KEYS, GLOBAL_VAR_KEYS, MACRO_KEYS } from './tables';
import { logger } from './logger';

const log = logger('resolve');

function passesFor(lessStrict: boolean): readonly MatchMode[] {
  return lessStrict ? ['fallback'] : MATCH_PASSES;
}

/**
 * Shared two-pass scan: rows must contain `term` verbatim before they are
 * parsed, then `accept` decides on the parsed row. The first accepted row in
 * file order wins; the fallback pass runs only after a strict miss.
 */
function resolveByName<K extends string>(
  filePath: string,
  label: string,
  keys: readonly K[],
  term: string,
  lessStrict: boolean,
  accept: (row: Record<K, string>, mode: MatchMode) => boolean,
): Record<K, string> | undefined {
  for (const mode of passesFor(lessStrict)) {
    for (const line of scanTableLines(filePath, label)) {
      if (!line.includes(term)) continue;
      const row = parseCsvRow(line, keys);
      if (!row) continue;
      if (accept(row, mode)) {
        log('%s: %s matched in %s pass', label, term, mode);
        return row;
      }
    }
  }
  return undefined;
}

/**
 * Returns the first function whose row mentions `file` and whose line range
 * covers `line`. Rows with empty or non-numeric bounds are skipped.
 */
export function getFunctionByLine(functionTreeFile: string, file: string, line: number): FunctionRecord | undefined {
  for (const raw of scanTableLines(functionTreeFile, TABLE_LABELS.functionTree)) {
    if (!raw.includes(file)) continue;
    const row = parseCsvRow(raw, FUNCTION_KEYS);
    if (!row) continue;
    const start = parseLineNumber(row.start_line);
    const end = parseLineNumber(row.end_line);
    if (start === undefined || end === undefined) continue;
    if (start <= line && line <= end) return row;
  }
  return undefined;
}

/**
 * Finds `functionName` among the rows that reference one of the known
 * functions by id. Every known function is tried in the strict pass before
 * any fallback matching happens.
 */
export function getFunctionByName(
  functionTreeFile: string,
  functionName: string,
  knownFunctions: readonly FunctionRecord[],
  lessStrict = false,
): LookupResult<FunctionMatch> {
  const term = unqualified(functionName);
  for (const mode of passesFor(lessStrict)) {
    for (const known of knownFunctions) {
      for (const line of scanTableLines(functionTreeFile, TABLE_LABELS.functionTree)) {
        if (!line.includes(known.function_id)) continue;
        const row = parseCsvRow(line, FUNCTION_KEYS);
        if (!row) continue;
        if (nameMatches(row.function_name, term, mode)) {
          return found({ function: row, via: known });
        }
      }
    }
  }
  return notFound(`Function '${functionName}' not found. Make sure you're using the correct tool and args.`);
}

export function getMacro(macrosFile: string, macroName: string, lessStrict = false): LookupResult<MacroRecord> {
  const term = unqualified(macroName);
  const row = resolveByName(macrosFile, TABLE_LABELS.macros, MACRO_KEYS, term, lessStrict, (r, mode) =>
    nameMatches(r.macro_name, term, mode),
  );
  if (row) return found(row);
  return notFound(`Macro '${macroName}' not found. Make sure you're using the correct tool with correct args.`);
}

export function getGlobalVar(
  globalVarsFile: string,
  globalVarName: string,
  lessStrict = false,
): LookupResult<GlobalVarRecord> {
  const term = unqualified(globalVarName);
  const row = resolveByName(globalVarsFile, TABLE_LABELS.globalVars, GLOBAL_VAR_KEYS, term, lessStrict, (r, mode) =>
    nameMatches(r.global_var_name, term, mode),
  );
  if (row) return found(row);
  return notFound(`Global var '${globalVarName}' not found. Could it be a macro or should you use another tool?`);
}

/** Matches either the qualified `class_name` or `simple_name` of a row. */
export function getClass(classesFile: string, className: string, lessStrict = false): LookupResult<ClassRecord> {
  const term = unqualified(className);
  const row = resolveByName(
    classesFile,
    TABLE_LABELS.classes,
    CLASS_KEYS,
    term,
    lessStrict,
    (r, mode) => nameMatches(r.class_name, term, mode) || nameMatches(r.simple_name, term, mode),
  );
  if (row) return found(row);
  return notFound(`Class '${className}' not found. Could it be a Namespace?`);
}
