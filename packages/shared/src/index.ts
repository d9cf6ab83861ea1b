/**
 * Record shapes read from the static-analysis tables. Every field holds the
 * raw column text exactly as it appears in the row, quote characters
 * included, so callers can forward records without losing information.
 */

/**
 * A row of FunctionTree.csv. `caller_id` references another row's
 * `function_id`, or encodes a `"<file>:<line>` location when the caller has
 * no id of its own.
 */
export interface FunctionRecord {
  function_name: string;
  file: string;
  start_line: string;
  function_id: string;
  end_line: string;
  caller_id: string;
}

export interface MacroRecord {
  macro_name: string;
  body: string;
}

export interface GlobalVarRecord {
  global_var_name: string;
  file: string;
  start_line: string;
  end_line: string;
}

/**
 * A row of Classes.csv. `type` is the declaration kind (class, struct,
 * union, ...); `simple_name` is `class_name` without its qualifier.
 */
export interface ClassRecord {
  type: string;
  class_name: string;
  file: string;
  start_line: string;
  end_line: string;
  simple_name: string;
}

export type LookupResult<T> =
  | { found: true; record: T }
  | { found: false; message: string };

/**
 * Result of a by-name function lookup: the matched row and the already
 * known function whose id led to it.
 */
export interface FunctionMatch {
  function: FunctionRecord;
  via: FunctionRecord;
}

/**
 * Source of a resolved function. `lines` holds the whole file; slicing to
 * `[startLine, endLine]` is up to the caller.
 */
export interface ExtractedFunction {
  filePath: string;
  startLine: number;
  endLine: number;
  lines: string[];
}
