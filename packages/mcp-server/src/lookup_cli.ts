#!/usr/bin/env node
import { loadConfig } from './config';
import { DbLookup } from './db_lookup';
import { LookupError } from './errors';
import { LookupSession } from './session';
import {
  get_caller_function,
  get_class,
  get_function_at_line,
  get_function_code,
  get_global_var,
  get_macro,
  type ToolText,
} from './tools';

export const USAGE = `usage: finding-lookup <command> <db> [args...]
  line <file> <line>               function covering a location
  function <name> <file> <line>    function called from the one covering a location
  caller <file> <line>             caller of the function covering a location
  macro <name>
  global <name>
  class <name>`;

export class UsageError extends Error {}

function lineArg(value: string | undefined): number {
  const line = Number(value);
  if (!Number.isInteger(line) || line < 1) throw new UsageError(`invalid line number: ${value ?? ''}`);
  return line;
}

function requireArgs(args: string[], count: number): void {
  if (args.length < count) throw new UsageError(USAGE);
}

/**
 * Runs one lookup and returns the text a tool call would produce. Commands
 * that need a starting function seed the session from `<file> <line>`.
 */
export function runCommand(session: LookupSession, command: string, args: string[]): ToolText {
  switch (command) {
    case 'line':
      requireArgs(args, 2);
      return get_function_at_line(session, { file: args[0], line: lineArg(args[1]) });
    case 'function': {
      requireArgs(args, 3);
      const start = get_function_at_line(session, { file: args[1], line: lineArg(args[2]) });
      if (!start.found) return start;
      return get_function_code(session, { function_name: args[0] });
    }
    case 'caller': {
      requireArgs(args, 2);
      const start = get_function_at_line(session, { file: args[0], line: lineArg(args[1]) });
      if (!start.found) return start;
      return get_caller_function(session, {});
    }
    case 'macro':
      requireArgs(args, 1);
      return get_macro(session, { macro_name: args[0] });
    case 'global':
      requireArgs(args, 1);
      return get_global_var(session, { global_var_name: args[0] });
    case 'class':
      requireArgs(args, 1);
      return get_class(session, { class_name: args[0] });
    default:
      throw new UsageError(USAGE);
  }
}

function main(argv: string[]): number {
  const [command, db, ...rest] = argv;
  if (!command || !db) {
    console.error(USAGE);
    return 2;
  }
  const session = new LookupSession(new DbLookup(db, loadConfig()));
  try {
    const out = runCommand(session, command, rest);
    console.log(out.text);
    return out.found ? 0 : 1;
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(err.message);
      return 2;
    }
    if (err instanceof LookupError) {
      console.error(err.message);
      return 1;
    }
    throw err;
  }
}

if (require.main === module) {
  process.exitCode = main(process.argv.slice(2));
}
