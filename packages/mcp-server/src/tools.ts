/**
 * Tool layer for the triage loop. Every tool returns plain text: either a
 * numbered snippet of what was found, or the lookup's not-found message,
 * which the loop forwards to the model unchanged.
 */
import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { DbLookup } from './db_lookup';
import { unqualified, unquoteField } from './names';
import type { LookupSession } from './session';
import { formatNumberedSnippet, sliceFunctionLines, type SourceSpan } from './snippet';

export interface ToolText {
  found: boolean;
  text: string;
}

export type ToolOutcome = ({ status: 'ok' } & ToolText) | { status: 'invalid'; message: string };

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: ReturnType<typeof zodToJsonSchema>;
  call(session: LookupSession, args: unknown): ToolOutcome;
}

const FunctionAtLineArgs = z.object({
  file: z.string().min(1).describe('Source file path, or a distinctive suffix of it'),
  line: z.coerce.number().int().positive().describe('1-based line inside the function'),
});

// `ns::` would strip to an empty term and match the first row of a table.
const SymbolName = z
  .string()
  .min(1)
  .refine(name => name === '' || unqualified(name) !== '', { message: 'Name is empty after removing its namespace qualifier' });

const FunctionCodeArgs = z.object({
  function_name: SymbolName.describe('Function name; a namespace qualifier is ignored'),
});

const CallerArgs = z.object({
  function_name: SymbolName.optional().describe(
    'Function already looked up in this session; defaults to the most recent one',
  ),
});

const MacroArgs = z.object({ macro_name: SymbolName });
const GlobalVarArgs = z.object({ global_var_name: SymbolName });
const ClassArgs = z.object({ class_name: SymbolName });

function formatIssues(error: z.ZodError): string {
  return error.issues.map(i => `${i.path.join('.') || 'arguments'}: ${i.message}`).join('; ');
}

// Non-generic: zodToJsonSchema over a generic schema type exceeds the compiler's instantiation depth.
function jsonSchemaOf(schema: z.ZodTypeAny): ReturnType<typeof zodToJsonSchema> {
  return zodToJsonSchema(schema, { $refStrategy: 'none' });
}

function defineTool<S extends z.ZodTypeAny>(
  name: string,
  description: string,
  schema: S,
  run: (session: LookupSession, args: z.infer<S>) => ToolText,
): ToolDefinition {
  return {
    name,
    description,
    inputSchema: jsonSchemaOf(schema),
    call(session, args) {
      const parsed = schema.safeParse(args ?? {});
      if (!parsed.success) return { status: 'invalid', message: formatIssues(parsed.error) };
      return { status: 'ok', ...run(session, parsed.data) };
    },
  };
}

/**
 * Numbered source of `span`, sliced from the whole file the extractor
 * returns.
 */
export function renderSpan(lookup: DbLookup, span: SourceSpan): string {
  const extracted = lookup.extractFunctionLines(span);
  const start = Math.max(1, extracted.startLine);
  return formatNumberedSnippet(extracted.filePath, start, sliceFunctionLines(extracted));
}

function missing(message: string): ToolText {
  return { found: false, text: message };
}

export function get_function_at_line(session: LookupSession, args: z.infer<typeof FunctionAtLineArgs>): ToolText {
  const fn = session.lookup.getFunctionByLine(args.file, args.line);
  if (!fn) return missing(`No function found covering ${args.file}:${args.line}.`);
  session.remember(fn);
  return { found: true, text: `function: ${unquoteField(fn.function_name)}\n${renderSpan(session.lookup, fn)}` };
}

export function get_function_code(session: LookupSession, args: z.infer<typeof FunctionCodeArgs>): ToolText {
  const result = session.lookup.getFunctionByName(args.function_name, session.knownFunctions());
  if (!result.found) return missing(result.message);
  const fn = result.record.function;
  session.remember(fn);
  return {
    found: true,
    text: `function: ${unquoteField(fn.function_name)} (called from ${unquoteField(result.record.via.function_name)})\n${renderSpan(session.lookup, fn)}`,
  };
}

export function get_caller_function(session: LookupSession, args: z.infer<typeof CallerArgs>): ToolText {
  const target = args.function_name ? session.findKnown(args.function_name) : session.latest();
  if (!target) {
    return missing(
      args.function_name
        ? `Function '${args.function_name}' has not been looked up yet. Use get_function_code first.`
        : 'No function has been looked up yet. Use get_function_at_line first.',
    );
  }
  const result = session.lookup.getCallerFunction(target);
  if (!result.found) return missing(result.message);
  session.remember(result.record);
  return {
    found: true,
    text: `caller of ${unquoteField(target.function_name)}: ${unquoteField(result.record.function_name)}\n${renderSpan(session.lookup, result.record)}`,
  };
}

export function get_macro(session: LookupSession, args: z.infer<typeof MacroArgs>): ToolText {
  const result = session.lookup.getMacro(args.macro_name);
  if (!result.found) return missing(result.message);
  return { found: true, text: `macro: ${unquoteField(result.record.macro_name)}\n${unquoteField(result.record.body)}` };
}

export function get_global_var(session: LookupSession, args: z.infer<typeof GlobalVarArgs>): ToolText {
  const result = session.lookup.getGlobalVar(args.global_var_name);
  if (!result.found) return missing(result.message);
  const record = result.record;
  return { found: true, text: `global: ${unquoteField(record.global_var_name)}\n${renderSpan(session.lookup, record)}` };
}

export function get_class(session: LookupSession, args: z.infer<typeof ClassArgs>): ToolText {
  const result = session.lookup.getClass(args.class_name);
  if (!result.found) return missing(result.message);
  const record = result.record;
  return {
    found: true,
    text: `${unquoteField(record.type)}: ${unquoteField(record.class_name)}\n${renderSpan(session.lookup, record)}`,
  };
}

export const TOOLS: readonly ToolDefinition[] = [
  defineTool(
    'get_function_at_line',
    'Source of the function that covers a file and line; start here with the location of a finding',
    FunctionAtLineArgs,
    get_function_at_line,
  ),
  defineTool(
    'get_function_code',
    'Source of a function called from one of the functions already looked up',
    FunctionCodeArgs,
    get_function_code,
  ),
  defineTool('get_caller_function', 'Source of the function that calls a function already looked up', CallerArgs, get_caller_function),
  defineTool('get_macro', 'Definition of a preprocessor macro', MacroArgs, get_macro),
  defineTool('get_global_var', 'Declaration of a global variable', GlobalVarArgs, get_global_var),
  defineTool('get_class', 'Declaration of a class, struct or union', ClassArgs, get_class),
];

export function findTool(name: string): ToolDefinition | undefined {
  return TOOLS.find(t => t.name === name);
}
