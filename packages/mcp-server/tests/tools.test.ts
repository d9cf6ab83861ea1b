import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { DbLookup } from '../src/db_lookup';
import { ArchiveError } from '../src/errors';
import { LookupSession } from '../src/session';
import {
  TOOLS,
  findTool,
  get_caller_function,
  get_class,
  get_function_at_line,
  get_function_code,
  get_global_var,
  get_macro,
} from '../src/tools';
import { createFixtureDb, removeDir } from './fixtures';

const MAIN_SNIPPET = [
  'file: src/main.c',
  '2: int main(void) {',
  '3:   struct packet p = {0};',
  '4:   if (parse_packet(&p) < 0)',
  '5:     return handle_request(&p);',
  '6:   return send_all(&p);',
  '7: }',
].join('\n');

const PARSE_SNIPPET = [
  'file: src/net.c',
  '1: int parse_packet(struct packet *p) {',
  '2:   if (!p) return -1;',
  '3:   int rc = read_header(p);',
  '4:   return rc;',
  '5: }',
].join('\n');

describe('lookup tools', () => {
  let dir: string;
  let session: LookupSession;

  beforeEach(() => {
    dir = createFixtureDb();
    session = new LookupSession(new DbLookup(dir));
  });

  afterEach(() => removeDir(dir));

  it('shows the function covering a location', () => {
    const out = get_function_at_line(session, { file: 'server.c', line: 3 });
    expect(out).toEqual({
      found: true,
      text: [
        'function: handle_request',
        'file: src/server.c',
        '1: int handle_request(struct packet *p) {',
        '2:   log_error(p);',
        '3:   return -1;',
        '4: }',
      ].join('\n'),
    });
    expect(session.knownFunctions()).toHaveLength(1);
  });

  it('explains when no function covers a location', () => {
    expect(get_function_at_line(session, { file: 'net.c', line: 40 })).toEqual({
      found: false,
      text: 'No function found covering net.c:40.',
    });
    expect(session.knownFunctions()).toHaveLength(0);
  });

  it('walks from a finding to its caller', () => {
    get_function_at_line(session, { file: 'server.c', line: 3 });
    expect(get_caller_function(session, {})).toEqual({
      found: true,
      text: `caller of handle_request: main\n${MAIN_SNIPPET}`,
    });
    expect(session.latest()?.function_name).toBe('"main"');
  });

  it('walks from a function to its callees', () => {
    get_function_at_line(session, { file: 'main.c', line: 4 });
    expect(get_function_code(session, { function_name: 'parse_packet' })).toEqual({
      found: true,
      text: `function: parse_packet (called from main)\n${PARSE_SNIPPET}`,
    });
    const next = get_function_code(session, { function_name: 'read_header' });
    expect(next.text.split('\n')[0]).toBe('function: read_header (called from parse_packet)');
  });

  it('only finds callees of functions already looked up', () => {
    const out = get_function_code(session, { function_name: 'parse_packet' });
    expect(out).toEqual({
      found: false,
      text: "Function 'parse_packet' not found. Make sure you're using the correct tool and args.",
    });
  });

  it('finds the caller of a named function from the session', () => {
    get_function_at_line(session, { file: 'main.c', line: 4 });
    get_function_code(session, { function_name: 'parse_packet' });
    get_function_at_line(session, { file: 'server.c', line: 1 });
    const out = get_caller_function(session, { function_name: 'parse_packet' });
    expect(out.text).toBe(`caller of parse_packet: main\n${MAIN_SNIPPET}`);
  });

  it('asks for a lookup before resolving callers', () => {
    expect(get_caller_function(session, {})).toEqual({
      found: false,
      text: 'No function has been looked up yet. Use get_function_at_line first.',
    });
    expect(get_caller_function(session, { function_name: 'main' })).toEqual({
      found: false,
      text: "Function 'main' has not been looked up yet. Use get_function_code first.",
    });
  });

  it('forwards the missing-caller message', () => {
    get_function_at_line(session, { file: 'main.c', line: 2 });
    expect(get_caller_function(session, {}).text).toBe(
      'Caller function was not found. Make sure you are using the correct tool with the correct args.',
    );
  });

  it('shows macro bodies without their quotes', () => {
    expect(get_macro(session, { macro_name: 'MAX_LEN' })).toEqual({ found: true, text: 'macro: MAX_LEN\n512' });
    expect(get_macro(session, { macro_name: 'WRAP' }).text).toBe('macro: ns::WRAP\ndo { f(x); } while (0)');
  });

  it('shows the declaration of a global', () => {
    expect(get_global_var(session, { global_var_name: 'g_port' })).toEqual({
      found: true,
      text: 'global: server::g_port\nfile: src/config.c\n3: int g_port = 8080;',
    });
  });

  it('shows a class with its declaration kind', () => {
    expect(get_class(session, { class_name: 'net::packet' }).text).toBe(
      [
        'struct: net::packet',
        'file: src/net.h',
        '2: struct packet {',
        '3:   int fd;',
        '4:   char *buf;',
        '5:   int len;',
        '6: };',
      ].join('\n'),
    );
    expect(get_class(session, { class_name: 'Client' }).found).toBe(false);
  });

  it('raises archive failures instead of returning text', () => {
    expect(() => get_class(session, { class_name: 'Server' })).toThrow(ArchiveError);
  });
});

describe('tool definitions', () => {
  let dir: string;
  let session: LookupSession;

  beforeEach(() => {
    dir = createFixtureDb();
    session = new LookupSession(new DbLookup(dir));
  });

  afterEach(() => removeDir(dir));

  it('lists every lookup tool in order', () => {
    expect(TOOLS.map(t => t.name)).toEqual([
      'get_function_at_line',
      'get_function_code',
      'get_caller_function',
      'get_macro',
      'get_global_var',
      'get_class',
    ]);
    expect(findTool('get_macro')?.name).toBe('get_macro');
    expect(findTool('search_code')).toBeUndefined();
  });

  it('publishes JSON schemas for the arguments', () => {
    expect(findTool('get_function_at_line')?.inputSchema).toMatchObject({
      type: 'object',
      required: ['file', 'line'],
    });
    expect(findTool('get_caller_function')?.inputSchema).toMatchObject({ type: 'object' });
    expect(findTool('get_macro')?.inputSchema).toMatchObject({
      type: 'object',
      properties: { macro_name: { type: 'string', minLength: 1 } },
      required: ['macro_name'],
    });
  });

  it('rejects names that are only a namespace qualifier', () => {
    const message = 'Name is empty after removing its namespace qualifier';
    expect(findTool('get_macro')?.call(session, { macro_name: 'ns::' })).toEqual({
      status: 'invalid',
      message: `macro_name: ${message}`,
    });
    expect(findTool('get_caller_function')?.call(session, { function_name: 'app::' })).toEqual({
      status: 'invalid',
      message: `function_name: ${message}`,
    });
    expect(findTool('get_class')?.call(session, { class_name: '' })).toEqual({
      status: 'invalid',
      message: 'class_name: String must contain at least 1 character(s)',
    });
  });

  it('validates and coerces arguments', () => {
    const tool = findTool('get_function_at_line');
    expect(tool?.call(session, { file: 'net.c', line: '12' })).toMatchObject({ status: 'ok', found: true });
    expect(tool?.call(session, { file: '', line: 0 })).toEqual({
      status: 'invalid',
      message: 'file: String must contain at least 1 character(s); line: Number must be greater than 0',
    });
  });

  it('treats missing arguments as an empty object', () => {
    expect(findTool('get_caller_function')?.call(session, undefined)).toEqual({
      status: 'ok',
      found: false,
      text: 'No function has been looked up yet. Use get_function_at_line first.',
    });
  });
});
