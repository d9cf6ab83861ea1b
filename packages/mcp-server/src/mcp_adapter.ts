#!/usr/bin/env node
/**
 * Minimal MCP adapter implementing a subset of the Model Context Protocol
 * over stdio using JSON-RPC 2.0. Exposes the lookups via tools/list and
 * tools/call for one analysis database (LOOKUP_DB_PATH).
 */
import readline from 'readline';
import { z } from 'zod';
import { loadConfig } from './config';
import { DbLookup } from './db_lookup';
import { LookupError, errorMessage } from './errors';
import { logger, saveLogsToFile } from './logger';
import { LookupSession } from './session';
import { configureTelemetry, startTimer } from './telemetry';
import { TOOLS, findTool } from './tools';

const log = logger('adapter');

export const SERVER_INFO = { name: 'finding-lookup', version: '0.1.0' } as const;
export const PROTOCOL_VERSION = '2024-11-05';

export const RPC_ERRORS = {
  parse: -32700,
  invalidRequest: -32600,
  methodNotFound: -32601,
  invalidParams: -32602,
  lookupFailed: -32000,
} as const;

const RequestId = z.union([z.string(), z.number(), z.null()]);

const RpcRequestSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: RequestId.optional(),
  method: z.string().min(1),
  params: z.unknown().optional(),
});

const ToolCallParams = z.object({
  name: z.string(),
  arguments: z.unknown().optional(),
});

export type RpcRequest = z.infer<typeof RpcRequestSchema>;
type RpcId = z.infer<typeof RequestId>;

export type RpcResponse =
  | { jsonrpc: '2.0'; id: RpcId; result: unknown }
  | { jsonrpc: '2.0'; id: RpcId; error: { code: number; message: string; data?: unknown } };

export interface Adapter {
  handle(req: RpcRequest): RpcResponse | undefined;
  handleLine(line: string): RpcResponse | undefined;
}

/**
 * Request handler for one session. `onShutdown` runs after a `shutdown`
 * request has been answered.
 */
export function createAdapter(session: LookupSession, onShutdown?: () => void): Adapter {
  const ok = (id: RpcId, result: unknown): RpcResponse => ({ jsonrpc: '2.0', id, result });
  const err = (id: RpcId, code: number, message: string, data?: unknown): RpcResponse => ({
    jsonrpc: '2.0',
    id,
    error: data === undefined ? { code, message } : { code, message, data },
  });

  function callTool(id: RpcId, params: unknown): RpcResponse {
    const parsed = ToolCallParams.safeParse(params);
    if (!parsed.success) return err(id, RPC_ERRORS.invalidParams, 'tools/call needs a tool name');
    const tool = findTool(parsed.data.name);
    if (!tool) return err(id, RPC_ERRORS.methodNotFound, 'Tool not found', { name: parsed.data.name });

    const stop = startTimer(tool.name, { source: 'mcp:tools' });
    try {
      const outcome = tool.call(session, parsed.data.arguments);
      if (outcome.status === 'invalid') {
        stop({ outcome: 'invalid' });
        return err(id, RPC_ERRORS.invalidParams, outcome.message, { tool: tool.name });
      }
      stop({ outcome: outcome.found ? 'found' : 'not_found' });
      return ok(id, { content: [{ type: 'text', text: outcome.text }] });
    } catch (e) {
      stop({ outcome: 'error' });
      if (!(e instanceof LookupError)) throw e;
      log('%s failed: %s', tool.name, e.message);
      return err(id, RPC_ERRORS.lookupFailed, e.message, { tool: tool.name });
    }
  }

  function handle(req: RpcRequest): RpcResponse | undefined {
    // Notifications get no response.
    if (req.id === undefined) return undefined;
    const id = req.id;
    try {
      switch (req.method) {
        case 'initialize':
          return ok(id, {
            protocolVersion: PROTOCOL_VERSION,
            capabilities: { tools: {} },
            serverInfo: SERVER_INFO,
          });
        case 'ping':
          return ok(id, {});
        case 'tools/list':
          return ok(id, {
            tools: TOOLS.map(t => ({ name: t.name, description: t.description, inputSchema: t.inputSchema })),
          });
        case 'tools/call':
          return callTool(id, req.params);
        case 'session/reset':
          session.reset();
          return ok(id, {});
        case 'shutdown':
          session.reset();
          if (onShutdown) setImmediate(onShutdown);
          return ok(id, {});
        default:
          return err(id, RPC_ERRORS.methodNotFound, 'Method not found', { method: req.method });
      }
    } catch (e) {
      log('internal error on %s: %O', req.method, e);
      return err(id, RPC_ERRORS.lookupFailed, errorMessage(e) || 'Internal error');
    }
  }

  function handleLine(line: string): RpcResponse | undefined {
    const s = line.trim();
    if (!s) return undefined;
    let payload: unknown;
    try {
      payload = JSON.parse(s);
    } catch {
      return err(null, RPC_ERRORS.parse, 'Parse error');
    }
    const req = RpcRequestSchema.safeParse(payload);
    if (!req.success) return err(null, RPC_ERRORS.invalidRequest, 'Invalid request');
    return handle(req.data);
  }

  return { handle, handleLine };
}

function main() {
  // stdout carries the protocol.
  if (process.env.LOOKUP_STDOUT_LOGS !== '1') {
    const passThrough = (stream: 'log' | 'info' | 'warn') => (...args: unknown[]) => console.error(`[${stream}]`, ...args);
    console.log = passThrough('log');
    console.info = passThrough('info');
    console.warn = passThrough('warn');
  }
  if (process.env.LOOKUP_LOG_FILE) saveLogsToFile(process.env.LOOKUP_LOG_FILE);

  const dbPath = process.env.LOOKUP_DB_PATH;
  if (!dbPath) {
    console.error('LOOKUP_DB_PATH must point at an analysis database directory');
    process.exit(2);
  }
  const config = loadConfig();
  configureTelemetry(config.telemetry);
  const rl = readline.createInterface({ input: process.stdin, terminal: false });
  const adapter = createAdapter(new LookupSession(new DbLookup(dbPath, config)), () => rl.close());
  log('serving %s', dbPath);

  rl.on('line', line => {
    const response = adapter.handleLine(line);
    if (response) process.stdout.write(JSON.stringify(response) + '\n');
  });
  rl.on('close', () => process.exit(0));
  process.on('SIGINT', () => process.exit(0));
}

if (require.main === module) {
  main();
}
