/**
 * Tool registry: maps all MCP tool names to Zod schemas and handlers.
 * Called once at server startup.
 */

import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { McpToolError, type Role, type TransportKind } from '../types/common.js';
import { checkPermission, buildContext } from '../middleware/rbac.js';
import { AuditLogger } from '../middleware/audit.js';
import { loadConfig, resolveTokenRole } from '../config/serverConfig.js';

import { GetServerInfoSchema, handleGetServerInfo } from '../tools/system.js';
import {
  AdapterListSchema, handleAdapterList,
  BbuListSchema, handleBbuList,
  EnclosureListSchema, handleEnclosureList,
} from '../tools/adapter.js';
import { PhysicalDriveListSchema, handlePhysicalDriveList } from '../tools/disk.js';
import {
  LogicalDriveListSchema, handleLogicalDriveList,
  LogicalDriveCreateSchema, handleLogicalDriveCreate,
  LogicalDriveDeleteSchema, handleLogicalDriveDelete,
} from '../tools/raid.js';

// --- Tool definition ---

export interface ToolDef {
  name: string;
  description: string;
  schema: z.ZodTypeAny;
  /** Validates raw arguments against `schema`, then runs the handler */
  handler: (args: unknown) => Promise<unknown>;
}

function defineTool<S extends z.ZodTypeAny>(
  name: string,
  description: string,
  schema: S,
  handler: (params: z.output<S>) => Promise<unknown> | unknown
): ToolDef {
  return {
    name,
    description,
    schema,
    handler: async (args) => handler(schema.parse(args ?? {})),
  };
}

export const TOOLS: ToolDef[] = [
  // System
  defineTool('system.get_server_info', 'Get MCP server info, version, MegaCLI path and supported tool namespaces', GetServerInfoSchema, handleGetServerInfo),

  // Inventory
  defineTool('adapter.list', 'List MegaRAID adapters with firmware, cache, and settings from -AdpAllInfo', AdapterListSchema, handleAdapterList),
  defineTool('bbu.list', 'List battery backup units with charge, temperature, and learn-cycle state', BbuListSchema, handleBbuList),
  defineTool('enclosure.list', 'List enclosures attached to each adapter', EnclosureListSchema, handleEnclosureList),
  defineTool('physical_drive.list', 'List physical drives with enclosure, slot, firmware state, and error counters', PhysicalDriveListSchema, handlePhysicalDriveList),

  // Logical drives
  defineTool('logical_drive.list', 'List logical drives (virtual drives) with RAID level, size, state, and cache policy', LogicalDriveListSchema, handleLogicalDriveList),
  defineTool('logical_drive.create', 'Create a logical drive from unconfigured drives (plan/apply). RAID levels 0, 1, 5, 6.', LogicalDriveCreateSchema, handleLogicalDriveCreate),
  defineTool('logical_drive.delete', 'Delete a logical drive (DESTRUCTIVE, plan/apply, requires dangerous=true)', LogicalDriveDeleteSchema, handleLogicalDriveDelete),
];

export interface ToolCallResult {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

function errorResult(payload: Record<string, unknown>): ToolCallResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(payload) }],
    isError: true,
  };
}

/**
 * Role for a caller. Unknown tokens get viewer. Without a token, only the local
 * stdio transport is trusted as admin; network callers get viewer.
 */
function callerRole(token: string | undefined, transport: TransportKind): Role {
  if (token !== undefined) return resolveTokenRole(token) ?? 'viewer';
  return transport === 'stdio' ? 'admin' : 'viewer';
}

/**
 * Run one tool call: RBAC, input validation, handler, audit.
 * `token` is the bearer token from request metadata.
 */
export async function dispatchToolCall(
  name: string,
  args: unknown,
  token?: string,
  transport: TransportKind = 'stdio'
): Promise<ToolCallResult> {
  const config = loadConfig();

  const tool = TOOLS.find(t => t.name === name);
  if (!tool) {
    return errorResult({ error: 'UNKNOWN_TOOL', message: `Unknown tool: ${name}` });
  }

  // "Bearer " with nothing after it is no token at all
  const bearer = token || undefined;
  const ctx = buildContext(bearer, callerRole(bearer, transport));

  const startMs = Date.now();
  let result: unknown;
  let errorStr: string | undefined;

  try {
    checkPermission(name, ctx);
    result = await tool.handler(args);
    return {
      content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
    };
  } catch (err) {
    if (err instanceof McpToolError) {
      errorStr = err.message;
      return errorResult({ error: err.code, message: err.message, details: err.details });
    }
    if (err instanceof z.ZodError) {
      errorStr = err.message;
      return errorResult({ error: 'INVALID_ARGUMENT', message: 'Invalid tool arguments', details: err.issues });
    }
    errorStr = err instanceof Error ? err.message : String(err);
    return errorResult({ error: 'INTERNAL', message: errorStr });
  } finally {
    AuditLogger.log({
      request_id: ctx.request_id,
      principal: ctx.principal,
      timestamp: ctx.timestamp,
      host_id: config.host_id,
      tool_name: name,
      parameters_hash: AuditLogger.hashParams(args),
      result_hash: AuditLogger.hashResult(errorStr ?? result),
      duration_ms: Date.now() - startMs,
      ...(errorStr ? { error: errorStr } : {}),
    });
  }
}

export function registerAllTools(server: Server, transport: TransportKind): void {
  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: TOOLS.map(t => ({
      name: t.name,
      description: t.description,
      inputSchema: { ...zodToJsonSchema(t.schema, { target: 'jsonSchema7' }), type: 'object' as const },
    })),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args, _meta } = request.params;
    const authorization = _meta?.['authorization'];
    const token = typeof authorization === 'string' ? authorization.replace(/^Bearer /, '') : undefined;
    return dispatchToolCall(name, args, token, transport);
  });
}
