/**
 * MCP Server instance.
 * Supports stdio transport (primary) and SSE transport (secondary).
 */

import * as http from 'http';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { SSEServerTransport } from '@modelcontextprotocol/sdk/server/sse.js';
import { loadConfig } from '../config/serverConfig.js';
import { registerAllTools } from '../registry/toolRegistry.js';
import { SERVER_NAME, SERVER_VERSION } from '../tools/system.js';
import type { TransportKind } from '../types/common.js';

const DEFAULT_SSE_PORT = 8080;

export function createMcpServer(transport: TransportKind = 'stdio'): Server {
  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} } }
  );
  registerAllTools(server, transport);
  return server;
}

/**
 * One MCP session per SSE connection: GET /sse opens it, POST /messages?sessionId=… feeds it.
 */
function startSseServer(port: number): http.Server {
  const sessions = new Map<string, SSEServerTransport>();

  const httpServer = http.createServer((req, res) => {
    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);

    if (req.method === 'GET' && url.pathname === '/sse') {
      const transport = new SSEServerTransport('/messages', res);
      sessions.set(transport.sessionId, transport);
      res.on('close', () => sessions.delete(transport.sessionId));
      createMcpServer('sse').connect(transport).catch((err: unknown) => {
        process.stderr.write(`megacli-mcp: SSE session ${transport.sessionId} failed: ${String(err)}\n`);
      });
      return;
    }

    if (req.method === 'POST' && url.pathname === '/messages') {
      const transport = sessions.get(url.searchParams.get('sessionId') ?? '');
      if (!transport) {
        res.writeHead(404).end('Unknown session');
        return;
      }
      transport.handlePostMessage(req, res).catch((err: unknown) => {
        process.stderr.write(`megacli-mcp: SSE message rejected: ${String(err)}\n`);
      });
      return;
    }

    res.writeHead(404).end();
  });

  httpServer.listen(port, () => {
    process.stderr.write(`megacli-mcp SSE transport listening on :${port}\n`);
  });
  return httpServer;
}

export async function startMcpServer(): Promise<void> {
  const config = loadConfig();

  if (config.sse_enabled) {
    startSseServer(config.sse_port ?? DEFAULT_SSE_PORT);
    return;
  }

  const server = createMcpServer();
  await server.connect(new StdioServerTransport());
  process.stderr.write(`megacli-mcp stdio transport started (host: ${config.host_id}, cli: ${config.cli_path})\n`);
}
