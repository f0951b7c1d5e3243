/**
 * system.* MCP tools.
 */

import { z } from 'zod';
import { loadConfig, getHostname } from '../config/serverConfig.js';

export const SERVER_NAME = 'megacli-mcp';
export const SERVER_VERSION = '0.1.0';

// --- Schemas ---

export const GetServerInfoSchema = z.object({});

// --- Handlers ---

export function handleGetServerInfo(_params: z.infer<typeof GetServerInfoSchema>) {
  const config = loadConfig();
  return {
    name: SERVER_NAME,
    version: SERVER_VERSION,
    host_id: config.host_id,
    hostname: getHostname(),
    cli_path: config.cli_path,
    supported_namespaces: ['system', 'adapter', 'bbu', 'enclosure', 'physical_drive', 'logical_drive'],
    transport: config.sse_enabled ? 'sse' : 'stdio',
  };
}
