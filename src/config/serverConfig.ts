/**
 * megacli-mcp server configuration.
 * Config file: /etc/megacli-mcp/config.json (auto-created on first run),
 * or the path in MEGACLI_MCP_CONFIG.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { v4 as uuidv4 } from 'uuid';
import { DEFAULT_CLI_PATH, DEFAULT_TIMEOUT_MS } from '../cli/executor.js';
import { isRole, type Role } from '../types/common.js';

const DEFAULT_CONFIG_PATH = '/etc/megacli-mcp/config.json';

export interface ServerConfig {
  host_id: string;
  cli_path: string;
  command_timeout_ms: number;
  audit_log_path: string;
  tokens: Record<string, Role>;
  sse_enabled: boolean;
  sse_port?: number;
}

const DEFAULTS: Omit<ServerConfig, 'host_id'> = {
  cli_path: DEFAULT_CLI_PATH,
  command_timeout_ms: DEFAULT_TIMEOUT_MS,
  audit_log_path: '/var/log/megacli-mcp/audit.jsonl',
  tokens: {},
  sse_enabled: false,
};

let _config: ServerConfig | null = null;

export function configPath(): string {
  return process.env['MEGACLI_MCP_CONFIG'] ?? DEFAULT_CONFIG_PATH;
}

export function loadConfig(): ServerConfig {
  if (_config) return _config;

  const file = configPath();
  let raw: Partial<ServerConfig> = {};

  if (fs.existsSync(file)) {
    try {
      raw = JSON.parse(fs.readFileSync(file, 'utf8')) as Partial<ServerConfig>;
    } catch (err) {
      process.stderr.write(`megacli-mcp: ignoring unreadable config ${file}: ${String(err)}\n`);
    }
  }

  const config: ServerConfig = {
    host_id: raw.host_id ?? uuidv4(),
    cli_path: raw.cli_path ?? DEFAULTS.cli_path,
    command_timeout_ms: raw.command_timeout_ms ?? DEFAULTS.command_timeout_ms,
    audit_log_path: raw.audit_log_path ?? DEFAULTS.audit_log_path,
    tokens: raw.tokens ?? DEFAULTS.tokens,
    sse_enabled: raw.sse_enabled ?? DEFAULTS.sse_enabled,
    ...(raw.sse_port !== undefined ? { sse_port: raw.sse_port } : {}),
  };

  // Persist if we generated a new host_id
  if (!raw.host_id) {
    try {
      const dir = path.dirname(file);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true, mode: 0o750 });
      }
      fs.writeFileSync(file, JSON.stringify(config, null, 2), { mode: 0o640 });
    } catch (err) {
      process.stderr.write(`megacli-mcp: could not persist config to ${file}: ${String(err)}\n`);
    }
  }

  _config = config;
  return config;
}

/** Drop the cached config so the next loadConfig() re-reads the file. */
export function resetConfig(): void {
  _config = null;
}

export function getHostname(): string {
  return os.hostname();
}

/**
 * Resolve role for an API token. Returns null if the token is not configured
 * or maps to something that is not a role.
 */
export function resolveTokenRole(token: string): Role | null {
  const { tokens } = loadConfig();
  if (!Object.hasOwn(tokens, token)) return null;
  const role: unknown = tokens[token];
  return isRole(role) ? role : null;
}

/** Ensure audit log directory exists */
export function ensureAuditLogDir(): void {
  const config = loadConfig();
  const dir = path.dirname(config.audit_log_path);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true, mode: 0o750 });
  }
}
