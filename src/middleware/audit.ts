/**
 * Audit logger.
 * Appends tamper-evident (hash-chained) JSON lines to audit log file.
 * Also writes to syslog via /dev/log Unix socket.
 */

import * as fs from 'fs';
import * as crypto from 'crypto';
import * as net from 'net';
import { loadConfig, ensureAuditLogDir } from '../config/serverConfig.js';

export interface AuditEntry {
  request_id: string;
  principal: string;
  timestamp: string;
  host_id: string;
  tool_name: string;
  parameters_hash: string;
  result_hash: string;
  duration_ms: number;
  error?: string;
  prev_hash: string;
}

function sha256(data: string): string {
  return crypto.createHash('sha256').update(data).digest('hex');
}

function hashObject(obj: unknown): string {
  return sha256(JSON.stringify(obj) ?? 'undefined');
}

const GENESIS_HASH = '0'.repeat(64);
let lastHash = GENESIS_HASH;

function writeSyslog(message: string): void {
  // PRI = facility(1=user) * 8 + severity(6=info) = 14
  const buf = Buffer.from(`<14>megacli-mcp: ${message}`);
  const conn = net.createConnection('/dev/log');
  conn.on('connect', () => { conn.write(buf); conn.end(); });
  // No syslog daemon on this host; the audit file is the record of truth
  conn.on('error', () => conn.destroy());
}

export class AuditLogger {
  static log(entry: Omit<AuditEntry, 'prev_hash'>): AuditEntry {
    const config = loadConfig();

    const fullEntry: AuditEntry = {
      ...entry,
      prev_hash: lastHash,
    };

    const line = JSON.stringify(fullEntry) + '\n';
    lastHash = sha256(line);

    try {
      ensureAuditLogDir();
      fs.appendFileSync(config.audit_log_path, line, { mode: 0o640 });
    } catch (err) {
      process.stderr.write(`megacli-mcp: audit write to ${config.audit_log_path} failed: ${String(err)}\n`);
    }

    const syslogMsg = `${entry.tool_name} by ${entry.principal} [${entry.request_id}] ${entry.error ? `ERROR: ${entry.error}` : 'OK'} (${entry.duration_ms}ms)`;
    writeSyslog(syslogMsg);

    return fullEntry;
  }

  static hashParams(params: unknown): string {
    return hashObject(params);
  }

  static hashResult(result: unknown): string {
    return hashObject(result);
  }

  /** Hash of the last written line; the next entry's prev_hash. */
  static head(): string {
    return lastHash;
  }

  /** Verify a sequence of audit lines links up from the genesis hash. */
  static verifyChain(lines: readonly string[]): boolean {
    let expected = GENESIS_HASH;
    for (const line of lines) {
      let entry: Partial<AuditEntry>;
      try {
        entry = JSON.parse(line);
      } catch {
        return false;
      }
      if (entry.prev_hash !== expected) return false;
      expected = sha256(line + '\n');
    }
    return true;
  }
}
