/**
 * Shared types used across all megacli-mcp layers.
 */

export const ErrorCode = {
  INVALID_ARGUMENT: 'INVALID_ARGUMENT',
  NOT_FOUND: 'NOT_FOUND',
  PRECONDITION_FAILED: 'PRECONDITION_FAILED',
  PERMISSION_DENIED: 'PERMISSION_DENIED',
  CONFLICT: 'CONFLICT',
  TIMEOUT: 'TIMEOUT',
  UNSUPPORTED: 'UNSUPPORTED',
  INTERNAL: 'INTERNAL',
  COMMAND_FAILED: 'COMMAND_FAILED',
} as const;
export type ErrorCode = typeof ErrorCode[keyof typeof ErrorCode];

export class McpToolError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'McpToolError';
  }
}

/**
 * MegaCLI exited with a non-zero status.
 */
export class CommandError extends McpToolError {
  constructor(
    public readonly exitCode: number,
    public readonly stderr: string
  ) {
    super(
      ErrorCode.COMMAND_FAILED,
      stderr || `MegaCLI exited with code ${exitCode}`,
      { exit_code: exitCode, stderr }
    );
    this.name = 'CommandError';
  }
}

export const ROLES = ['viewer', 'operator', 'admin'] as const;
export type Role = typeof ROLES[number];

export function isRole(value: unknown): value is Role {
  return typeof value === 'string' && ROLES.some(role => role === value);
}
export type Mode = 'plan' | 'apply';
export type TransportKind = 'stdio' | 'sse';

export interface PlanChange {
  action: 'create' | 'modify' | 'delete' | 'no-op';
  resource_type: string;
  resource_id: string;
  before?: unknown;
  after?: unknown;
}

export interface PlanResult {
  mode: 'plan';
  description: string;
  /** Command line that apply would run */
  command?: string;
  changes: PlanChange[];
  warnings: string[];
  preflight_passed: boolean;
  blocking_resources?: string[];
}

export interface CallContext {
  request_id: string;
  principal: string;
  role: Role;
  timestamp: string;
}
