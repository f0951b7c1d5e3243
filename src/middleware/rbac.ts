/**
 * Role-Based Access Control.
 * Defines minimum required role per tool and enforces at call time.
 */

import { v4 as uuidv4 } from 'uuid';
import { McpToolError, ErrorCode, type Role, type CallContext } from '../types/common.js';

const ROLE_RANK: Record<Role, number> = {
  viewer: 0,
  operator: 1,
  admin: 2,
};

/** Minimum role required per tool name. Defaults to 'admin' if not listed. */
const TOOL_PERMISSIONS: Record<string, Role> = {
  'system.get_server_info': 'viewer',
  'adapter.list': 'viewer',
  'bbu.list': 'viewer',
  'enclosure.list': 'viewer',
  'physical_drive.list': 'viewer',
  'logical_drive.list': 'viewer',

  // Controller configuration changes
  'logical_drive.create': 'admin',
  'logical_drive.delete': 'admin',
};

export function requiredRole(toolName: string): Role {
  return TOOL_PERMISSIONS[toolName] ?? 'admin';
}

/**
 * Check if the principal in ctx has permission to call toolName.
 * Throws McpToolError(PERMISSION_DENIED) if insufficient role.
 */
export function checkPermission(toolName: string, ctx: CallContext): void {
  const required = requiredRole(toolName);

  const rank = Object.hasOwn(ROLE_RANK, ctx.role) ? ROLE_RANK[ctx.role] : undefined;
  if (rank === undefined || rank < ROLE_RANK[required]) {
    throw new McpToolError(
      ErrorCode.PERMISSION_DENIED,
      `Tool '${toolName}' requires role '${required}'. Principal '${ctx.principal}' has role '${ctx.role}'.`
    );
  }
}

/** Build a CallContext for a request. Uses 'local' principal if no token. */
export function buildContext(token: string | undefined, role: Role): CallContext {
  return {
    request_id: uuidv4(),
    principal: token ?? 'local',
    role,
    timestamp: new Date().toISOString(),
  };
}
