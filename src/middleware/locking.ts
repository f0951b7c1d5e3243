/**
 * Per-adapter async mutex. MegaCLI configuration commands against one adapter
 * must not interleave; a second caller is rejected rather than queued.
 */

import { McpToolError, ErrorCode } from '../types/common.js';

export class AdapterLockManager {
  private readonly owners = new Map<number, string>();

  async withLock<T>(adapter: number, toolName: string, fn: () => Promise<T>): Promise<T> {
    const owner = this.owners.get(adapter);
    if (owner !== undefined) {
      throw new McpToolError(
        ErrorCode.CONFLICT,
        `Adapter ${adapter} is currently locked by '${owner}'. Try again after it completes.`
      );
    }

    this.owners.set(adapter, toolName);
    try {
      return await fn();
    } finally {
      this.owners.delete(adapter);
    }
  }

  isLocked(adapter: number): boolean {
    return this.owners.has(adapter);
  }

  lockedBy(adapter: number): string | null {
    return this.owners.get(adapter) ?? null;
  }
}

// Singleton instance
export const adapterLocks = new AdapterLockManager();
