/**
 * Plan/Apply execution pattern for configuration changes.
 * mode='plan': run preflight only, return PlanResult
 * mode='apply': run preflight, throw if failed, run execute, return result
 */

import { McpToolError, ErrorCode, type Mode, type PlanResult } from '../types/common.js';

export interface PlanContext<T> {
  /** Describe what would happen without touching the controller */
  preflight: () => Promise<PlanResult>;
  /** Run the MegaCLI command */
  execute: (plan: PlanResult) => Promise<T>;
}

export interface ApplyResult<T> {
  mode: 'apply';
  command?: string;
  warnings: string[];
  result: T;
}

export async function applyWithPlan<T>(
  mode: Mode,
  ctx: PlanContext<T>
): Promise<PlanResult | ApplyResult<T>> {
  const plan = await ctx.preflight();

  if (mode === 'plan') {
    return plan;
  }

  if (!plan.preflight_passed) {
    throw new McpToolError(
      ErrorCode.PRECONDITION_FAILED,
      `Preflight checks failed. Blocking resources: ${plan.blocking_resources?.join(', ') ?? 'unknown'}`,
      { plan }
    );
  }

  const result = await ctx.execute(plan);
  return {
    mode: 'apply',
    ...(plan.command !== undefined ? { command: plan.command } : {}),
    warnings: plan.warnings,
    result,
  };
}
