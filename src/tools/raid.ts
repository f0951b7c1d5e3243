/**
 * logical_drive.* MCP tools.
 */

import { z } from 'zod';
import { getMegaCli } from '../megacli/MegaCli.js';
import {
  CreateLogicalDriveSchema,
  RemoveLogicalDriveSchema,
  buildCreateLogicalDriveArgs,
  buildRemoveLogicalDriveArgs,
} from '../megacli/commands.js';
import { formatCommand } from '../cli/output.js';
import { adapterLocks } from '../middleware/locking.js';
import { applyWithPlan } from '../middleware/planApply.js';
import { filterByAdapter } from './adapter.js';
import { deviceAddress, isUnconfiguredGood } from './disk.js';
import type { Mode, PlanResult } from '../types/common.js';
import type { LogicalDrive, PhysicalDrive } from '../types/megacli.js';

// --- Schemas ---

export const LogicalDriveListSchema = z.object({
  adapter_id: z.number().int().min(0).optional().describe('Only report drives on this adapter'),
});

export const LogicalDriveCreateSchema = CreateLogicalDriveSchema.extend({
  mode: z.enum(['plan', 'apply']).default('plan'),
});

export const LogicalDriveDeleteSchema = RemoveLogicalDriveSchema.extend({
  mode: z.enum(['plan', 'apply']).default('plan'),
  dangerous: z.boolean().default(false).describe('Must be true to apply deletion'),
});

// --- Min drive counts per RAID level ---
const MIN_DRIVES: Record<number, number> = { 0: 1, 1: 2, 5: 3, 6: 3 };

// --- Preflight checks ---

export function checkCreate(
  params: z.infer<typeof LogicalDriveCreateSchema>,
  physicalDrives: PhysicalDrive[]
): Pick<PlanResult, 'warnings' | 'blocking_resources'> {
  const warnings: string[] = [];
  const blocking: string[] = [];

  const minDrives = MIN_DRIVES[params.raid_level] ?? 1;
  if (params.devices.length < minDrives) {
    blocking.push(`RAID ${params.raid_level} requires at least ${minDrives} drives (got ${params.devices.length})`);
  }

  const seen = new Set<string>();
  for (const device of [...params.devices, ...params.hot_spares]) {
    if (seen.has(device)) blocking.push(`Drive ${device} is listed more than once`);
    seen.add(device);
  }

  const byAddress = new Map<string, PhysicalDrive>();
  for (const pd of filterByAdapter(physicalDrives, params.adapter)) {
    const address = deviceAddress(pd);
    if (address) byAddress.set(address, pd);
  }

  for (const device of seen) {
    const pd = byAddress.get(device);
    if (!pd) {
      blocking.push(`Drive ${device} not found on adapter ${params.adapter}`);
    } else if (!isUnconfiguredGood(pd)) {
      warnings.push(`Drive ${device} is in state '${String(pd['firmware_state'])}', not unconfigured(good)`);
    }
  }

  return {
    warnings,
    ...(blocking.length > 0 ? { blocking_resources: blocking } : {}),
  };
}

function describeLogicalDrive(ld: LogicalDrive): Record<string, unknown> {
  return {
    name: ld['name'] ?? null,
    raid_level: ld['raid_level'] ?? null,
    size: ld['size'] ?? null,
    state: ld['state'] ?? null,
  };
}

/** In apply mode the preflight read and the command run under one adapter lock */
function withApplyLock<T>(mode: Mode, adapter: number, toolName: string, fn: () => Promise<T>): Promise<T> {
  return mode === 'apply' ? adapterLocks.withLock(adapter, toolName, fn) : fn();
}

// --- Handlers ---

export async function handleLogicalDriveList(
  params: z.infer<typeof LogicalDriveListSchema>
): Promise<LogicalDrive[]> {
  return filterByAdapter(await getMegaCli().logicalDrives(), params.adapter_id);
}

export async function handleLogicalDriveCreate(params: z.infer<typeof LogicalDriveCreateSchema>) {
  const megacli = getMegaCli();
  const command = formatCommand(buildCreateLogicalDriveArgs(params));
  const description = `Create RAID ${params.raid_level} logical drive on adapter ${params.adapter} from ${params.devices.length} drives`;

  return withApplyLock(params.mode, params.adapter, 'logical_drive.create', () => applyWithPlan(params.mode, {
    preflight: async () => {
      const { warnings, blocking_resources } = checkCreate(params, await megacli.physicalDrives());
      return {
        mode: 'plan' as const,
        description,
        command,
        changes: [{
          action: 'create' as const,
          resource_type: 'logical_drive',
          resource_id: `adapter ${params.adapter}`,
          after: {
            raid_level: params.raid_level,
            devices: params.devices,
            hot_spares: params.hot_spares,
            size_mb: params.size_mb ?? 'all',
          },
        }],
        warnings,
        preflight_passed: blocking_resources === undefined,
        ...(blocking_resources ? { blocking_resources } : {}),
      } satisfies PlanResult;
    },

    execute: () => megacli.createLogicalDrive(params),
  }));
}

export async function handleLogicalDriveDelete(params: z.infer<typeof LogicalDriveDeleteSchema>) {
  const megacli = getMegaCli();
  const command = formatCommand(buildRemoveLogicalDriveArgs(params));

  return withApplyLock(params.mode, params.adapter, 'logical_drive.delete', () => applyWithPlan(params.mode, {
    preflight: async () => {
      const blocking: string[] = [];
      if (!params.dangerous) {
        blocking.push('dangerous=true is required to delete a logical drive');
      }

      const onAdapter = filterByAdapter(await megacli.logicalDrives(), params.adapter);
      const targets = params.drive === 'all' ? onAdapter : onAdapter.filter(ld => ld.id === params.drive);
      if (params.drive !== 'all' && targets.length === 0) {
        blocking.push(`Logical drive ${params.drive} not found on adapter ${params.adapter}`);
      }

      return {
        mode: 'plan' as const,
        description: params.drive === 'all'
          ? `Delete all ${targets.length} logical drives on adapter ${params.adapter}`
          : `Delete logical drive ${params.drive} on adapter ${params.adapter}`,
        command,
        changes: targets.map(ld => ({
          action: 'delete' as const,
          resource_type: 'logical_drive',
          resource_id: `${ld.adapter_id}/${ld.id}`,
          before: describeLogicalDrive(ld),
        })),
        warnings: ['This operation is IRREVERSIBLE and destroys all data on the logical drive.'],
        preflight_passed: blocking.length === 0,
        ...(blocking.length > 0 ? { blocking_resources: blocking } : {}),
      } satisfies PlanResult;
    },

    execute: () => megacli.removeLogicalDrive(params),
  }));
}
