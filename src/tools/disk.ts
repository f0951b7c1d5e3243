/**
 * physical_drive.* MCP tools.
 */

import { z } from 'zod';
import { getMegaCli } from '../megacli/MegaCli.js';
import { filterByAdapter } from './adapter.js';
import type { PhysicalDrive } from '../types/megacli.js';

// --- Schemas ---

export const PhysicalDriveListSchema = z.object({
  adapter_id: z.number().int().min(0).optional().describe('Only report drives on this adapter'),
  only_unconfigured: z.boolean().default(false).describe('Only report drives in unconfigured(good) state'),
});

// --- Helpers ---

/** enclosure:slot address MegaCLI takes for a drive, or null if the slot is unknown */
export function deviceAddress(pd: PhysicalDrive): string | null {
  const slot = pd['slot_number'];
  if (pd.enclosure_id === null || typeof slot !== 'number') return null;
  return `${pd.enclosure_id}:${slot}`;
}

export function isUnconfiguredGood(pd: PhysicalDrive): boolean {
  const state = pd['firmware_state'];
  return typeof state === 'string' && state.startsWith('unconfigured(good)');
}

// --- Handlers ---

export async function handlePhysicalDriveList(
  params: z.infer<typeof PhysicalDriveListSchema>
): Promise<PhysicalDrive[]> {
  const drives = filterByAdapter(await getMegaCli().physicalDrives(), params.adapter_id);
  return params.only_unconfigured ? drives.filter(isUnconfiguredGood) : drives;
}
