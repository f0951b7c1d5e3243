/**
 * adapter.*, bbu.* and enclosure.* MCP tools.
 */

import { z } from 'zod';
import { getMegaCli } from '../megacli/MegaCli.js';
import type { Adapter, BatteryBackupUnit, Enclosure } from '../types/megacli.js';

// --- Schemas ---

const AdapterFilter = z.number().int().min(0).optional().describe('Only report this adapter');

export const AdapterListSchema = z.object({
  adapter_id: AdapterFilter,
});

export const BbuListSchema = z.object({
  adapter_id: AdapterFilter,
});

export const EnclosureListSchema = z.object({
  adapter_id: AdapterFilter,
});

// --- Helpers ---

export function filterByAdapter<T extends { adapter_id: number }>(records: T[], adapterId?: number): T[] {
  return adapterId === undefined ? records : records.filter(r => r.adapter_id === adapterId);
}

// --- Handlers ---

export async function handleAdapterList(params: z.infer<typeof AdapterListSchema>): Promise<Adapter[]> {
  const adapters = await getMegaCli().adapters();
  return params.adapter_id === undefined ? adapters : adapters.filter(a => a.id === params.adapter_id);
}

export async function handleBbuList(params: z.infer<typeof BbuListSchema>): Promise<BatteryBackupUnit[]> {
  return filterByAdapter(await getMegaCli().batteryBackupUnits(), params.adapter_id);
}

export async function handleEnclosureList(params: z.infer<typeof EnclosureListSchema>): Promise<Enclosure[]> {
  return filterByAdapter(await getMegaCli().enclosures(), params.adapter_id);
}
