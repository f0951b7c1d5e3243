/**
 * Typed record parsers, one per MegaCLI report kind.
 */

import { parseBlocks, type BlockLayout, type RawBlock } from './blocks.js';
import { raidLevelFromText } from './coerce.js';
import type {
  Adapter,
  BatteryBackupUnit,
  Enclosure,
  LogicalDrive,
  PhysicalDrive,
} from '../types/megacli.js';

export const ADAPTER_LAYOUT: BlockLayout = {
  record: /^adapter #(\d+)/,
};

export const ENCLOSURE_LAYOUT: BlockLayout = {
  scope: /^number of enclosures on adapter (\d+) --/,
  record: /^enclosure (\d+)$/,
};

export const LOGICAL_DRIVE_LAYOUT: BlockLayout = {
  scope: /^adapter (\d+) -- virtual drive information$/,
  record: /^virtual drive:(\d+)/,
};

export const PHYSICAL_DRIVE_LAYOUT: BlockLayout = {
  scope: /^adapter #(\d+)/,
  record: /^enclosure device id:(\d+|n\/a)$/,
};

export const BBU_LAYOUT: BlockLayout = {
  record: /^bbu status for adapter:(\d+)/,
};

function toId(key: string): number | null {
  return /^\d+$/.test(key) ? parseInt(key, 10) : null;
}

// Blocks from scoped layouts always carry an adapter; this keeps the type honest
function scoped(blocks: RawBlock[]): Array<RawBlock & { adapterId: number }> {
  return blocks.flatMap(b => (b.adapterId === null ? [] : [{ ...b, adapterId: b.adapterId }]));
}

export function parseAdapters(lines: readonly string[]): Adapter[] {
  return parseBlocks(lines, ADAPTER_LAYOUT).map(b => ({
    ...b.properties,
    id: parseInt(b.key, 10),
  }));
}

export function parseEnclosures(lines: readonly string[]): Enclosure[] {
  return scoped(parseBlocks(lines, ENCLOSURE_LAYOUT)).map(b => ({
    ...b.properties,
    adapter_id: b.adapterId,
    id: parseInt(b.key, 10),
  }));
}

export function parseLogicalDrives(lines: readonly string[]): LogicalDrive[] {
  return scoped(parseBlocks(lines, LOGICAL_DRIVE_LAYOUT)).map(b => {
    const properties = { ...b.properties };
    const level = properties['raid_level'];
    if (typeof level === 'string') {
      properties['raid_level'] = raidLevelFromText(level) ?? level;
    }
    return {
      ...properties,
      adapter_id: b.adapterId,
      id: parseInt(b.key, 10),
    };
  });
}

export function parsePhysicalDrives(lines: readonly string[]): PhysicalDrive[] {
  return scoped(parseBlocks(lines, PHYSICAL_DRIVE_LAYOUT)).map(b => ({
    ...b.properties,
    adapter_id: b.adapterId,
    enclosure_id: toId(b.key),
  }));
}

export function parseBatteryBackupUnits(lines: readonly string[]): BatteryBackupUnit[] {
  return parseBlocks(lines, BBU_LAYOUT).map(b => ({
    ...b.properties,
    adapter_id: parseInt(b.key, 10),
  }));
}
