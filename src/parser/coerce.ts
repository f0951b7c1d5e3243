/**
 * Property decoding for MegaCLI "key:value" report lines.
 *
 * MegaCLI prints every value as text. The rules below guess the semantic type
 * from the text alone, in a fixed order; the first rule that matches wins.
 */

import type { PropertyValue } from '../types/megacli.js';

const KIB = 1024;

const SIZE_MULTIPLIERS: Record<string, number> = {
  b: 1,
  byte: 1,
  bytes: 1,
  kb: KIB,
  mb: KIB ** 2,
  gb: KIB ** 3,
  tb: KIB ** 4,
  pb: KIB ** 5,
};

const DURATION_MULTIPLIERS: Record<string, number> = {
  s: 1, sec: 1, secs: 1, seconds: 1,
  m: 60, min: 60, mins: 60, minutes: 60,
  h: 3600, hour: 3600, hours: 3600,
  d: 86400, day: 86400, days: 86400,
};

const INTEGER_RE = /^(\d+)\s*%?$/;
const DECIMAL_RE = /^(\d+\.\d+)\s*%?$/;
// MegaCLI spells it "celcius"
const TEMPERATURE_RE = /^(\d+)\s*(?:c|degree celsius|degree celcius)\b/;
// Sizes are often followed by a sector count, e.g. "558.911 gb [0x45dd2fb0 sectors]".
// Rates ("6.0gb/s", "3gbps") and words that merely start with a unit are not sizes.
const SIZE_RE = /^(\d+(?:\.\d+)?)\s*(bytes?|b|kb|mb|gb|tb|pb)(?![a-z]|\/s)/;
const DURATION_RE = /^(\d+)\s*(s|sec|secs|seconds|m|min|mins|minutes|h|hour|hours|d|day|days)$/;

const RAID_LEVELS: Record<string, number> = {
  'primary-0, secondary-0, raid level qualifier-0': 0,
  'primary-1, secondary-0, raid level qualifier-0': 1,
  'primary-5, secondary-0, raid level qualifier-3': 5,
  'primary-6, secondary-0, raid level qualifier-3': 6,
  'primary-1, secondary-3, raid level qualifier-0': 10,
};

/**
 * Turn a raw report label into a property name,
 * e.g. "Drive's position" -> "drive_position", "Vendor Spec. Info" -> "vendor_spec_info".
 */
export function normalizeKey(key: string): string {
  return key
    .trim()
    .toLowerCase()
    .replace(/'s\b/g, '')
    .replace(/&/g, 'and')
    .replace(/\./g, '')
    .replace(/[\s/-]+/g, '_')
    .replace(/[^a-z0-9_]/g, '')
    .replace(/_+/g, '_')
    .replace(/^_|_$/g, '');
}

/** Decode a raw value. `key` is the raw label; only the temperature rule looks at it. */
export function coerceValue(key: string, raw: string): PropertyValue {
  const value = raw.trim();

  if (value === 'n/a' || value === 'none') return null;
  if (value === 'yes') return true;
  if (value === 'no') return false;

  let m = INTEGER_RE.exec(value);
  if (m) return parseInt(m[1] ?? '', 10);

  m = DECIMAL_RE.exec(value);
  if (m) return parseFloat(m[1] ?? '');

  if (key.toLowerCase().includes('temperature')) {
    m = TEMPERATURE_RE.exec(value);
    if (m) return parseInt(m[1] ?? '', 10);
  }

  m = SIZE_RE.exec(value);
  if (m) {
    const multiplier = SIZE_MULTIPLIERS[m[2] ?? ''] ?? 1;
    return parseFloat(m[1] ?? '') * multiplier;
  }

  m = DURATION_RE.exec(value);
  if (m) {
    const multiplier = DURATION_MULTIPLIERS[m[2] ?? ''] ?? 1;
    return parseInt(m[1] ?? '', 10) * multiplier;
  }

  return value;
}

/** Decode one report line's key and value into a property name/value pair. */
export function coerce(key: string, value: string): [string, PropertyValue] {
  return [normalizeKey(key), coerceValue(key, value)];
}

/**
 * Map MegaCLI's RAID level phrase to the numeric level.
 * Returns null for phrases outside the known set.
 */
export function raidLevelFromText(text: string): number | null {
  return RAID_LEVELS[text.trim().toLowerCase()] ?? null;
}
