/**
 * Record shapes parsed from MegaCLI text reports.
 * Property names are normalized (see parser/coerce.ts); values are coerced.
 */

export type PropertyValue = string | number | boolean | null;

export interface Properties {
  [key: string]: PropertyValue;
}

export interface Adapter extends Properties {
  id: number;
}

export interface Enclosure extends Properties {
  adapter_id: number;
  id: number;
}

export interface LogicalDrive extends Properties {
  adapter_id: number;
  id: number;
}

export interface PhysicalDrive extends Properties {
  adapter_id: number;
  /** null when MegaCLI reports the device outside any enclosure (n/a) */
  enclosure_id: number | null;
}

export interface BatteryBackupUnit extends Properties {
  adapter_id: number;
}
