/**
 * MegaCLI service: one method per report kind plus the two logical drive
 * configuration commands. Every call spawns exactly one MegaCLI process.
 */

import { MegaCliExecutor } from '../cli/executor.js';
import { loadConfig } from '../config/serverConfig.js';
import {
  parseAdapters,
  parseBatteryBackupUnits,
  parseEnclosures,
  parseLogicalDrives,
  parsePhysicalDrives,
} from '../parser/records.js';
import {
  ADAPTER_INFO_ARGS,
  BBU_INFO_ARGS,
  ENCLOSURE_INFO_ARGS,
  LOGICAL_DRIVE_INFO_ARGS,
  PHYSICAL_DRIVE_LIST_ARGS,
  buildCreateLogicalDriveArgs,
  buildRemoveLogicalDriveArgs,
  type CreateLogicalDriveInput,
  type RemoveLogicalDriveInput,
} from './commands.js';
import type {
  Adapter,
  BatteryBackupUnit,
  Enclosure,
  LogicalDrive,
  PhysicalDrive,
} from '../types/megacli.js';

export class MegaCli {
  constructor(readonly executor: MegaCliExecutor) {}

  async adapters(): Promise<Adapter[]> {
    return parseAdapters(await this.executor.execute(ADAPTER_INFO_ARGS));
  }

  async enclosures(): Promise<Enclosure[]> {
    return parseEnclosures(await this.executor.execute(ENCLOSURE_INFO_ARGS));
  }

  async logicalDrives(): Promise<LogicalDrive[]> {
    return parseLogicalDrives(await this.executor.execute(LOGICAL_DRIVE_INFO_ARGS));
  }

  async physicalDrives(): Promise<PhysicalDrive[]> {
    return parsePhysicalDrives(await this.executor.execute(PHYSICAL_DRIVE_LIST_ARGS));
  }

  async batteryBackupUnits(): Promise<BatteryBackupUnit[]> {
    return parseBatteryBackupUnits(await this.executor.execute(BBU_INFO_ARGS));
  }

  /** Create a logical drive; returns MegaCLI's output lines. */
  async createLogicalDrive(input: CreateLogicalDriveInput): Promise<string[]> {
    return this.executor.execute(buildCreateLogicalDriveArgs(input));
  }

  /** Delete a logical drive; returns MegaCLI's output lines. */
  async removeLogicalDrive(input: RemoveLogicalDriveInput): Promise<string[]> {
    return this.executor.execute(buildRemoveLogicalDriveArgs(input));
  }
}

let instance: MegaCli | null = null;

/**
 * Returns the process-wide MegaCli built from server configuration.
 * Throws PRECONDITION_FAILED if the configured binary is missing.
 */
export function getMegaCli(): MegaCli {
  if (instance) return instance;
  const config = loadConfig();
  instance = new MegaCli(new MegaCliExecutor(config.cli_path, { timeout_ms: config.command_timeout_ms }));
  return instance;
}
