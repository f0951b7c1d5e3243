export { MegaCli, getMegaCli } from './MegaCli.js';
export {
  MegaCliExecutor,
  execFileRunner,
  DEFAULT_CLI_PATH,
  type CommandRunner,
  type CommandOutput,
  type ExecutorOptions,
} from '../cli/executor.js';
export { normalizeOutput, formatCommand } from '../cli/output.js';
export { coerce, coerceValue, normalizeKey, raidLevelFromText } from '../parser/coerce.js';
export {
  parseAdapters,
  parseEnclosures,
  parseLogicalDrives,
  parsePhysicalDrives,
  parseBatteryBackupUnits,
} from '../parser/records.js';
export {
  buildCreateLogicalDriveArgs,
  buildRemoveLogicalDriveArgs,
  CreateLogicalDriveSchema,
  RemoveLogicalDriveSchema,
  type CreateLogicalDriveInput,
  type RemoveLogicalDriveInput,
} from './commands.js';
export { McpToolError, CommandError, ErrorCode } from '../types/common.js';
export type * from '../types/megacli.js';
