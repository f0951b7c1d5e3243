/**
 * MegaCLI argument builders.
 *
 * Query commands are fixed; the two configuration commands are built from
 * validated parameters. Validation happens here so that a bad parameter never
 * reaches a spawned process.
 */

import { z } from 'zod';
import { McpToolError, ErrorCode } from '../types/common.js';

export const ADAPTER_INFO_ARGS = ['-AdpAllInfo', '-aALL'] as const;
export const ENCLOSURE_INFO_ARGS = ['-EncInfo', '-aALL'] as const;
export const LOGICAL_DRIVE_INFO_ARGS = ['-LDInfo', '-Lall', '-aALL'] as const;
export const PHYSICAL_DRIVE_LIST_ARGS = ['-PDList', '-aALL'] as const;
export const BBU_INFO_ARGS = ['-AdpBbuCmd', '-aALL'] as const;

export const RAID_LEVELS = [0, 1, 5, 6] as const;
export const STRIPE_SIZES_KB = [8, 16, 32, 64, 128, 256, 512, 1024] as const;

/** Enclosure device id and slot number, e.g. "252:3" */
const DEVICE_RE = /^\d+:\d+$/;

const DeviceSchema = z.string().regex(DEVICE_RE, 'Device must be written as enclosure:slot, e.g. 252:0');
const AdapterSchema = z.number().int().min(0).describe('Adapter number');

export const CreateLogicalDriveSchema = z.object({
  raid_level: z.union(
    [z.literal(0), z.literal(1), z.literal(5), z.literal(6)],
    { errorMap: () => ({ message: `RAID level must be one of ${RAID_LEVELS.join(', ')}` }) }
  ).describe('RAID level'),
  devices: z.array(DeviceSchema).min(1).describe('Member drives as enclosure:slot'),
  adapter: AdapterSchema,
  write_policy: z.enum(['WT', 'WB']).optional().describe('WT (write through) or WB (write back)'),
  read_policy: z.enum(['NORA', 'RA', 'ADRA']).optional()
    .describe('NORA (no read ahead), RA (read ahead) or ADRA (adaptive read ahead)'),
  cache_policy: z.enum(['Direct', 'Cached']).optional(),
  cached_bad_bbu: z.boolean().optional().describe('Keep write cache enabled when the BBU is bad'),
  size_mb: z.number().int().positive().optional().describe('Capacity in MB (default: all available)'),
  stripe_size_kb: z.union(
    [z.literal(8), z.literal(16), z.literal(32), z.literal(64),
     z.literal(128), z.literal(256), z.literal(512), z.literal(1024)],
    { errorMap: () => ({ message: `Stripe size must be one of ${STRIPE_SIZES_KB.join(', ')}` }) }
  ).optional(),
  hot_spares: z.array(DeviceSchema).default([]).describe('Dedicated hot spares as enclosure:slot'),
  after_ld: z.number().int().min(0).optional().describe('Use the free slot after this logical drive'),
  force: z.boolean().default(false),
});

export const RemoveLogicalDriveSchema = z.object({
  drive: z.union([z.number().int().min(0), z.literal('all')]).describe('Logical drive number, or "all"'),
  adapter: AdapterSchema,
  force: z.boolean().default(false),
});

export type CreateLogicalDriveInput = z.input<typeof CreateLogicalDriveSchema>;
export type CreateLogicalDriveParams = z.output<typeof CreateLogicalDriveSchema>;
export type RemoveLogicalDriveInput = z.input<typeof RemoveLogicalDriveSchema>;
export type RemoveLogicalDriveParams = z.output<typeof RemoveLogicalDriveSchema>;

function validate<S extends z.ZodTypeAny>(schema: S, input: unknown, what: string): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.') || what}: ${i.message}`);
    throw new McpToolError(
      ErrorCode.INVALID_ARGUMENT,
      `Invalid ${what} parameters: ${issues.join('; ')}`,
      result.error.issues
    );
  }
  return result.data;
}

export function parseCreateLogicalDrive(input: unknown): CreateLogicalDriveParams {
  return validate(CreateLogicalDriveSchema, input, 'logical drive');
}

export function parseRemoveLogicalDrive(input: unknown): RemoveLogicalDriveParams {
  return validate(RemoveLogicalDriveSchema, input, 'logical drive removal');
}

export function buildCreateLogicalDriveArgs(input: CreateLogicalDriveInput): string[] {
  const p = parseCreateLogicalDrive(input);
  const args = ['-CfgLDAdd', `-R${p.raid_level}[${p.devices.join(',')}]`];

  if (p.write_policy) args.push(p.write_policy);
  if (p.read_policy) args.push(p.read_policy);
  if (p.cache_policy) args.push(p.cache_policy);
  if (p.cached_bad_bbu !== undefined) {
    args.push(p.cached_bad_bbu ? 'CachedBadBBU' : 'NoCachedBadBBU');
  }
  if (p.size_mb !== undefined) args.push(`-sz${p.size_mb}`);
  if (p.stripe_size_kb !== undefined) args.push(`-strpsz${p.stripe_size_kb}`);
  if (p.hot_spares.length > 0) args.push(`-Hsp[${p.hot_spares.join(',')}]`);
  if (p.after_ld !== undefined) args.push('-afterLd', String(p.after_ld));
  if (p.force) args.push('-Force');
  args.push(`-a${p.adapter}`);

  return args;
}

export function buildRemoveLogicalDriveArgs(input: RemoveLogicalDriveInput): string[] {
  const p = parseRemoveLogicalDrive(input);
  const args = ['-CfgLdDel', `-L${p.drive}`];
  if (p.force) args.push('-Force');
  args.push(`-a${p.adapter}`);
  return args;
}
