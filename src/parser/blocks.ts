/**
 * Line-oriented block segmentation for MegaCLI reports.
 *
 * Every report kind is a flat list of lines in which header lines open an
 * adapter scope or a record, and "key:value" lines fill the innermost open
 * record. A BlockLayout names the two header patterns; the state machine is
 * shared by all kinds.
 */

import { coerce } from './coerce.js';
import type { Properties } from '../types/megacli.js';

export interface BlockLayout {
  /** Opens an adapter scope; group 1 is the adapter number. */
  scope?: RegExp;
  /** Opens a record; group 1 is the record key. */
  record: RegExp;
}

export interface RawBlock {
  /** Adapter number of the enclosing scope, or null for layouts without scopes */
  adapterId: number | null;
  /** Text captured by the record header */
  key: string;
  properties: Properties;
}

// Trailer printed after every report
const IGNORED_KEYS = new Set(['exit_code']);

type ParserState =
  | { kind: 'idle' }
  | { kind: 'scope'; adapterId: number }
  | { kind: 'record'; adapterId: number | null; block: RawBlock };

/**
 * Split normalized MegaCLI output lines (see cli/output.ts) into raw blocks.
 * Never throws: unrecognized or truncated input yields fewer blocks.
 */
export function parseBlocks(lines: readonly string[], layout: BlockLayout): RawBlock[] {
  const blocks: RawBlock[] = [];
  let state: ParserState = { kind: 'idle' };

  const close = (): void => {
    if (state.kind === 'record') blocks.push(state.block);
  };

  for (const line of lines) {
    const scopeMatch = layout.scope?.exec(line);
    if (scopeMatch) {
      close();
      state = { kind: 'scope', adapterId: parseInt(scopeMatch[1] ?? '', 10) };
      continue;
    }

    const recordMatch = layout.record.exec(line);
    if (recordMatch) {
      close();
      const adapterId: number | null = state.kind === 'idle' ? null : state.adapterId;
      if (layout.scope && adapterId === null) {
        // Record without an adapter scope: nothing to attach it to
        state = { kind: 'idle' };
        continue;
      }
      state = {
        kind: 'record',
        adapterId,
        block: { adapterId, key: recordMatch[1] ?? '', properties: {} },
      };
      continue;
    }

    if (state.kind !== 'record') continue;

    const sep = line.indexOf(':');
    if (sep === -1) continue;

    const [key, value] = coerce(line.slice(0, sep), line.slice(sep + 1));
    if (!key || IGNORED_KEYS.has(key)) continue;
    state.block.properties[key] = value;
  }

  close();
  return blocks;
}
