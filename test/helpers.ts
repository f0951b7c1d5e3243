import * as fs from 'fs';
import { vi, type Mock } from 'vitest';
import { normalizeOutput } from '../src/cli/output.js';
import { MegaCliExecutor, type CommandOutput, type CommandRunner } from '../src/cli/executor.js';
import { MegaCli } from '../src/megacli/MegaCli.js';

export function readFixture(name: string): string {
  return fs.readFileSync(new URL(`./fixtures/${name}`, import.meta.url), 'utf8');
}

/** Fixture as the executor would hand it to the parsers */
export function fixtureLines(name: string): string[] {
  return normalizeOutput(readFixture(name));
}

const FIXTURES: Record<string, string> = {
  '-AdpAllInfo': 'adp_all_info.txt',
  '-EncInfo': 'enc_info.txt',
  '-LDInfo': 'ld_info.txt',
  '-PDList': 'pd_list.txt',
  '-AdpBbuCmd': 'bbu_info.txt',
};

/** Serves fixture output keyed by the command's first argument */
export function fixtureRunner(): Mock<CommandRunner> {
  return vi.fn<CommandRunner>(async (_file, args): Promise<CommandOutput> => {
    const fixture = FIXTURES[args[0] ?? ''];
    return fixture
      ? { stdout: readFixture(fixture), stderr: '', exitCode: 0 }
      : { stdout: 'Exit Code: 0x00\n', stderr: '', exitCode: 0 };
  });
}

// Any existing path will do; the binary is never run
export function megacliWith(runner: CommandRunner): MegaCli {
  return new MegaCli(new MegaCliExecutor(process.execPath, { runner }));
}
