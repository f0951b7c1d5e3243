import { describe, it, expect, vi } from 'vitest';
import type { CommandRunner } from '../src/cli/executor.js';
import { CommandError, McpToolError } from '../src/types/common.js';
import { fixtureRunner, megacliWith } from './helpers.js';

describe('MegaCli queries', () => {
  it('runs one command per query with the expected arguments', async () => {
    const runner = fixtureRunner();
    const megacli = megacliWith(runner);

    await megacli.adapters();
    await megacli.enclosures();
    await megacli.logicalDrives();
    await megacli.physicalDrives();
    await megacli.batteryBackupUnits();

    expect(runner.mock.calls.map(c => c[1])).toEqual([
      ['-AdpAllInfo', '-aALL', '-NoLog'],
      ['-EncInfo', '-aALL', '-NoLog'],
      ['-LDInfo', '-Lall', '-aALL', '-NoLog'],
      ['-PDList', '-aALL', '-NoLog'],
      ['-AdpBbuCmd', '-aALL', '-NoLog'],
    ]);
  });

  it('returns parsed records', async () => {
    const megacli = megacliWith(fixtureRunner());

    expect((await megacli.adapters()).map(a => a.id)).toEqual([0, 1]);
    expect(await megacli.enclosures()).toHaveLength(3);
    expect((await megacli.logicalDrives()).map(ld => ld['raid_level'])).toEqual([1, 5, 10]);
    expect((await megacli.physicalDrives()).map(pd => pd['slot_number'])).toEqual([0, 3, 1]);
    expect((await megacli.batteryBackupUnits()).map(b => b['battery_state'])).toEqual(['optimal', 'optimal']);
  });

  it('produces fresh records on every call', async () => {
    const megacli = megacliWith(fixtureRunner());
    const first = await megacli.adapters();
    const second = await megacli.adapters();
    expect(second).toEqual(first);
    expect(second[0]).not.toBe(first[0]);
  });

  it('propagates CommandError from the executor', async () => {
    const runner = vi.fn<CommandRunner>().mockResolvedValue({ stdout: '', stderr: 'No BBU present', exitCode: 34 });
    await expect(megacliWith(runner).batteryBackupUnits()).rejects.toBeInstanceOf(CommandError);
  });
});

describe('MegaCli configuration commands', () => {
  it('creates a logical drive', async () => {
    const runner = vi.fn<CommandRunner>().mockResolvedValue({
      stdout: '\nAdapter 0: Created VD 2\n\nAdapter 0: Configured the Adapter!!\n\nExit Code: 0x00\n',
      stderr: '',
      exitCode: 0,
    });

    const output = await megacliWith(runner).createLogicalDrive({
      raid_level: 5, devices: ['252:2', '252:3', '252:4'], adapter: 0, write_policy: 'WB',
    });

    expect(runner).toHaveBeenCalledWith(
      process.execPath,
      ['-CfgLDAdd', '-R5[252:2,252:3,252:4]', 'WB', '-a0', '-NoLog'],
      60000
    );
    expect(output).toEqual(['adapter 0:created vd 2', 'adapter 0:configured the adapter!!', 'exit code:0x00']);
  });

  it('removes a logical drive', async () => {
    const runner = vi.fn<CommandRunner>().mockResolvedValue({
      stdout: 'Adapter 0: Deleted Virtual Drive-1(target id-1)\n', stderr: '', exitCode: 0,
    });
    await megacliWith(runner).removeLogicalDrive({ drive: 1, adapter: 0, force: true });
    expect(runner.mock.calls[0]?.[1]).toEqual(['-CfgLdDel', '-L1', '-Force', '-a0', '-NoLog']);
  });

  it('validates parameters before spawning anything', async () => {
    const runner = fixtureRunner();
    await expect(megacliWith(runner).createLogicalDrive({ raid_level: 1, devices: ['bad'], adapter: 0 }))
      .rejects.toBeInstanceOf(McpToolError);
    expect(runner).not.toHaveBeenCalled();
  });
});

describe('library entry point', () => {
  it('exposes the service and parsers', async () => {
    const lib = await import('../src/megacli/index.js');
    const megacli = new lib.MegaCli(new lib.MegaCliExecutor(process.execPath, { runner: fixtureRunner() }));
    expect((await megacli.batteryBackupUnits()).map(b => b.adapter_id)).toEqual([0, 1]);
    expect(lib.parseAdapters(['adapter #3'])).toEqual([{ id: 3 }]);
  });
});
