import { USAGE, UsageError, buildToolCalls, parseArguments, runCli, type ToolRunner } from '../cli/commands.js';

function fakeRunner(replies: Record<string, string | Error>): ToolRunner & { calls: string[] } {
  const calls: string[] = [];
  return {
    calls,
    async callTool(name: string) {
      calls.push(name);
      const reply = replies[name];
      if (reply instanceof Error) throw reply;
      return reply ?? '';
    },
  };
}

describe('parseArguments', () => {
  it('splits the command, flags and options', () => {
    const parsed = parseArguments(['disenchant', '--execute', '--protect=A,B', 'extra']);

    expect(parsed.command).toBe('disenchant');
    expect([...parsed.flags]).toEqual(['execute']);
    expect(parsed.options.get('protect')).toBe('A,B');
  });
});

describe('buildToolCalls', () => {
  it('maps disenchant options onto the plan tool', () => {
    const calls = buildToolCalls(
      parseArguments(['plan-disenchant', '--no-skins', '--keep-unowned=2', '--protect=X,,Y'])
    );

    expect(calls).toEqual([
      {
        tool: 'lol_plan_disenchant',
        args: {
          includeChampionShards: true,
          includeSkinShards: false,
          includeWardSkinShards: true,
          keepUnownedCopies: 2,
          protectedLootIds: ['X', 'Y'],
        },
      },
    ]);
  });

  it('only executes a disenchant with --execute', () => {
    expect(buildToolCalls(parseArguments(['disenchant'])).map((c) => c.tool)).toEqual([
      'lol_plan_disenchant',
    ]);
    expect(buildToolCalls(parseArguments(['disenchant', '--execute']))[1]).toEqual({
      tool: 'lol_execute_disenchant',
      args: { confirm: true },
    });
  });

  it('opens chests as a dry run by default', () => {
    expect(buildToolCalls(parseArguments(['open-chests']))[0].args).toEqual({ dryRun: true });
    expect(buildToolCalls(parseArguments(['open-chests', '--execute']))[0].args).toEqual({ dryRun: false });
  });

  it('passes the backup directory', () => {
    expect(buildToolCalls(parseArguments(['restore-settings', '--dir=saved']))).toEqual([
      { tool: 'lol_restore_settings', args: { backupDir: 'saved' } },
    ]);
  });

  it('rejects unknown and missing commands', () => {
    expect(() => buildToolCalls(parseArguments(['dance']))).toThrow(new UsageError('Unknown command: dance'));
    expect(() => buildToolCalls(parseArguments([]))).toThrow('No command given');
  });
});

describe('runCli', () => {
  it('prints each tool result and exits with 0', async () => {
    const runner = fakeRunner({ lol_plan_disenchant: 'plan', lol_execute_disenchant: 'done' });
    const out: string[] = [];

    const code = await runCli(['disenchant', '--execute'], runner, (t) => out.push(t), () => undefined);

    expect(code).toBe(0);
    expect(out).toEqual(['plan', 'done']);
  });

  it('stops at the first failing tool', async () => {
    const runner = fakeRunner({ lol_plan_disenchant: new Error('League client is not running') });
    const errors: string[] = [];

    const code = await runCli(['disenchant', '--execute'], runner, () => undefined, (t) => errors.push(t));

    expect(code).toBe(1);
    expect(runner.calls).toEqual(['lol_plan_disenchant']);
    expect(errors).toEqual(['Error: League client is not running']);
  });

  it('prints usage for a bad command line', async () => {
    const errors: string[] = [];

    const code = await runCli(['dance'], fakeRunner({}), () => undefined, (t) => errors.push(t));

    expect(code).toBe(1);
    expect(errors).toEqual([`Unknown command: dance\n\n${USAGE}`]);
  });
});
