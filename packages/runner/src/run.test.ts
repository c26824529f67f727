import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { resultCodes, type TestExecutor } from '@tally/core';
import { describe, expect, it } from 'vitest';

import { Diagnostics } from './diagnostics.js';
import { parseCommandLine, type RunRequest } from './options.js';
import { runTests } from './run.js';
import { SUITE_CONFIG_FILE } from './suiteConfig.js';

async function makeSuite(files: readonly string[], suiteYaml = 'name: demo\ncommand: [sh]\n'): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'tally-run-'));
  await fs.writeFile(path.join(dir, SUITE_CONFIG_FILE), suiteYaml, 'utf-8');
  for (const file of files) await fs.writeFile(path.join(dir, file), '', 'utf-8');
  return dir;
}

function request(argv: string[]): RunRequest {
  const parsed = parseCommandLine(argv, { env: {}, defaultWorkers: () => 1 });
  if (parsed.kind !== 'run') throw new Error('expected a run request');
  return parsed;
}

function collector() {
  const out: string[] = [];
  const err: string[] = [];
  return { out, err, diagnostics: new Diagnostics((line) => err.push(line)), write: (line: string) => out.push(line) };
}

const passing: TestExecutor = async () => ({ code: resultCodes.PASS, output: '', elapsed: 0.1 });

describe('runTests', () => {
  it('uses the timeout a suite requests when none is given', async () => {
    const dir = await makeSuite(['a.test'], 'name: demo\ncommand: [sh]\ntimeout: 45\n');
    const seen: number[] = [];
    const { diagnostics, write, err } = collector();

    await runTests(request([dir, '-q']), {
      diagnostics,
      write,
      env: { TALLY_PRESERVES_TMP: '1' },
      executor: async (_test, context) => {
        seen.push(context.timeout);
        return { code: resultCodes.PASS, output: '', elapsed: 0 };
      },
    });

    expect(seen).toEqual([45]);
    expect(err).toEqual([]);
  });

  it('lets --timeout override the suite and says so', async () => {
    const dir = await makeSuite(['a.test'], 'name: demo\ncommand: [sh]\ntimeout: 45\n');
    const seen: number[] = [];
    const { diagnostics, write, err } = collector();

    await runTests(request([dir, '-q', '--timeout', '10']), {
      diagnostics,
      write,
      env: { TALLY_PRESERVES_TMP: '1' },
      executor: async (_test, context) => {
        seen.push(context.timeout);
        return { code: resultCodes.PASS, output: '', elapsed: 0 };
      },
    });

    expect(seen).toEqual([10]);
    expect(err).toEqual([
      'tally: note: The test suite configuration requested an individual test timeout of 45 seconds but a timeout of ' +
        '10 seconds was requested on the command line. Forcing timeout to be 10 seconds',
    ]);
  });

  it('notes the shard selection and runs only that shard', async () => {
    const dir = await makeSuite(['a.test', 'b.test', 'c.test']);
    const ran: string[] = [];
    const { diagnostics, write, err } = collector();

    await runTests(request([dir, '-q', '--num-shards', '2', '--run-shard', '2']), {
      diagnostics,
      write,
      env: { TALLY_PRESERVES_TMP: '1' },
      executor: async (test) => {
        ran.push(test.fullName);
        return { code: resultCodes.PASS, output: '', elapsed: 0 };
      },
    });

    expect(ran).toEqual(['demo :: b.test']);
    expect(err).toEqual(['tally: note: Selecting shard 2/2 = size 1/3 = tests #(2*k)+2 = [2]']);
  });

  it('notes how many tests were left out after the failure threshold', async () => {
    const dir = await makeSuite(['a.test', 'b.test', 'c.test']);
    const { diagnostics, write, err, out } = collector();

    const code = await runTests(request([dir, '-q', '--max-failures', '1']), {
      diagnostics,
      write,
      env: { TALLY_PRESERVES_TMP: '1' },
      executor: async () => ({ code: resultCodes.FAIL, output: 'nope', elapsed: 0 }),
    });

    expect(code).toBe(1);
    expect(err).toEqual(['tally: note: Stopped after reaching 1 failures; 2 tests not run']);
    expect(out.slice(-2)).toEqual(['  Failed             : 1', '  Not Run            : 2']);
  });

  it('bumps failing test files when ordering incrementally', async () => {
    const dir = await makeSuite(['good.test', 'bad.test']);
    const old = new Date('2024-01-01T00:00:00Z');
    for (const name of ['good.test', 'bad.test']) await fs.utimes(path.join(dir, name), old, old);
    const { diagnostics, write } = collector();

    await runTests(request([dir, '-q', '--incremental']), {
      diagnostics,
      write,
      env: { TALLY_PRESERVES_TMP: '1' },
      executor: async (test) => ({
        code: test.pathInSuite[0] === 'bad.test' ? resultCodes.FAIL : resultCodes.PASS,
        output: '',
        elapsed: 0,
      }),
    });

    expect((await fs.stat(path.join(dir, 'bad.test'))).mtimeMs).toBeGreaterThan(old.getTime());
    expect((await fs.stat(path.join(dir, 'good.test'))).mtimeMs).toBe(old.getTime());
  });

  it('lists the slowest tests when asked', async () => {
    const dir = await makeSuite(['a.test', 'b.test']);
    const { diagnostics, write, out } = collector();

    await runTests(request([dir, '-q', '--time-tests']), {
      diagnostics,
      write,
      env: { TALLY_PRESERVES_TMP: '1' },
      executor: async (test) => ({
        code: resultCodes.PASS,
        output: '',
        elapsed: test.pathInSuite[0] === 'a.test' ? 0.5 : 2,
      }),
    });

    expect(out).toEqual(['Slowest Tests (2 of 2):', '  2.00s: demo :: b.test', '  0.50s: demo :: a.test', '']);
  });

  it('points the temp variables of the tests at a private directory and removes it afterwards', async () => {
    const dir = await makeSuite(['a.test']);
    const env: NodeJS.ProcessEnv = { TMPDIR: '/original' };
    const seen: string[] = [];
    const { diagnostics, write } = collector();

    await runTests(request([dir, '-q']), {
      diagnostics,
      write,
      env,
      executor: async () => {
        seen.push(env.TMPDIR ?? '');
        return { code: resultCodes.PASS, output: '', elapsed: 0 };
      },
    });

    expect(seen).toHaveLength(1);
    expect(seen[0]).not.toBe('/original');
    expect(env.TMPDIR).toBe('/original');
    await expect(fs.stat(seen[0])).rejects.toThrow();
  });

  it('applies the injected random source to shuffle', async () => {
    const dir = await makeSuite(['a.test', 'b.test', 'c.test']);
    const ran: string[] = [];
    const { diagnostics, write } = collector();

    await runTests(request([dir, '-q', '--shuffle']), {
      diagnostics,
      write,
      env: { TALLY_PRESERVES_TMP: '1' },
      random: () => 0,
      executor: async (test) => {
        ran.push(test.pathInSuite[0]);
        return passing(test, { timeout: 0, signal: new AbortController().signal });
      },
    });

    expect(ran).toEqual(['b.test', 'c.test', 'a.test']);
  });
});
