import { spawn as nodeSpawn, type SpawnOptions } from 'node:child_process';
import type { Readable } from 'node:stream';

import { resultCodes, type ResultCode, type TestCase, type TestExecutor, type TestResult } from '@tally/core';

import { isExpectedFailure, type SuiteDefinition } from './suiteConfig.js';

/** Exit status a test uses to say it cannot run in this configuration. */
export const UNSUPPORTED_EXIT_CODE = 77;

/** The part of a ChildProcess the executor relies on. */
export interface SpawnedProcess {
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: 'error', listener: (err: Error) => void): unknown;
  once(event: 'close', listener: (code: number | null) => void): unknown;
}

export type SpawnLike = (file: string, args: readonly string[], options: SpawnOptions) => SpawnedProcess;

export type ProcessExecutorOptions = Readonly<{
  definitionOf: (test: TestCase) => SuiteDefinition;
  /** Read when each test starts, so later changes (such as TMPDIR) reach the child. */
  env?: () => NodeJS.ProcessEnv;
  spawnImpl?: SpawnLike;
}>;

type Attempt = Readonly<{ exitCode: number | null; output: string }>;

/**
 * Format process output:
 *
 * - Start with stdout.
 * - If stderr is non-empty, append `\n[stderr]\n<stderr>`.
 * - If the exit code is not 0 (including null), append `\n[exit code: <code>]`.
 */
export function formatOutput(stdout: string, stderr: string, exitCode: number | null): string {
  let output = stdout;
  if (stderr.length > 0) {
    output += `\n[stderr]\n${stderr}`;
  }
  if (exitCode !== 0) {
    output += `\n[exit code: ${exitCode}]`;
  }
  return output;
}

function runOnce(
  spawnImpl: SpawnLike,
  command: readonly string[],
  filePath: string,
  cwd: string,
  env: NodeJS.ProcessEnv,
  signal: AbortSignal,
): Promise<Attempt> {
  const [file, ...args] = command;
  return new Promise<Attempt>((resolve, reject) => {
    let stdout = '';
    let stderr = '';
    let settled = false;

    const child = spawnImpl(file, [...args, filePath], { cwd, env, stdio: ['ignore', 'pipe', 'pipe'] });
    const kill = (): void => {
      child.kill('SIGKILL');
    };
    signal.addEventListener('abort', kill, { once: true });

    child.stdout?.setEncoding('utf-8');
    child.stderr?.setEncoding('utf-8');
    child.stdout?.on('data', (chunk: string) => {
      stdout += chunk;
    });
    child.stderr?.on('data', (chunk: string) => {
      stderr += chunk;
    });

    child.once('error', (err: Error) => {
      if (settled) return;
      settled = true;
      signal.removeEventListener('abort', kill);
      reject(err);
    });
    child.once('close', (code: number | null) => {
      if (settled) return;
      settled = true;
      signal.removeEventListener('abort', kill);
      resolve({ exitCode: code, output: formatOutput(stdout, stderr, code) });
    });
  });
}

function classify(exitCode: number | null): ResultCode {
  if (exitCode === 0) return resultCodes.PASS;
  if (exitCode === UNSUPPORTED_EXIT_CODE) return resultCodes.UNSUPPORTED;
  return resultCodes.FAIL;
}

/**
 * Runs each test as `<suite command...> <test file>` in the suite's exec root.
 *
 * Failing tests are retried up to the suite's `retries` count; a later pass is
 * FLAKYPASS. Tests listed under `xfail` are never retried and have FAIL and PASS
 * turned into XFAIL and XPASS. A command that cannot be started is UNRESOLVED.
 */
export function createProcessExecutor(options: ProcessExecutorOptions): TestExecutor {
  const spawnImpl: SpawnLike = options.spawnImpl ?? nodeSpawn;
  const readEnv = options.env ?? (() => process.env);

  return async (test, { signal }): Promise<TestResult> => {
    const definition = options.definitionOf(test);
    const env = { ...readEnv(), ...definition.env };
    const expectFailure = isExpectedFailure(definition, test.pathInSuite);
    const maxAttempts = expectFailure ? 1 : definition.retries + 1;
    const startMs = performance.now();

    let attempt: Attempt;
    let attempts = 0;
    try {
      do {
        attempts += 1;
        attempt = await runOnce(spawnImpl, definition.command, test.filePath, test.suite.execRoot, env, signal);
      } while (classify(attempt.exitCode) === resultCodes.FAIL && attempts < maxAttempts && !signal.aborted);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return {
        code: resultCodes.UNRESOLVED,
        output: `Unable to run '${definition.command.join(' ')}': ${message}`,
        elapsed: (performance.now() - startMs) / 1000,
      };
    }

    let code = classify(attempt.exitCode);
    if (expectFailure) {
      if (code === resultCodes.FAIL) code = resultCodes.XFAIL;
      else if (code === resultCodes.PASS) code = resultCodes.XPASS;
    } else if (code === resultCodes.PASS && attempts > 1) {
      code = resultCodes.FLAKYPASS;
    }

    return { code, output: attempt.output, elapsed: (performance.now() - startMs) / 1000 };
  };
}
