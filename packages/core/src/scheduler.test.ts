import { afterEach, describe, expect, it, vi } from 'vitest';

import { resultCodes, type ResultCode } from './resultCode.js';
import { executeTests, MAX_TIMER_SECONDS, type TestExecutor } from './scheduler.js';
import { TestCase, type Suite, type TestResult } from './testCase.js';

const suite: Suite = {
  name: 'demo',
  sourceRoot: '/src/demo',
  execRoot: '/build/demo',
  availableFeatures: [],
  config: { name: 'demo', availableFeatures: [] },
};

function makeTests(count: number): TestCase[] {
  return Array.from({ length: count }, (_, i) => new TestCase(suite, [`t${i + 1}.test`], `/src/demo/t${i + 1}.test`));
}

function result(code: ResultCode, output = ''): TestResult {
  return { code, output, elapsed: 0.01 };
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function nameOf(test: TestCase): string {
  return test.pathInSuite[0];
}

afterEach(() => {
  vi.useRealTimers();
});

describe('executeTests', () => {
  it('completes in dispatch order with a single worker', async () => {
    const tests = makeTests(4);
    const completed: string[] = [];
    const summary = await executeTests(tests, async () => result(resultCodes.PASS), {
      workers: 1,
      onComplete: (t) => completed.push(nameOf(t)),
    });

    expect(completed).toEqual(['t1.test', 't2.test', 't3.test', 't4.test']);
    expect(summary).toMatchObject({ status: 'completed', workers: 1, completed: 4, skipped: 0, failures: 0 });
    expect(tests.every((t) => t.state === 'completed')).toBe(true);
  });

  it('never runs more tests at once than there are workers', async () => {
    let running = 0;
    let peak = 0;
    const executor: TestExecutor = async () => {
      running += 1;
      peak = Math.max(peak, running);
      await delay(5);
      running -= 1;
      return result(resultCodes.PASS);
    };

    const summary = await executeTests(makeTests(6), executor, { workers: 2 });
    expect(peak).toBe(2);
    expect(summary.completed).toBe(6);
  });

  it('caps the pool at the number of tests', async () => {
    const summary = await executeTests(makeTests(3), async () => result(resultCodes.PASS), { workers: 8 });
    expect(summary.workers).toBe(3);
  });

  it('returns immediately for an empty list', async () => {
    const executor = vi.fn<TestExecutor>();
    const summary = await executeTests([], executor, { workers: 4 });
    expect(summary).toMatchObject({ status: 'completed', workers: 0, completed: 0, skipped: 0 });
    expect(executor).not.toHaveBeenCalled();
  });

  it('dispatches in list order across workers', async () => {
    const dispatched: string[] = [];
    await executeTests(
      makeTests(5),
      async (test) => {
        dispatched.push(nameOf(test));
        await delay(1);
        return result(resultCodes.PASS);
      },
      { workers: 3 },
    );
    expect(dispatched).toEqual(['t1.test', 't2.test', 't3.test', 't4.test', 't5.test']);
  });

  it('invokes onComplete exactly once per finished test', async () => {
    const onComplete = vi.fn();
    const tests = makeTests(5);
    await executeTests(tests, async () => result(resultCodes.FAIL), { workers: 2, onComplete });
    expect(onComplete).toHaveBeenCalledTimes(5);
    expect(new Set(onComplete.mock.calls.map(([t]) => t))).toEqual(new Set(tests));
  });

  it('stops dispatching once the failure threshold is reached and lets in-flight tests finish', async () => {
    const tests = makeTests(5);
    const executor = vi.fn<TestExecutor>(async (test) => {
      if (nameOf(test) === 't1.test') return result(resultCodes.FAIL, 'boom');
      await delay(20);
      return result(resultCodes.PASS);
    });

    const summary = await executeTests(tests, executor, { workers: 2, maxFailures: 1 });

    expect(executor).toHaveBeenCalledTimes(2);
    expect(tests[0].result?.code).toBe(resultCodes.FAIL);
    expect(tests[1].result?.code).toBe(resultCodes.PASS);
    expect(tests.slice(2).map((t) => t.state)).toEqual(['skipped', 'skipped', 'skipped']);
    expect(tests.slice(2).every((t) => t.result === null)).toBe(true);
    expect(summary).toMatchObject({ status: 'max-failures-reached', completed: 2, skipped: 3, failures: 1 });
  });

  it('counts only failing codes toward the threshold', async () => {
    const codes = [resultCodes.XFAIL, resultCodes.UNSUPPORTED, resultCodes.XPASS, resultCodes.TIMEOUT, resultCodes.PASS];
    const tests = makeTests(5);
    const summary = await executeTests(tests, async (test) => result(codes[tests.indexOf(test)]), {
      workers: 1,
      maxFailures: 2,
    });
    expect(summary).toMatchObject({ status: 'max-failures-reached', completed: 4, skipped: 1, failures: 2 });
  });

  it('reports completed when the threshold is crossed by the last test', async () => {
    const summary = await executeTests(makeTests(2), async () => result(resultCodes.FAIL), {
      workers: 1,
      maxFailures: 2,
    });
    expect(summary).toMatchObject({ status: 'completed', skipped: 0, failures: 2 });
  });

  it('forces TIMEOUT and aborts the executor when a test exceeds its limit', async () => {
    const tests = makeTests(2);
    let sawAbort = false;
    const executor: TestExecutor = (test, { signal }) => {
      if (nameOf(test) === 't2.test') return Promise.resolve(result(resultCodes.PASS));
      return new Promise<TestResult>((resolve) => {
        signal.addEventListener('abort', () => {
          sawAbort = true;
          resolve(result(resultCodes.PASS, 'too late'));
        });
      });
    };

    const summary = await executeTests(tests, executor, { workers: 1, timeout: 0.05 });

    expect(sawAbort).toBe(true);
    expect(tests[0].state).toBe('timed-out');
    expect(tests[0].result?.code).toBe(resultCodes.TIMEOUT);
    expect(tests[0].result?.output).toBe('Reached timeout of 0.05 seconds');
    expect(tests[1].result?.code).toBe(resultCodes.PASS);
    expect(summary).toMatchObject({ status: 'completed', completed: 2, failures: 1 });
  });

  it('records an executor that throws as UNRESOLVED without stopping the run', async () => {
    const tests = makeTests(2);
    const summary = await executeTests(
      tests,
      async (test) => {
        if (nameOf(test) === 't1.test') throw new Error('boom');
        return result(resultCodes.PASS);
      },
      { workers: 1 },
    );

    expect(tests[0].result?.code).toBe(resultCodes.UNRESOLVED);
    expect(tests[0].result?.output).toMatch(/^Exception during test execution: Error: boom/);
    expect(tests[1].result?.code).toBe(resultCodes.PASS);
    expect(summary.completed).toBe(2);
  });

  it('fills in elapsed time when the executor leaves it unset', async () => {
    const [test] = makeTests(1);
    await executeTests([test], async () => ({ code: resultCodes.PASS, output: '', elapsed: null }), { workers: 1 });
    expect(typeof test.result?.elapsed).toBe('number');
  });

  it('stops dispatching when the time budget runs out and skips the rest', async () => {
    vi.useFakeTimers();
    const tests = makeTests(5);
    const executor: TestExecutor = () =>
      new Promise((resolve) => setTimeout(() => resolve(result(resultCodes.PASS)), 100));

    const pending = executeTests(tests, executor, { workers: 1, maxTime: 0.15 });
    await vi.advanceTimersByTimeAsync(1_000);
    const summary = await pending;

    expect(tests.map((t) => t.state)).toEqual(['completed', 'completed', 'skipped', 'skipped', 'skipped']);
    expect(summary).toMatchObject({ status: 'max-time-exhausted', completed: 2, skipped: 3 });
  });

  it('returns at once with status aborted when interrupted', async () => {
    const tests = makeTests(3);
    const controller = new AbortController();
    const signals: AbortSignal[] = [];
    let markStarted: () => void = () => undefined;
    const started = new Promise<void>((resolve) => {
      markStarted = resolve;
    });

    const executor: TestExecutor = (_test, { signal }) => {
      signals.push(signal);
      markStarted();
      return new Promise((resolve) => {
        signal.addEventListener('abort', () => resolve(result(resultCodes.PASS)));
      });
    };

    const pending = executeTests(tests, executor, { workers: 1, signal: controller.signal });
    await started;
    controller.abort();
    const summary = await pending;
    await delay(0);

    expect(summary.status).toBe('aborted');
    expect(signals).toHaveLength(1);
    expect(signals[0].aborted).toBe(true);
    expect(tests[0].result).toBeNull();
    expect(tests[0].state).toBe('running');
    expect(tests.slice(1).map((t) => t.state)).toEqual(['skipped', 'skipped']);
  });

  it('runs nothing when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const executor = vi.fn<TestExecutor>();
    const summary = await executeTests(makeTests(2), executor, { workers: 2, signal: controller.signal });
    expect(summary.status).toBe('aborted');
    expect(executor).not.toHaveBeenCalled();
  });

  it('keeps the largest allowed timeout and budget armed', async () => {
    const tests = makeTests(3);
    const summary = await executeTests(
      tests,
      async () => {
        await delay(20);
        return result(resultCodes.PASS);
      },
      { workers: 1, timeout: MAX_TIMER_SECONDS, maxTime: MAX_TIMER_SECONDS },
    );
    expect(tests.map((t) => t.result?.code)).toEqual([resultCodes.PASS, resultCodes.PASS, resultCodes.PASS]);
    expect(summary).toMatchObject({ status: 'completed', completed: 3, skipped: 0 });
  });

  it('rejects time limits longer than a timer can hold', async () => {
    const executor = vi.fn<TestExecutor>();
    await expect(executeTests(makeTests(1), executor, { workers: 1, timeout: 3_000_000 })).rejects.toThrow(
      'timeout must be between 0 and 2147483 seconds, got 3000000',
    );
    await expect(executeTests(makeTests(1), executor, { workers: 1, maxTime: 3_000_000 })).rejects.toThrow(
      'maxTime must be between 0 and 2147483 seconds, got 3000000',
    );
    expect(executor).not.toHaveBeenCalled();
  });

  it('rejects a worker count below one', async () => {
    await expect(executeTests(makeTests(1), vi.fn<TestExecutor>(), { workers: 0 })).rejects.toThrow(
      'workers must be a positive integer, got 0',
    );
  });
});
