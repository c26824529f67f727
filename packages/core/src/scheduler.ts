import { resultCodes } from './resultCode.js';
import type { TestCase, TestResult } from './testCase.js';

export type ExecutionContext = Readonly<{
  /** Per-test limit in seconds; 0 means unlimited. */
  timeout: number;
  /** Aborted when the test times out or the run is interrupted. */
  signal: AbortSignal;
}>;

/**
 * Runs a single test. Expected failures are reported through the result code;
 * anything thrown is recorded as UNRESOLVED.
 */
export type TestExecutor = (test: TestCase, context: ExecutionContext) => Promise<TestResult>;

export type ExecutionStatus = 'completed' | 'max-time-exhausted' | 'max-failures-reached' | 'aborted';

export type ExecuteOptions = Readonly<{
  workers: number;
  timeout?: number;
  maxTime?: number;
  maxFailures?: number;
  /**
   * Invoked synchronously by whichever worker finished the test, so calls follow
   * completion order rather than dispatch order. Must return quickly.
   */
  onComplete?: (test: TestCase) => void;
  /** Interrupts the whole run. */
  signal?: AbortSignal;
}>;

export type ExecutionSummary = Readonly<{
  status: ExecutionStatus;
  workers: number;
  completed: number;
  skipped: number;
  failures: number;
  /** Wall-clock seconds. */
  elapsed: number;
}>;

/** Longest delay a Node timer holds; larger values fire after 1 ms. */
export const MAX_TIMER_SECONDS = Math.floor((2 ** 31 - 1) / 1000);

function checkTimerSeconds(name: string, value: number): void {
  if (!(value >= 0 && value <= MAX_TIMER_SECONDS)) {
    throw new Error(`${name} must be between 0 and ${MAX_TIMER_SECONDS} seconds, got ${value}`);
  }
}

type Outcome = Readonly<{ result: TestResult; timedOut: boolean }>;

function secondsSince(startMs: number): number {
  return (performance.now() - startMs) / 1000;
}

function unresolvedResult(err: unknown, elapsed: number): TestResult {
  const detail = err instanceof Error ? err.stack ?? err.message : String(err);
  return {
    code: resultCodes.UNRESOLVED,
    output: `Exception during test execution: ${detail}`,
    elapsed,
  };
}

function runWithTimeout(
  test: TestCase,
  executor: TestExecutor,
  timeout: number,
  controller: AbortController,
): Promise<Outcome> {
  const startMs = performance.now();
  const action = Promise.resolve().then(() => executor(test, { timeout, signal: controller.signal }));

  return new Promise<Outcome>((resolve) => {
    let settled = false;
    const timer =
      timeout > 0
        ? setTimeout(() => {
            if (settled) return;
            settled = true;
            controller.abort();
            resolve({
              result: {
                code: resultCodes.TIMEOUT,
                output: `Reached timeout of ${timeout} seconds`,
                elapsed: secondsSince(startMs),
              },
              timedOut: true,
            });
          }, timeout * 1000)
        : undefined;

    action.then(
      (result) => {
        if (timer) clearTimeout(timer);
        if (settled) return;
        settled = true;
        resolve({
          result: result.elapsed === null ? { ...result, elapsed: secondsSince(startMs) } : result,
          timedOut: false,
        });
      },
      (err: unknown) => {
        if (timer) clearTimeout(timer);
        if (settled) return;
        settled = true;
        resolve({ result: unresolvedResult(err, secondsSince(startMs)), timedOut: false });
      },
    );
  });
}

/**
 * Runs the tests with a bounded pool of workers pulling from a shared cursor, so
 * dispatch follows list order.
 *
 * Hitting the global time budget or the failure threshold stops dispatch: tests
 * already running finish and are recorded, tests never started are marked skipped.
 * An abort through `signal` returns at once with status "aborted" and signals
 * every running executor; completions arriving afterwards are dropped.
 */
export async function executeTests(
  tests: readonly TestCase[],
  executor: TestExecutor,
  options: ExecuteOptions,
): Promise<ExecutionSummary> {
  if (!Number.isInteger(options.workers) || options.workers < 1) {
    throw new Error(`workers must be a positive integer, got ${options.workers}`);
  }

  const workerCount = Math.min(tests.length, options.workers);
  const timeout = options.timeout ?? 0;
  const maxTime = options.maxTime ?? 0;
  checkTimerSeconds('timeout', timeout);
  checkTimerSeconds('maxTime', maxTime);
  const startMs = performance.now();

  let cursor = 0;
  let completed = 0;
  let failures = 0;
  const halt: { reason: Exclude<ExecutionStatus, 'completed'> | null; internalError: { error: unknown } | null } = {
    reason: null,
    internalError: null,
  };
  const inFlight = new Set<AbortController>();

  const stop = (reason: Exclude<ExecutionStatus, 'completed'>): void => {
    if (halt.reason === null) halt.reason = reason;
  };

  const nextTest = (): TestCase | null => {
    if (halt.reason !== null || halt.internalError !== null || cursor >= tests.length) return null;
    const test = tests[cursor];
    cursor += 1;
    return test;
  };

  const record = (test: TestCase, outcome: Outcome): void => {
    if (halt.reason === 'aborted') return;
    test.complete(outcome.result, outcome.timedOut);
    completed += 1;
    if (outcome.result.code.isFailure) {
      failures += 1;
      if (options.maxFailures !== undefined && failures >= options.maxFailures) {
        stop('max-failures-reached');
      }
    }
    options.onComplete?.(test);
  };

  const workerLoop = async (): Promise<void> => {
    try {
      for (let test = nextTest(); test !== null; test = nextTest()) {
        test.markRunning();
        const controller = new AbortController();
        inFlight.add(controller);
        try {
          record(test, await runWithTimeout(test, executor, timeout, controller));
        } finally {
          inFlight.delete(controller);
        }
      }
    } catch (error) {
      halt.internalError ??= { error };
    }
  };

  const budgetTimer = maxTime > 0 ? setTimeout(() => stop('max-time-exhausted'), maxTime * 1000) : undefined;

  const signal = options.signal;
  let resolveAborted: () => void = () => undefined;
  const aborted = new Promise<void>((resolve) => {
    resolveAborted = resolve;
  });
  const onAbort = (): void => {
    stop('aborted');
    for (const controller of inFlight) controller.abort();
    resolveAborted();
  };
  if (signal?.aborted) onAbort();
  else signal?.addEventListener('abort', onAbort, { once: true });

  try {
    const drained = Promise.all(Array.from({ length: workerCount }, () => workerLoop()));
    await (signal ? Promise.race([drained, aborted]) : drained);
  } finally {
    if (budgetTimer) clearTimeout(budgetTimer);
    signal?.removeEventListener('abort', onAbort);
  }

  if (halt.internalError !== null && halt.reason !== 'aborted') {
    throw halt.internalError.error;
  }

  let skipped = 0;
  for (const test of tests) {
    test.markSkipped();
    if (test.state === 'skipped') skipped += 1;
  }

  let status: ExecutionStatus = 'completed';
  if (halt.reason === 'aborted') status = 'aborted';
  else if (halt.reason !== null && skipped > 0) status = halt.reason;

  return {
    status,
    workers: workerCount,
    completed,
    skipped,
    failures,
    elapsed: secondsSince(startMs),
  };
}
