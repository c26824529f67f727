import {
  aggregateResults,
  ConfigurationError,
  executeTests,
  orderTests,
  ReportWriteError,
  Run,
  selectTests,
  type ExecutionStatus,
  type ExecutionSummary,
  type ReportWriteFailure,
  type RunConfiguration,
  type TestCase,
  type TestExecutor,
} from '@tally/core';

import { formatConsoleReport, formatSlowestTests } from './consoleReport.js';
import type { Diagnostics, LineWriter } from './diagnostics.js';
import { discoverTests, SuiteRegistry } from './discovery.js';
import { ProgressDisplay } from './display.js';
import { touchFailingTests } from './incremental.js';
import { buildJsonReport, writeJsonReport } from './jsonReport.js';
import { buildJunitReport, writeJunitReport } from './junitReport.js';
import { formatSuiteListing, formatTestListing } from './listing.js';
import type { RunRequest } from './options.js';
import { createProcessExecutor } from './processExecutor.js';
import { prepareTempDir } from './tmpDir.js';

export type RunDeps = Readonly<{
  diagnostics: Diagnostics;
  /** Receives report and progress lines (stdout). */
  write?: LineWriter;
  env?: NodeJS.ProcessEnv;
  registry?: SuiteRegistry;
  /** Replaces the process executor. */
  executor?: TestExecutor;
  signal?: AbortSignal;
  random?: () => number;
}>;

function resolveTimeout(request: RunRequest, registry: SuiteRegistry, diagnostics: Diagnostics): number {
  const requested: number[] = [];
  for (const suite of registry.loadedSuites) {
    const timeout = registry.definitionOf(suite).timeout;
    if (timeout !== undefined) requested.push(timeout);
  }
  if (requested.length === 0) return request.config.timeout;

  const suiteTimeout = Math.max(...requested);
  if (!request.timeoutExplicit) return suiteTimeout;

  const cliTimeout = request.config.timeout;
  if (cliTimeout !== suiteTimeout) {
    diagnostics.note(
      `The test suite configuration requested an individual test timeout of ${suiteTimeout} seconds but a ` +
        `timeout of ${cliTimeout} seconds was requested on the command line. Forcing timeout to be ${cliTimeout} seconds`,
    );
  }
  return cliTimeout;
}

function describeStop(status: Exclude<ExecutionStatus, 'completed' | 'aborted'>, config: RunConfiguration): string {
  switch (status) {
    case 'max-time-exhausted':
      return `reaching the maximum testing time of ${config.maxTime} seconds`;
    case 'max-failures-reached':
      return `reaching ${config.maxFailures ?? 0} failures`;
  }
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/** Attempts every requested report, then fails with all problems at once. */
export async function writeReports(config: RunConfiguration, tests: readonly TestCase[], elapsed: number): Promise<void> {
  const failures: ReportWriteFailure[] = [];

  const jsonOutput = config.jsonOutput;
  if (jsonOutput !== undefined) {
    try {
      await writeJsonReport(jsonOutput, buildJsonReport(tests, elapsed));
    } catch (err) {
      failures.push({ report: 'json', path: jsonOutput, cause: toError(err) });
    }
  }

  const xunitOutput = config.xunitOutput;
  if (xunitOutput !== undefined) {
    try {
      await writeJunitReport(xunitOutput, buildJunitReport(tests));
    } catch (err) {
      failures.push({ report: 'junit', path: xunitOutput, cause: toError(err) });
    }
  }

  if (failures.length > 0) throw new ReportWriteError(failures);
}

/**
 * Discovers, selects, orders, executes and reports. Resolves to the process
 * exit code: 0 when everything passed, 1 when a test failed, 2 when errors
 * were reported or the run was interrupted.
 */
export async function runTests(request: RunRequest, deps: RunDeps): Promise<number> {
  const { diagnostics } = deps;
  const write = deps.write ?? ((line: string) => console.log(line));
  const env = deps.env ?? process.env;
  const registry = deps.registry ?? new SuiteRegistry();
  const config = request.config;

  const discovered = await discoverTests(request.inputs, diagnostics, registry);
  if (discovered.length === 0) {
    throw new ConfigurationError('did not discover any tests for the given paths', 'NO_SUITE', {
      inputs: request.inputs,
    });
  }

  if (request.showSuites || request.showTests) {
    if (request.showSuites) formatSuiteListing(discovered).forEach((line) => write(line));
    if (request.showTests) formatTestListing(discovered).forEach((line) => write(line));
    return diagnostics.finish() ? 2 : 0;
  }

  const timeout = resolveTimeout(request, registry, diagnostics);

  const run = new Run(discovered);
  run.tests = selectTests(run.tests, config, (message) => diagnostics.note(message));
  orderTests(run.tests, config.order, deps.random ? { random: deps.random } : {});

  const executor =
    deps.executor ??
    createProcessExecutor({ definitionOf: (test) => registry.definitionOf(test.suite), env: () => env });
  const display = new ProgressDisplay(run.tests.length, config.display, write);
  display.start(run.discoveredCount, Math.min(run.tests.length, config.workers));

  const tempDir = await prepareTempDir(env, diagnostics);
  let summary: ExecutionSummary;
  try {
    summary = await executeTests(run.tests, executor, {
      workers: config.workers,
      timeout,
      maxTime: config.maxTime,
      ...(config.maxFailures !== undefined ? { maxFailures: config.maxFailures } : {}),
      onComplete: display.update,
      ...(deps.signal ? { signal: deps.signal } : {}),
    });
  } finally {
    await tempDir?.cleanup();
  }

  if (summary.status === 'aborted') {
    diagnostics.error(`interrupted; ${summary.skipped} tests not run and no reports written`);
    diagnostics.finish();
    return 2;
  }
  if (summary.status !== 'completed') {
    diagnostics.note(`Stopped after ${describeStop(summary.status, config)}; ${summary.skipped} tests not run`);
  }

  if (config.order === 'incremental') {
    await touchFailingTests(run.tests, diagnostics);
  }

  if (config.display.timeTests) {
    formatSlowestTests(run.tests).forEach((line) => write(line));
  }
  const aggregated = aggregateResults(run.tests);
  formatConsoleReport(aggregated, { display: config.display, elapsed: summary.elapsed }).forEach((line) => write(line));

  await writeReports(config, run.tests, summary.elapsed);

  if (diagnostics.finish()) return 2;
  return aggregated.hasFailures ? 1 : 0;
}
