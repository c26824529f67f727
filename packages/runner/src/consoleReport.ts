import {
  resultCodes,
  type AggregatedResults,
  type DisplayOptions,
  type ResultCode,
  type TestCase,
} from '@tally/core';

const STARS = '*'.repeat(20);
const LABEL_WIDTH = 19;
const SLOWEST_COUNT = 10;

const groups: readonly Readonly<{ title: string; code: ResultCode }>[] = [
  { title: 'Unexpectedly Passed Tests', code: resultCodes.XPASS },
  { title: 'Failed Tests', code: resultCodes.FAIL },
  { title: 'Unresolved Tests', code: resultCodes.UNRESOLVED },
  { title: 'Unsupported Tests', code: resultCodes.UNSUPPORTED },
  { title: 'Expectedly Failed Tests', code: resultCodes.XFAIL },
  { title: 'Timed Out Tests', code: resultCodes.TIMEOUT },
];

const summaryOrder: readonly ResultCode[] = [
  resultCodes.PASS,
  resultCodes.FLAKYPASS,
  resultCodes.XFAIL,
  resultCodes.UNSUPPORTED,
  resultCodes.UNRESOLVED,
  resultCodes.XPASS,
  resultCodes.FAIL,
  resultCodes.TIMEOUT,
];

function summaryLine(label: string, count: number): string {
  return `  ${label.padEnd(LABEL_WIDTH)}: ${count}`;
}

/**
 * Renders the end-of-run report: a block per interesting result code listing
 * its tests, the testing time, then a count per code that occurred.
 */
export function formatConsoleReport(
  aggregated: AggregatedResults,
  options: Readonly<{ display: DisplayOptions; elapsed: number }>,
): string[] {
  const { display } = options;
  const lines: string[] = [];

  for (const { title, code } of groups) {
    if (code === resultCodes.XFAIL && !display.showXfail) continue;
    if (code === resultCodes.UNSUPPORTED && !display.showUnsupported) continue;
    const tests = aggregated.byCode.get(code.name);
    if (!tests || tests.length === 0) continue;
    lines.push(STARS, `${title} (${tests.length}):`);
    for (const test of tests) lines.push(`    ${test.fullName}`);
    lines.push('');
  }

  if (!display.quiet) {
    lines.push(`Testing Time: ${options.elapsed.toFixed(2)}s`, '');
  }

  for (const code of summaryOrder) {
    if (display.quiet && !code.isFailure) continue;
    const count = aggregated.byCode.get(code.name)?.length ?? 0;
    if (count > 0) lines.push(summaryLine(code.label, count));
  }
  if (aggregated.skipped.length > 0) {
    lines.push(summaryLine('Not Run', aggregated.skipped.length));
  }

  return lines;
}

/** The slowest tests that produced a timing, longest first. */
export function formatSlowestTests(tests: readonly TestCase[], limit = SLOWEST_COUNT): string[] {
  const timed: { name: string; elapsed: number }[] = [];
  for (const test of tests) {
    const elapsed = test.result?.elapsed;
    if (typeof elapsed === 'number') timed.push({ name: test.fullName, elapsed });
  }
  if (timed.length === 0) return [];

  timed.sort((a, b) => b.elapsed - a.elapsed || (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  const shown = timed.slice(0, limit);
  const width = Math.max(...shown.map((t) => t.elapsed.toFixed(2).length));
  return [
    `Slowest Tests (${shown.length} of ${timed.length}):`,
    ...shown.map((t) => `  ${t.elapsed.toFixed(2).padStart(width)}s: ${t.name}`),
    '',
  ];
}
