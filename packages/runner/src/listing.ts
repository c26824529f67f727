import type { Suite, TestCase } from '@tally/core';

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function groupBySuite(tests: readonly TestCase[]): [Suite, TestCase[]][] {
  const bySuite = new Map<Suite, TestCase[]>();
  for (const test of tests) {
    const group = bySuite.get(test.suite);
    if (group) group.push(test);
    else bySuite.set(test.suite, [test]);
  }
  return [...bySuite.entries()].sort(([a], [b]) => compareStrings(a.name, b.name));
}

export function formatSuiteListing(tests: readonly TestCase[]): string[] {
  const lines = ['-- Test Suites --'];
  for (const [suite, suiteTests] of groupBySuite(tests)) {
    lines.push(`  ${suite.name} - ${suiteTests.length} tests`);
    lines.push(`    Source Root: ${suite.sourceRoot}`);
    lines.push(`    Exec Root  : ${suite.execRoot}`);
    if (suite.availableFeatures.length > 0) {
      lines.push(`    Available Features : ${[...suite.availableFeatures].sort().join(' ')}`);
    }
  }
  return lines;
}

export function formatTestListing(tests: readonly TestCase[]): string[] {
  const lines = ['-- Available Tests --'];
  for (const [, suiteTests] of groupBySuite(tests)) {
    const sorted = [...suiteTests].sort((a, b) => compareStrings(a.pathInSuite.join('/'), b.pathInSuite.join('/')));
    for (const test of sorted) lines.push(`  ${test.fullName}`);
  }
  return lines;
}
