import fs from 'node:fs';

import type { OrderPolicy } from './config.js';
import type { TestCase } from './testCase.js';

export type OrderDeps = Readonly<{
  /** Returns a float in [0, 1). Defaults to Math.random. */
  random?: () => number;
  /** Modification time of the test's backing file in ms; defaults to a stat call. */
  mtimeOf?: (test: TestCase) => number;
}>;

export function fileMtimeOf(test: TestCase): number {
  try {
    return fs.statSync(test.filePath).mtimeMs;
  } catch {
    // Unreadable files order as the oldest.
    return 0;
  }
}

function shuffleInPlace<T>(items: T[], random: () => number): void {
  for (let i = items.length - 1; i > 0; i -= 1) {
    const j = Math.floor(random() * (i + 1));
    const tmp = items[i];
    items[i] = items[j];
    items[j] = tmp;
  }
}

function compareDefault(a: TestCase, b: TestCase): number {
  // Early tests first.
  if (a.early !== b.early) return a.early ? -1 : 1;

  // Full name, strict and locale-independent.
  const nameA = a.fullName;
  const nameB = b.fullName;
  if (nameA < nameB) return -1;
  if (nameA > nameB) return 1;
  return 0;
}

/**
 * Reorders the list in place:
 * - shuffle: uniform random permutation
 * - incremental: most recently modified backing file first
 * - default: early tests first, then by full name
 */
export function orderTests(tests: TestCase[], policy: OrderPolicy, deps: OrderDeps = {}): TestCase[] {
  if (policy === 'shuffle') {
    shuffleInPlace(tests, deps.random ?? Math.random);
    return tests;
  }

  if (policy === 'incremental') {
    const mtimeOf = deps.mtimeOf ?? fileMtimeOf;
    const mtimes = new Map<TestCase, number>();
    for (const test of tests) mtimes.set(test, mtimeOf(test));
    tests.sort((a, b) => (mtimes.get(b) ?? 0) - (mtimes.get(a) ?? 0));
    return tests;
  }

  tests.sort(compareDefault);
  return tests;
}
