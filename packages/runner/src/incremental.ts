import fs from 'node:fs/promises';

import type { TestCase } from '@tally/core';

import type { Diagnostics } from './diagnostics.js';

/**
 * Bumps the modification time of every failing test's file so the next
 * incremental run schedules it first.
 */
export async function touchFailingTests(
  tests: readonly TestCase[],
  diagnostics: Diagnostics,
  now: Date = new Date(),
): Promise<number> {
  let touched = 0;
  for (const test of tests) {
    if (!test.result?.code.isFailure) continue;
    try {
      await fs.utimes(test.filePath, now, now);
      touched += 1;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      diagnostics.warning(`unable to update the incremental cache for '${test.fullName}': ${message}`);
    }
  }
  return touched;
}
