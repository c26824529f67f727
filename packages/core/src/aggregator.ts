import type { ResultCodeName } from './resultCode.js';
import type { TestCase } from './testCase.js';

export type AggregatedResults = Readonly<{
  /** Tests grouped by result code, each group in list order. */
  byCode: ReadonlyMap<ResultCodeName, readonly TestCase[]>;
  /** Tests that never ran; they carry no result and sit outside byCode. */
  skipped: readonly TestCase[];
  hasFailures: boolean;
}>;

export function aggregateResults(tests: readonly TestCase[]): AggregatedResults {
  const byCode = new Map<ResultCodeName, TestCase[]>();
  const skipped: TestCase[] = [];
  let hasFailures = false;

  for (const test of tests) {
    const result = test.result;
    if (!result) {
      skipped.push(test);
      continue;
    }
    const group = byCode.get(result.code.name);
    if (group) group.push(test);
    else byCode.set(result.code.name, [test]);
    if (result.code.isFailure) hasFailures = true;
  }

  return { byCode, skipped, hasFailures };
}

export function countByCode(aggregated: AggregatedResults): Record<ResultCodeName, number> {
  const count = (name: ResultCodeName): number => aggregated.byCode.get(name)?.length ?? 0;
  return {
    PASS: count('PASS'),
    FLAKYPASS: count('FLAKYPASS'),
    XFAIL: count('XFAIL'),
    UNSUPPORTED: count('UNSUPPORTED'),
    XPASS: count('XPASS'),
    FAIL: count('FAIL'),
    UNRESOLVED: count('UNRESOLVED'),
    TIMEOUT: count('TIMEOUT'),
  };
}
