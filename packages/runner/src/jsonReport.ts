import fs from 'node:fs/promises';
import path from 'node:path';

import type { Metrics, TestCase } from '@tally/core';

export const JSON_REPORT_SCHEMA = 'tally.results.v1';

export type JsonTestRecord = Readonly<{
  name: string;
  code: string;
  output: string;
  elapsed: number | null;
  metrics?: Metrics;
}>;

export type JsonReport = Readonly<{
  schema: typeof JSON_REPORT_SCHEMA;
  /** Wall-clock seconds for the whole run. */
  elapsed: number;
  tests: readonly JsonTestRecord[];
  /** Full names of selected tests that never ran. */
  skipped: readonly string[];
}>;

function hasEntries(metrics: Metrics | undefined): metrics is Metrics {
  return metrics !== undefined && Object.keys(metrics).length > 0;
}

/**
 * One record per executed test. Micro-results follow their parent as
 * `<parent name>:<key>`.
 */
export function buildJsonReport(tests: readonly TestCase[], elapsed: number): JsonReport {
  const records: JsonTestRecord[] = [];
  const skipped: string[] = [];

  for (const test of tests) {
    const result = test.result;
    if (!result) {
      skipped.push(test.fullName);
      continue;
    }
    records.push({
      name: test.fullName,
      code: result.code.name,
      output: result.output,
      elapsed: result.elapsed,
      ...(hasEntries(result.metrics) ? { metrics: result.metrics } : {}),
    });
    for (const [key, micro] of Object.entries(result.microResults ?? {})) {
      records.push({
        name: `${test.fullName}:${key}`,
        code: micro.code.name,
        output: micro.output,
        elapsed: micro.elapsed,
        ...(hasEntries(micro.metrics) ? { metrics: micro.metrics } : {}),
      });
    }
  }

  return { schema: JSON_REPORT_SCHEMA, elapsed, tests: records, skipped };
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeys(Reflect.get(value, key));
    }
    return sorted;
  }
  return value;
}

export function serializeJsonReport(report: JsonReport): string {
  return `${JSON.stringify(sortKeys(report), null, 2)}\n`;
}

async function writeJsonAtomic(filePath: string, text: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tmp = `${filePath}.tmp`;
  try {
    await fs.writeFile(tmp, text, 'utf-8');
    await fs.rename(tmp, filePath);
  } catch (err) {
    await fs.rm(tmp, { force: true });
    throw err;
  }
}

export async function writeJsonReport(filePath: string, report: JsonReport): Promise<void> {
  await writeJsonAtomic(filePath, serializeJsonReport(report));
}
