import fs from 'node:fs/promises';
import path from 'node:path';

import { ConfigurationError, MAX_TIMER_SECONDS } from '@tally/core';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

export const SUITE_CONFIG_FILE = 'tally.suite.yaml';

const suiteFileSchema = z
  .object({
    name: z.string().min(1),
    suffixes: z.array(z.string().min(1)).min(1).optional().default(['.test']),
    command: z.array(z.string().min(1)).min(1),
    exec_root: z.string().min(1).optional(),
    features: z.array(z.string().min(1)).optional().default([]),
    early: z.boolean().optional().default(false),
    xfail: z.array(z.string().min(1)).optional().default([]),
    retries: z.number().int().min(0).optional().default(0),
    timeout: z.number().min(0).max(MAX_TIMER_SECONDS, `must be at most ${MAX_TIMER_SECONDS} seconds`).optional(),
    env: z.record(z.string(), z.string()).optional().default({}),
  })
  .strict();

/** Everything a suite file declares, with paths resolved against the suite directory. */
export type SuiteDefinition = Readonly<{
  name: string;
  sourceRoot: string;
  execRoot: string;
  suffixes: readonly string[];
  command: readonly string[];
  features: readonly string[];
  early: boolean;
  /** Paths in suite, or directory prefixes ending in "/", expected to fail. */
  xfail: readonly string[];
  retries: number;
  timeout?: number;
  env: Readonly<Record<string, string>>;
}>;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

export function parseSuiteConfig(yamlText: string, suiteDir: string, sourceName = SUITE_CONFIG_FILE): SuiteDefinition {
  let parsed: unknown;
  try {
    parsed = parseYaml(yamlText);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`${sourceName}: ${message}`, 'INVALID_SUITE_CONFIG', { suiteDir });
  }

  const result = suiteFileSchema.safeParse(parsed ?? {});
  if (!result.success) {
    throw new ConfigurationError(`${sourceName}: ${describeIssues(result.error)}`, 'INVALID_SUITE_CONFIG', {
      suiteDir,
    });
  }

  const raw = result.data;
  return {
    name: raw.name,
    sourceRoot: suiteDir,
    execRoot: path.resolve(suiteDir, raw.exec_root ?? '.'),
    suffixes: raw.suffixes,
    command: raw.command,
    features: raw.features,
    early: raw.early,
    xfail: raw.xfail,
    retries: raw.retries,
    ...(raw.timeout !== undefined ? { timeout: raw.timeout } : {}),
    env: raw.env,
  };
}

export async function loadSuiteConfig(suiteDir: string): Promise<SuiteDefinition> {
  const filePath = path.join(suiteDir, SUITE_CONFIG_FILE);
  const content = await fs.readFile(filePath, 'utf-8');
  return parseSuiteConfig(content, suiteDir, filePath);
}

/** True when the test at `pathInSuite` is listed, directly or through a directory prefix, as expected to fail. */
export function isExpectedFailure(definition: SuiteDefinition, pathInSuite: readonly string[]): boolean {
  const joined = pathInSuite.join('/');
  return definition.xfail.some((entry) => (entry.endsWith('/') ? joined.startsWith(entry) : joined === entry));
}
