import fs from 'node:fs/promises';
import path from 'node:path';

import { ConfigurationError, TestCase, type Suite } from '@tally/core';

import type { Diagnostics } from './diagnostics.js';
import { loadSuiteConfig, SUITE_CONFIG_FILE, type SuiteDefinition } from './suiteConfig.js';

const SKIPPED_DIRS = new Set(['node_modules', '.git']);

async function isFile(filePath: string): Promise<boolean> {
  return fs
    .stat(filePath)
    .then((s) => s.isFile())
    .catch(() => false);
}

/** Walks up from `start` (inclusive) to the first directory holding a suite file. */
export async function findSuiteDir(start: string): Promise<string | null> {
  let dir = path.resolve(start);
  for (;;) {
    if (await isFile(path.join(dir, SUITE_CONFIG_FILE))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

async function walkTestFiles(dir: string, suffixes: readonly string[]): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const found: string[] = [];
  for (const entry of entries) {
    if (entry.name.startsWith('.') || SKIPPED_DIRS.has(entry.name)) continue;
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      found.push(...(await walkTestFiles(full, suffixes)));
    } else if (entry.isFile() && suffixes.some((suffix) => entry.name.endsWith(suffix))) {
      found.push(full);
    }
  }
  return found;
}

/**
 * Loads each suite once and remembers how it was declared, so collaborators
 * that need more than the core Suite (the process executor, listings) can look
 * it up again.
 */
export class SuiteRegistry {
  private readonly byDir = new Map<string, Promise<Suite>>();
  private readonly definitions = new Map<Suite, SuiteDefinition>();

  constructor(private readonly load: (suiteDir: string) => Promise<SuiteDefinition> = loadSuiteConfig) {}

  suiteAt(suiteDir: string): Promise<Suite> {
    const cached = this.byDir.get(suiteDir);
    if (cached) return cached;
    const pending = this.load(suiteDir).then((definition) => {
      const suite: Suite = {
        name: definition.name,
        sourceRoot: definition.sourceRoot,
        execRoot: definition.execRoot,
        availableFeatures: definition.features,
        config: { name: definition.name, availableFeatures: definition.features },
      };
      this.definitions.set(suite, definition);
      return suite;
    });
    this.byDir.set(suiteDir, pending);
    return pending;
  }

  definitionOf(suite: Suite): SuiteDefinition {
    const definition = this.definitions.get(suite);
    if (!definition) throw new Error(`Suite '${suite.name}' was not loaded by this registry`);
    return definition;
  }

  get loadedSuites(): readonly Suite[] {
    return [...this.definitions.keys()];
  }
}

function toPathInSuite(suiteDir: string, filePath: string): string[] {
  return path.relative(suiteDir, filePath).split(path.sep);
}

/**
 * Resolves each input path to the tests it names. Directories contribute every
 * file ending in one of the suite's suffixes, in sorted order; a file named
 * directly is a test regardless of suffix. Duplicates keep their first position.
 */
export async function discoverTests(
  inputs: readonly string[],
  diagnostics: Diagnostics,
  registry: SuiteRegistry = new SuiteRegistry(),
): Promise<TestCase[]> {
  const tests: TestCase[] = [];
  const seen = new Set<string>();

  for (const input of inputs) {
    const absolute = path.resolve(input);
    const stat = await fs.stat(absolute).catch(() => null);
    if (!stat) {
      diagnostics.warning(`input '${input}' does not exist`);
      continue;
    }

    const suiteDir = await findSuiteDir(stat.isDirectory() ? absolute : path.dirname(absolute));
    if (!suiteDir) {
      diagnostics.error(`unable to find test suite for '${input}'`);
      continue;
    }

    let suite: Suite;
    try {
      suite = await registry.suiteAt(suiteDir);
    } catch (err) {
      if (!(err instanceof ConfigurationError)) throw err;
      diagnostics.error(err.message);
      continue;
    }
    const definition = registry.definitionOf(suite);

    const files = stat.isDirectory() ? (await walkTestFiles(absolute, definition.suffixes)).sort() : [absolute];
    const before = tests.length;
    for (const filePath of files) {
      if (seen.has(filePath)) continue;
      seen.add(filePath);
      tests.push(new TestCase(suite, toPathInSuite(suiteDir, filePath), filePath, definition.early));
    }
    if (tests.length === before) {
      diagnostics.warning(`input '${input}' contained no tests`);
    }
  }

  return tests;
}
