import { ConfigurationError } from './errors.js';
import { partitionShard, type NoteSink } from './shard.js';
import type { TestCase } from './testCase.js';

export type SelectionOptions = Readonly<{
  filter?: string;
  shard?: Readonly<{ numShards: number; runShard: number }>;
  maxTests?: number;
}>;

/**
 * @throws ConfigurationError with code INVALID_FILTER_PATTERN if the pattern does not compile
 */
export function compileFilter(pattern: string): RegExp {
  try {
    return new RegExp(pattern);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(
      `invalid regular expression for filter: '${pattern}' (${reason})`,
      'INVALID_FILTER_PATTERN',
      { pattern },
    );
  }
}

/**
 * Narrows the discovered tests in a fixed order: name filter, then shard, then the
 * count cap. The cap keeps the first maxTests entries of the order it receives,
 * which is discovery order because ordering runs afterwards.
 */
export function selectTests(
  tests: readonly TestCase[],
  options: SelectionOptions,
  note?: NoteSink,
): TestCase[] {
  let selected = [...tests];

  if (options.filter !== undefined) {
    const rex = compileFilter(options.filter);
    selected = selected.filter((test) => rex.test(test.fullName));
  }

  if (options.shard) {
    selected = partitionShard(selected, options.shard.numShards, options.shard.runShard, note);
  }

  if (options.maxTests !== undefined) {
    selected = selected.slice(0, Math.max(0, options.maxTests));
  }

  return selected;
}
