import { describe, expect, it } from 'vitest';

import { ConfigurationError } from './errors.js';
import { orderTests } from './orderer.js';
import { compileFilter, selectTests } from './selector.js';
import { TestCase, type Suite } from './testCase.js';

function catchConfigurationError(fn: () => unknown): ConfigurationError {
  try {
    fn();
  } catch (e) {
    if (e instanceof ConfigurationError) return e;
    throw e;
  }
  throw new Error('expected a ConfigurationError');
}

const suite: Suite = {
  name: 'demo',
  sourceRoot: '/src/demo',
  execRoot: '/build/demo',
  availableFeatures: [],
  config: { name: 'demo', availableFeatures: [] },
};

function makeTests(...names: string[]): TestCase[] {
  return names.map((name) => new TestCase(suite, [name], `/src/demo/${name}`));
}

function names(tests: readonly TestCase[]): string[] {
  return tests.map((t) => t.pathInSuite.join('/'));
}

const discovered = makeTests('a.test', 'early.test', 'one.test', 'store.test', 'zeta.test');

describe('selectTests', () => {
  it('returns every test when nothing narrows the selection', () => {
    expect(names(selectTests(discovered, {}))).toEqual(names(discovered));
  });

  it('keeps only tests whose full name matches the filter', () => {
    expect(names(selectTests(discovered, { filter: 'o[a-z]e' }))).toEqual(['one.test', 'store.test']);
  });

  it('matches the filter anywhere in the full name, including the suite name', () => {
    expect(selectTests(discovered, { filter: '^demo :: ' })).toHaveLength(5);
    expect(selectTests(discovered, { filter: '^a\\.test' })).toHaveLength(0);
  });

  it('applies the filter before sharding', () => {
    const notes: string[] = [];
    const selected = selectTests(discovered, { filter: 'o[a-z]e', shard: { numShards: 2, runShard: 2 } }, (m) =>
      notes.push(m),
    );
    expect(names(selected)).toEqual(['store.test']);
    expect(notes).toEqual(['Selecting shard 2/2 = size 1/2 = tests #(2*k)+2 = [2]']);
  });

  it('caps the selection at maxTests', () => {
    expect(names(selectTests(discovered, { maxTests: 3 }))).toEqual(['a.test', 'early.test', 'one.test']);
  });

  it('caps after sharding', () => {
    const selected = selectTests(discovered, { shard: { numShards: 2, runShard: 1 }, maxTests: 2 });
    expect(names(selected)).toEqual(['a.test', 'one.test']);
  });

  it('does not modify the input list', () => {
    selectTests(discovered, { filter: 'zeta', maxTests: 1 });
    expect(discovered).toHaveLength(5);
  });

  it('fails with INVALID_FILTER_PATTERN for a pattern that does not compile', () => {
    const err = catchConfigurationError(() => selectTests(discovered, { filter: '(unclosed' }));
    expect(err.code).toBe('INVALID_FILTER_PATTERN');
    expect(err.details).toEqual({ pattern: '(unclosed' });
  });

  it('rejects an invalid shard before returning anything', () => {
    expect(() => selectTests(discovered, { shard: { numShards: 3, runShard: 4 } })).toThrow(ConfigurationError);
  });
});

describe('compileFilter', () => {
  it('returns a reusable, non-global expression', () => {
    const rex = compileFilter('one');
    expect(rex.test('demo :: one.test')).toBe(true);
    expect(rex.test('demo :: one.test')).toBe(true);
  });
});

describe('selection followed by ordering', () => {
  // The cap is taken from discovery order, before ordering runs, so it may drop
  // tests that ordering would have put first.
  it('caps before ordering', () => {
    const tests = makeTests('zeta.test', 'mid.test', 'alpha.test');
    const selected = selectTests(tests, { maxTests: 2 });
    orderTests(selected, 'default');
    expect(names(selected)).toEqual(['mid.test', 'zeta.test']);
  });

  it('yields the same sequence for identical inputs', () => {
    const run = (): string[] => {
      const selected = selectTests(makeTests('d.test', 'b.test', 'c.test', 'a.test', 'e.test'), {
        filter: '[a-d]\\.test',
        shard: { numShards: 2, runShard: 1 },
      });
      return names(orderTests(selected, 'default'));
    };
    expect(run()).toEqual(['c.test', 'd.test']);
    expect(run()).toEqual(run());
  });
});
