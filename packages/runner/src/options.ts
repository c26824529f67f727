import os from 'node:os';
import { parseArgs } from 'node:util';

import {
  ConfigurationError,
  resolveRunConfiguration,
  type OrderPolicy,
  type RunConfiguration,
  type RunConfigurationInput,
} from '@tally/core';

const optionSpec = {
  filter: { type: 'string' },
  'num-shards': { type: 'string' },
  'run-shard': { type: 'string' },
  'max-tests': { type: 'string' },
  shuffle: { type: 'boolean' },
  incremental: { type: 'boolean' },
  workers: { type: 'string', short: 'j' },
  timeout: { type: 'string' },
  'max-time': { type: 'string' },
  'max-failures': { type: 'string' },
  output: { type: 'string', short: 'o' },
  'xunit-xml-output': { type: 'string' },
  quiet: { type: 'boolean', short: 'q' },
  succinct: { type: 'boolean', short: 's' },
  verbose: { type: 'boolean', short: 'v' },
  'show-all': { type: 'boolean', short: 'a' },
  'show-xfail': { type: 'boolean' },
  'show-unsupported': { type: 'boolean' },
  'time-tests': { type: 'boolean' },
  'show-suites': { type: 'boolean' },
  'show-tests': { type: 'boolean' },
  version: { type: 'boolean' },
  help: { type: 'boolean', short: 'h' },
} as const;

export function usage(): string {
  return [
    'Usage:',
    '  tally [options] <path...>',
    '',
    'Selection:',
    '  --filter <regex>          Only run tests whose full name matches (env: TALLY_FILTER)',
    '  --num-shards <n>          Split the tests into n shards (env: TALLY_NUM_SHARDS)',
    '  --run-shard <k>           Run shard k of n, counting from 1 (env: TALLY_RUN_SHARD)',
    '  --max-tests <n>           Run at most n tests',
    '  --shuffle                 Run tests in random order',
    '  --incremental             Run the most recently modified or failed tests first',
    '',
    'Execution:',
    '  -j, --workers <n>         Number of tests to run in parallel',
    '  --timeout <s>             Per-test time limit in seconds (0 = none)',
    '  --max-time <s>            Stop starting tests after s seconds (0 = none)',
    '  --max-failures <n>        Stop starting tests after n failures',
    '',
    'Output:',
    '  -q, --quiet               Only show failures',
    '  -s, --succinct            Only show failing tests while running',
    '  -v, --verbose             Show the output of failing tests',
    '  -a, --show-all            Show the output of every test',
    '  --show-xfail              List expectedly failed tests',
    '  --show-unsupported        List unsupported tests',
    '  --time-tests              List the slowest tests',
    '  -o, --output <path>       Write results as JSON',
    '  --xunit-xml-output <path> Write results as JUnit XML',
    '',
    'Information:',
    '  --show-suites             List the discovered suites and exit',
    '  --show-tests              List the discovered tests and exit',
    '  --version                 Print the version and exit',
    '  -h, --help                Print this help and exit',
  ].join('\n');
}

export type RunRequest = Readonly<{
  kind: 'run';
  inputs: readonly string[];
  config: RunConfiguration;
  /** True when --timeout was given, so it overrides what suites request. */
  timeoutExplicit: boolean;
  showSuites: boolean;
  showTests: boolean;
}>;

export type CommandLine = Readonly<{ kind: 'help' }> | Readonly<{ kind: 'version' }> | RunRequest;

export type CommandLineDeps = Readonly<{
  env?: NodeJS.ProcessEnv;
  defaultWorkers?: () => number;
}>;

type IntegerSource = Readonly<{ label: string; raw: string }>;

function parseInteger(
  source: IntegerSource,
  min: 0 | 1,
  code: 'INVALID_OPTION' | 'INVALID_SHARD_SPEC' = 'INVALID_OPTION',
): number {
  const kind = min === 0 ? 'non-negative' : 'positive';
  const value = /^\s*\+?\d+\s*$/.test(source.raw) ? Number(source.raw) : Number.NaN;
  if (!Number.isSafeInteger(value) || value < min) {
    throw new ConfigurationError(`${source.label}: requires ${kind} integer, but found '${source.raw}'`, code, {
      option: source.label,
      value: source.raw,
    });
  }
  return value;
}

function fromFlagOrEnv(
  flag: string,
  value: string | undefined,
  envName: string,
  env: NodeJS.ProcessEnv,
): IntegerSource | undefined {
  if (value !== undefined) return { label: `argument --${flag}`, raw: value };
  const fromEnv = env[envName];
  if (fromEnv !== undefined && fromEnv !== '') return { label: `environment variable ${envName}`, raw: fromEnv };
  return undefined;
}

function fromFlag(flag: string, value: string | undefined): IntegerSource | undefined {
  return value === undefined ? undefined : { label: `argument --${flag}`, raw: value };
}

function parseArgv(argv: readonly string[]) {
  try {
    return parseArgs({ args: [...argv], options: optionSpec, allowPositionals: true, strict: true });
  } catch (err) {
    if (err instanceof TypeError) throw new ConfigurationError(err.message, 'INVALID_OPTION');
    throw err;
  }
}

/**
 * Turns argv and the environment into a validated run request. Flags win over
 * environment variables; problems surface as ConfigurationError before any
 * test is discovered.
 */
export function parseCommandLine(argv: readonly string[], deps: CommandLineDeps = {}): CommandLine {
  const env = deps.env ?? process.env;
  const { values, positionals } = parseArgv(argv);

  if (values.help) return { kind: 'help' };
  if (values.version) return { kind: 'version' };

  if (values.shuffle && values.incremental) {
    throw new ConfigurationError('argument --incremental: not allowed with argument --shuffle', 'CONFLICTING_OPTIONS');
  }

  const numShardsSource = fromFlagOrEnv('num-shards', values['num-shards'], 'TALLY_NUM_SHARDS', env);
  const runShardSource = fromFlagOrEnv('run-shard', values['run-shard'], 'TALLY_RUN_SHARD', env);
  if ((numShardsSource === undefined) !== (runShardSource === undefined)) {
    throw new ConfigurationError('--num-shards and --run-shard must be used together', 'CONFLICTING_OPTIONS');
  }
  const shard =
    numShardsSource && runShardSource
      ? {
          numShards: parseInteger(numShardsSource, 1, 'INVALID_SHARD_SPEC'),
          runShard: parseInteger(runShardSource, 1, 'INVALID_SHARD_SPEC'),
        }
      : undefined;

  if (positionals.length === 0) {
    throw new ConfigurationError('no test paths given', 'INVALID_OPTION');
  }

  const workersSource = fromFlag('workers', values.workers);
  const timeoutSource = fromFlag('timeout', values.timeout);
  const maxTimeSource = fromFlag('max-time', values['max-time']);
  const maxFailuresSource = fromFlag('max-failures', values['max-failures']);
  const maxTestsSource = fromFlag('max-tests', values['max-tests']);
  const envFilter = env.TALLY_FILTER;
  const filter = values.filter ?? (envFilter !== undefined && envFilter !== '' ? envFilter : undefined);

  let order: OrderPolicy = 'default';
  if (values.shuffle) order = 'shuffle';
  else if (values.incremental) order = 'incremental';

  const input: RunConfigurationInput = {
    workers: workersSource ? parseInteger(workersSource, 1) : (deps.defaultWorkers ?? os.availableParallelism)(),
    ...(timeoutSource ? { timeout: parseInteger(timeoutSource, 0) } : {}),
    ...(maxTimeSource ? { maxTime: parseInteger(maxTimeSource, 0) } : {}),
    ...(maxFailuresSource ? { maxFailures: parseInteger(maxFailuresSource, 1) } : {}),
    ...(maxTestsSource ? { maxTests: parseInteger(maxTestsSource, 1) } : {}),
    ...(filter !== undefined ? { filter } : {}),
    ...(shard ? { shard } : {}),
    order,
    ...(values.output !== undefined ? { jsonOutput: values.output } : {}),
    ...(values['xunit-xml-output'] !== undefined ? { xunitOutput: values['xunit-xml-output'] } : {}),
    display: {
      quiet: values.quiet ?? false,
      succinct: values.succinct ?? false,
      verbose: values.verbose ?? false,
      showAll: values['show-all'] ?? false,
      showXfail: values['show-xfail'] ?? false,
      showUnsupported: values['show-unsupported'] ?? false,
      timeTests: values['time-tests'] ?? false,
    },
  };

  return {
    kind: 'run',
    inputs: positionals,
    config: resolveRunConfiguration(input),
    timeoutExplicit: timeoutSource !== undefined,
    showSuites: values['show-suites'] ?? false,
    showTests: values['show-tests'] ?? false,
  };
}
