import { z } from 'zod';

import { ConfigurationError } from './errors.js';
import { MAX_TIMER_SECONDS } from './scheduler.js';
import { validateShardSpec } from './shard.js';
import { compileFilter } from './selector.js';

export const orderPolicies = ['default', 'shuffle', 'incremental'] as const;
export type OrderPolicy = (typeof orderPolicies)[number];

export type ShardSpec = Readonly<{ numShards: number; runShard: number }>;

export type DisplayOptions = Readonly<{
  quiet: boolean;
  succinct: boolean;
  verbose: boolean;
  showAll: boolean;
  showXfail: boolean;
  showUnsupported: boolean;
  timeTests: boolean;
}>;

/** Every knob the pipeline reads. Resolved once per invocation and frozen. */
export type RunConfiguration = Readonly<{
  workers: number;
  /** Per-test limit in seconds; 0 means unlimited. */
  timeout: number;
  /** Whole-run budget in seconds; 0 means unlimited. */
  maxTime: number;
  maxFailures?: number;
  filter?: string;
  shard?: ShardSpec;
  maxTests?: number;
  order: OrderPolicy;
  jsonOutput?: string;
  xunitOutput?: string;
  display: DisplayOptions;
}>;

const shardSchema = z
  .object({
    numShards: z.number().int(),
    runShard: z.number().int(),
  })
  .strict();

const displaySchema = z
  .object({
    quiet: z.boolean().optional().default(false),
    succinct: z.boolean().optional().default(false),
    verbose: z.boolean().optional().default(false),
    showAll: z.boolean().optional().default(false),
    showXfail: z.boolean().optional().default(false),
    showUnsupported: z.boolean().optional().default(false),
    timeTests: z.boolean().optional().default(false),
  })
  .strict();

const timerLimitMessage = `must be at most ${MAX_TIMER_SECONDS} seconds`;

const runConfigurationSchema = z
  .object({
    workers: z.number().int().min(1),
    timeout: z.number().min(0).max(MAX_TIMER_SECONDS, timerLimitMessage).optional().default(0),
    maxTime: z.number().min(0).max(MAX_TIMER_SECONDS, timerLimitMessage).optional().default(0),
    maxFailures: z.number().int().min(1).optional(),
    filter: z.string().optional(),
    shard: shardSchema.optional(),
    maxTests: z.number().int().min(1).optional(),
    order: z.enum(orderPolicies).optional().default('default'),
    jsonOutput: z.string().min(1).optional(),
    xunitOutput: z.string().min(1).optional(),
    display: displaySchema.optional().default({}),
  })
  .strict();

export type RunConfigurationInput = z.input<typeof runConfigurationSchema>;

function formatIssuePath(issuePath: readonly (string | number)[]): string {
  return issuePath.length > 0 ? issuePath.join('.') : '(root)';
}

/**
 * Validates raw settings and freezes them into the configuration every pipeline
 * stage reads. Shard and filter problems surface here, before anything runs.
 */
export function resolveRunConfiguration(input: RunConfigurationInput): RunConfiguration {
  const parsed = runConfigurationSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? formatIssuePath(issue.path) : '(root)';
    throw new ConfigurationError(
      `Invalid run configuration: ${where}: ${issue?.message ?? 'invalid value'}`,
      'INVALID_OPTION',
      { issues: parsed.error.issues.map((i) => ({ path: formatIssuePath(i.path), message: i.message })) },
    );
  }

  const raw = parsed.data;
  if (raw.shard) validateShardSpec(raw.shard.numShards, raw.shard.runShard);
  if (raw.filter !== undefined) compileFilter(raw.filter);

  return Object.freeze({
    workers: raw.workers,
    timeout: raw.timeout,
    maxTime: raw.maxTime,
    ...(raw.maxFailures !== undefined ? { maxFailures: raw.maxFailures } : {}),
    ...(raw.filter !== undefined ? { filter: raw.filter } : {}),
    ...(raw.shard ? { shard: Object.freeze({ ...raw.shard }) } : {}),
    ...(raw.maxTests !== undefined ? { maxTests: raw.maxTests } : {}),
    order: raw.order,
    ...(raw.jsonOutput !== undefined ? { jsonOutput: raw.jsonOutput } : {}),
    ...(raw.xunitOutput !== undefined ? { xunitOutput: raw.xunitOutput } : {}),
    display: Object.freeze({ ...raw.display }),
  });
}
