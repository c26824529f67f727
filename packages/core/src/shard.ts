import { ConfigurationError } from './errors.js';

export type NoteSink = (message: string) => void;

const PREVIEW_LENGTH = 3;

/**
 * @throws ConfigurationError with code INVALID_SHARD_SPEC when numShards is not a
 * positive integer or runShard falls outside [1, numShards]
 */
export function validateShardSpec(numShards: number, runShard: number): void {
  if (!Number.isInteger(numShards) || numShards <= 0) {
    throw new ConfigurationError(
      `numShards requires a positive integer, but found '${numShards}'`,
      'INVALID_SHARD_SPEC',
      { numShards, runShard },
    );
  }
  if (!Number.isInteger(runShard) || runShard < 1 || runShard > numShards) {
    throw new ConfigurationError(
      `runShard must be between 1 and numShards (inclusive), but found ${runShard} of ${numShards}`,
      'INVALID_SHARD_SPEC',
      { numShards, runShard },
    );
  }
}

/**
 * Selects every numShards-th item starting at position runShard - 1 (runShard is
 * one-based). Shards are disjoint, cover the input, and differ in size by at most
 * one; shards past the end of a short list are empty.
 */
export function partitionShard<T>(
  items: readonly T[],
  numShards: number,
  runShard: number,
  note?: NoteSink,
): T[] {
  validateShardSpec(numShards, runShard);

  const indices: number[] = [];
  for (let i = runShard - 1; i < items.length; i += numShards) {
    indices.push(i);
  }

  if (note) {
    let preview = indices
      .slice(0, PREVIEW_LENGTH)
      .map((i) => String(i + 1))
      .join(', ');
    if (indices.length > PREVIEW_LENGTH) preview += ', ...';
    note(
      `Selecting shard ${runShard}/${numShards} = size ${indices.length}/${items.length} = ` +
        `tests #(${numShards}*k)+${runShard} = [${preview}]`,
    );
  }

  return indices.map((i) => items[i]);
}
