import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import type { Diagnostics } from './diagnostics.js';

const TEMP_VARS = ['TMPDIR', 'TMP', 'TEMP', 'TEMPDIR'] as const;

export type TempDirHandle = Readonly<{
  dir: string;
  /** Restores the environment and deletes the directory. */
  cleanup: () => Promise<void>;
}>;

/**
 * Gives the run a private temp directory and points the usual temp variables at
 * it. Returns null when `TALLY_PRESERVES_TMP` is set.
 */
export async function prepareTempDir(
  env: NodeJS.ProcessEnv,
  diagnostics: Diagnostics,
): Promise<TempDirHandle | null> {
  if (env.TALLY_PRESERVES_TMP) return null;

  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'tally-'));
  const previous = new Map<string, string | undefined>(TEMP_VARS.map((name) => [name, env[name]]));
  for (const name of TEMP_VARS) env[name] = dir;

  return {
    dir,
    cleanup: async () => {
      for (const [name, value] of previous) {
        if (value === undefined) delete env[name];
        else env[name] = value;
      }
      try {
        await fs.rm(dir, { recursive: true, force: true });
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        diagnostics.warning(`failed to delete temp directory '${dir}': ${message}`);
      }
    },
  };
}
