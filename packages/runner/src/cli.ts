import { ConfigurationError, ReportWriteError, type TestExecutor } from '@tally/core';

import { Diagnostics, type LineWriter } from './diagnostics.js';
import { parseCommandLine, usage } from './options.js';
import { runTests } from './run.js';

export const VERSION = '0.1.0';

export type MainDeps = Readonly<{
  env?: NodeJS.ProcessEnv;
  write?: LineWriter;
  diagnostics?: Diagnostics;
  executor?: TestExecutor;
  signal?: AbortSignal;
}>;

/** Runs the CLI and resolves to the exit code. Unexpected errors propagate. */
export async function main(argv: readonly string[], deps: MainDeps = {}): Promise<number> {
  const env = deps.env ?? process.env;
  const write = deps.write ?? ((line: string) => console.log(line));
  const diagnostics = deps.diagnostics ?? new Diagnostics();

  try {
    const command = parseCommandLine(argv, { env });
    if (command.kind === 'help') {
      write(usage());
      return 0;
    }
    if (command.kind === 'version') {
      write(`tally ${VERSION}`);
      return 0;
    }
    return await runTests(command, {
      diagnostics,
      write,
      env,
      executor: deps.executor,
      signal: deps.signal,
    });
  } catch (err) {
    if (err instanceof ConfigurationError || err instanceof ReportWriteError) {
      diagnostics.error(err.message);
      diagnostics.finish();
      return 2;
    }
    throw err;
  }
}
