import type { DisplayOptions, TestCase } from '@tally/core';

import type { LineWriter } from './diagnostics.js';

const STARS = '*'.repeat(20);

export function formatHeader(selected: number, discovered: number, workers: number): string {
  const count = selected === discovered ? `${selected} tests` : `${selected} of ${discovered} tests`;
  return `-- Testing: ${count}, ${workers} workers --`;
}

/**
 * Live progress for a run. `update` is handed to the scheduler as its completion
 * callback, so lines appear in completion order.
 */
export class ProgressDisplay {
  private completed = 0;

  constructor(
    private readonly total: number,
    private readonly options: DisplayOptions,
    private readonly write: LineWriter = (line) => console.log(line),
  ) {}

  start(discovered: number, workers: number): void {
    if (this.options.quiet) return;
    this.write(formatHeader(this.total, discovered, workers));
  }

  readonly update = (test: TestCase): void => {
    this.completed += 1;
    const result = test.result;
    if (!result) return;

    const isFailure = result.code.isFailure;
    const showLine = isFailure || this.options.showAll || (!this.options.quiet && !this.options.succinct);
    if (!showLine) return;

    this.write(`${result.code.name}: ${test.fullName} (${this.completed} of ${this.total})`);

    if ((isFailure && this.options.verbose) || this.options.showAll) {
      this.write(`${STARS} TEST '${test.fullName}' ${isFailure ? 'FAILED' : 'RESULTS'} ${STARS}`);
      this.write(result.output);
      this.write(STARS);
    }
  };
}
