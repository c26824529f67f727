export type DiagnosticLevel = 'note' | 'warning' | 'error';

export type LineWriter = (line: string) => void;

/**
 * Collects notes, warnings and errors raised while preparing and running a
 * test run. Messages go to stderr as they happen; counts decide the exit code.
 */
export class Diagnostics {
  private warnings = 0;
  private errors = 0;

  constructor(private readonly write: LineWriter = (line) => console.error(line)) {}

  get warningCount(): number {
    return this.warnings;
  }

  get errorCount(): number {
    return this.errors;
  }

  note(message: string): void {
    this.emit('note', message);
  }

  warning(message: string): void {
    this.warnings += 1;
    this.emit('warning', message);
  }

  error(message: string): void {
    this.errors += 1;
    this.emit('error', message);
  }

  /** Prints the closing tallies. Returns true when errors were reported. */
  finish(): boolean {
    if (this.errors > 0) this.write(`\n${this.errors} error(s), exiting.`);
    if (this.warnings > 0) this.write(`\n${this.warnings} warning(s) in tests.`);
    return this.errors > 0;
  }

  private emit(level: DiagnosticLevel, message: string): void {
    this.write(`tally: ${level}: ${message}`);
  }
}
