export type ConfigurationErrorCode =
  | 'INVALID_SHARD_SPEC'
  | 'INVALID_FILTER_PATTERN'
  | 'CONFLICTING_OPTIONS'
  | 'INVALID_OPTION'
  | 'NO_SUITE'
  | 'INVALID_SUITE_CONFIG';

/** Raised for problems that must stop a run before any test executes. */
export class ConfigurationError extends Error {
  override name = 'ConfigurationError';

  constructor(
    message: string,
    public readonly code: ConfigurationErrorCode,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
  }
}

export type ReportWriteFailure = Readonly<{
  report: string;
  path: string;
  cause: Error;
}>;

/** Collects every report that could not be written once all reporters were attempted. */
export class ReportWriteError extends Error {
  override name = 'ReportWriteError';

  constructor(public readonly failures: readonly ReportWriteFailure[]) {
    super(
      [
        `Failed to write ${failures.length} report${failures.length === 1 ? '' : 's'}:`,
        ...failures.map((f) => `  ${f.report} (${f.path}): ${f.cause.message}`),
      ].join('\n'),
    );
  }
}
