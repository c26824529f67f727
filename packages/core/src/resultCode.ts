export const resultCodeNames = [
  'PASS',
  'FLAKYPASS',
  'XFAIL',
  'UNSUPPORTED',
  'XPASS',
  'FAIL',
  'UNRESOLVED',
  'TIMEOUT',
] as const;
export type ResultCodeName = (typeof resultCodeNames)[number];

export type ResultCode = Readonly<{
  name: ResultCodeName;
  /** Human-readable label used in summaries. */
  label: string;
  isFailure: boolean;
}>;

function defineCode(name: ResultCodeName, label: string, isFailure: boolean): ResultCode {
  return Object.freeze({ name, label, isFailure });
}

/**
 * The closed set of outcomes a test can have. Each value is a frozen singleton,
 * so codes may be compared by identity.
 */
export const resultCodes = Object.freeze({
  PASS: defineCode('PASS', 'Passed', false),
  FLAKYPASS: defineCode('FLAKYPASS', 'Passed With Retry', false),
  XFAIL: defineCode('XFAIL', 'Expectedly Failed', false),
  UNSUPPORTED: defineCode('UNSUPPORTED', 'Unsupported', false),
  XPASS: defineCode('XPASS', 'Unexpectedly Passed', true),
  FAIL: defineCode('FAIL', 'Failed', true),
  UNRESOLVED: defineCode('UNRESOLVED', 'Unresolved', true),
  TIMEOUT: defineCode('TIMEOUT', 'Timed Out', true),
} satisfies Record<ResultCodeName, ResultCode>);

export function isResultCodeName(value: unknown): value is ResultCodeName {
  return typeof value === 'string' && (resultCodeNames as readonly string[]).includes(value);
}

export function getResultCode(name: ResultCodeName): ResultCode {
  return resultCodes[name];
}
