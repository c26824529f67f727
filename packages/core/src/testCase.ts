import type { ResultCode } from './resultCode.js';

export type SuiteConfig = Readonly<{
  /** Grouping key for structured reports. */
  name: string;
  availableFeatures: readonly string[];
}>;

export type Suite = Readonly<{
  name: string;
  sourceRoot: string;
  execRoot: string;
  availableFeatures: readonly string[];
  config: SuiteConfig;
}>;

export type Metrics = Readonly<Record<string, number>>;

export type MicroResult = Readonly<{
  code: ResultCode;
  output: string;
  elapsed: number | null;
  metrics?: Metrics;
}>;

export type TestResult = Readonly<{
  code: ResultCode;
  output: string;
  /** Wall-clock seconds, or null when the executor could not measure it. */
  elapsed: number | null;
  metrics?: Metrics;
  microResults?: Readonly<Record<string, MicroResult>>;
}>;

export type TestState = 'pending' | 'running' | 'completed' | 'timed-out' | 'skipped';

export class TestCase {
  private currentState: TestState = 'pending';
  private currentResult: TestResult | null = null;

  constructor(
    readonly suite: Suite,
    readonly pathInSuite: readonly string[],
    readonly filePath: string,
    readonly early = false,
  ) {}

  get fullName(): string {
    return `${this.suite.config.name} :: ${this.pathInSuite.join('/')}`;
  }

  get state(): TestState {
    return this.currentState;
  }

  get result(): TestResult | null {
    return this.currentResult;
  }

  markRunning(): void {
    if (this.currentState !== 'pending') {
      throw new Error(`Cannot start '${this.fullName}' in state ${this.currentState}`);
    }
    this.currentState = 'running';
  }

  /** Attaches the result. A test accepts exactly one result. */
  complete(result: TestResult, timedOut = false): void {
    if (this.currentResult !== null) {
      throw new Error(`Result for '${this.fullName}' was already recorded`);
    }
    this.currentResult = result;
    this.currentState = timedOut ? 'timed-out' : 'completed';
  }

  markSkipped(): void {
    if (this.currentState !== 'pending') return;
    this.currentState = 'skipped';
  }
}

/**
 * The tests of one invocation. The list is replaced by selection and reordered
 * in place by ordering; during execution only the tests' own result slots change.
 */
export class Run {
  tests: TestCase[];
  readonly discoveredCount: number;

  constructor(tests: readonly TestCase[]) {
    this.tests = [...tests];
    this.discoveredCount = tests.length;
  }
}
