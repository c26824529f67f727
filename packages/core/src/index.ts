export {
  getResultCode,
  isResultCodeName,
  resultCodeNames,
  resultCodes,
  type ResultCode,
  type ResultCodeName,
} from './resultCode.js';

export {
  Run,
  TestCase,
  type Metrics,
  type MicroResult,
  type Suite,
  type SuiteConfig,
  type TestResult,
  type TestState,
} from './testCase.js';

export { ConfigurationError, ReportWriteError, type ConfigurationErrorCode, type ReportWriteFailure } from './errors.js';

export {
  orderPolicies,
  resolveRunConfiguration,
  type DisplayOptions,
  type OrderPolicy,
  type RunConfiguration,
  type RunConfigurationInput,
  type ShardSpec,
} from './config.js';

export { partitionShard, validateShardSpec, type NoteSink } from './shard.js';
export { compileFilter, selectTests, type SelectionOptions } from './selector.js';
export { fileMtimeOf, orderTests, type OrderDeps } from './orderer.js';
export {
  executeTests,
  MAX_TIMER_SECONDS,
  type ExecuteOptions,
  type ExecutionContext,
  type ExecutionStatus,
  type ExecutionSummary,
  type TestExecutor,
} from './scheduler.js';
export { aggregateResults, countByCode, type AggregatedResults } from './aggregator.js';
