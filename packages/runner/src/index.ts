export { main, VERSION, type MainDeps } from './cli.js';
export { formatConsoleReport, formatSlowestTests } from './consoleReport.js';
export { Diagnostics, type DiagnosticLevel, type LineWriter } from './diagnostics.js';
export { discoverTests, findSuiteDir, SuiteRegistry } from './discovery.js';
export { formatHeader, ProgressDisplay } from './display.js';
export { touchFailingTests } from './incremental.js';
export { buildJsonReport, JSON_REPORT_SCHEMA, serializeJsonReport, writeJsonReport, type JsonReport, type JsonTestRecord } from './jsonReport.js';
export { buildJunitReport, toCdata, toXmlText, writeJunitReport } from './junitReport.js';
export { formatSuiteListing, formatTestListing } from './listing.js';
export { parseCommandLine, usage, type CommandLine, type CommandLineDeps, type RunRequest } from './options.js';
export {
  createProcessExecutor,
  formatOutput,
  UNSUPPORTED_EXIT_CODE,
  type ProcessExecutorOptions,
  type SpawnedProcess,
  type SpawnLike,
} from './processExecutor.js';
export { runTests, writeReports, type RunDeps } from './run.js';
export {
  isExpectedFailure,
  loadSuiteConfig,
  parseSuiteConfig,
  SUITE_CONFIG_FILE,
  type SuiteDefinition,
} from './suiteConfig.js';
export { prepareTempDir, type TempDirHandle } from './tmpDir.js';
