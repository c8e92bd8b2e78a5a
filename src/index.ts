export { HarnessError, HarnessErrorCode, isHarnessError } from './shared/errors.js';
export { parseSuite, loadSuite } from './suite/loader.js';
export { artifactPath, expectedOutputPath, resolveDependencies, buildInvocation } from './suite/resolver.js';
export type { InvocationSettings } from './suite/resolver.js';
export type { TestCase, Suite, SkipSetting, Invocation } from './suite/types.js';
export { ExecaProcessRunner } from './runner/process-runner.js';
export type { ProcessRunner, RunOptions, RunResult } from './runner/types.js';
export { runSuite, runCase } from './runner/driver.js';
export type { DriverSettings, DriverDeps } from './runner/driver.js';
export { evaluate, stdoutText } from './results/evaluator.js';
export type { Verdict, CaseReport, SuiteSummary } from './results/types.js';
export { resolveConfig, loadConfigFile, configFromEnv, DEFAULT_CONFIG } from './config/loader.js';
export type { HarnessConfig } from './config/loader.js';
export { formatCaseLine, formatSummary } from './report/format.js';
export { renderReport, writeReport } from './report/report-generator.js';
