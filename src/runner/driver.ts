import fs from 'fs/promises';
import path from 'path';
import { HarnessError, HarnessErrorCode, isHarnessError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { evaluate } from '../results/evaluator.js';
import { ResultsTracker } from '../results/tracker.js';
import { fail, skip } from '../results/types.js';
import type { CaseReport, SuiteSummary, Verdict } from '../results/types.js';
import { buildInvocation, expectedOutputPath } from '../suite/resolver.js';
import type { InvocationSettings } from '../suite/resolver.js';
import type { Suite, TestCase } from '../suite/types.js';
import type { ProcessRunner } from './types.js';

export const DEFAULT_SKIP_REASON = 'skipped';
export const FAIL_FAST_SKIP_REASON = 'fail-fast: earlier case failed';

export interface DriverSettings extends InvocationSettings {
  /** Directory the tool runs in and that relative paths resolve against; defaults to process.cwd(). */
  cwd?: string;
  timeoutMs: number;
  filter?: string;
  failFast: boolean;
}

export interface DriverDeps {
  runner: ProcessRunner;
  /** Called with each case's report as soon as its verdict is known. */
  onCase?: (report: CaseReport) => void;
}

export function skipReason(testCase: TestCase): string | undefined {
  if (testCase.skip === false) return undefined;
  return testCase.skip === true ? DEFAULT_SKIP_REASON : testCase.skip;
}

async function readExpectedOutput(settings: DriverSettings, testCase: TestCase): Promise<string> {
  const relative = expectedOutputPath(settings.runDir, testCase.name);
  const absolute = path.resolve(settings.cwd ?? process.cwd(), relative);
  try {
    return await fs.readFile(absolute, 'utf-8');
  } catch (err) {
    const reason = (err as NodeJS.ErrnoException).code === 'ENOENT' ? 'not found' : (err as Error).message;
    throw new HarnessError(
      HarnessErrorCode.MISSING_EXPECTED_OUTPUT,
      `Cannot read expected output ${relative}: ${reason}`,
      { path: relative }
    );
  }
}

async function executeCase(testCase: TestCase, settings: DriverSettings, deps: DriverDeps): Promise<Verdict> {
  const expected = await readExpectedOutput(settings, testCase);
  const invocation = buildInvocation(settings, testCase);
  const result = await deps.runner.run(invocation, { cwd: settings.cwd, timeoutMs: settings.timeoutMs });
  return evaluate(expected, result, testCase.expectError);
}

/** Runs a single case; anything but a fatal harness error becomes a Fail verdict for that case only. */
export async function runCase(testCase: TestCase, settings: DriverSettings, deps: DriverDeps): Promise<CaseReport> {
  const reason = skipReason(testCase);
  if (reason !== undefined) {
    return { name: testCase.name, verdict: skip(reason) };
  }

  const start = Date.now();
  let verdict: Verdict;
  try {
    verdict = await executeCase(testCase, settings, deps);
  } catch (err) {
    if (isHarnessError(err)) {
      if (err.fatal) throw err;
      if (err.code === HarnessErrorCode.LAUNCH_FAILURE) {
        logger.warn({ test: testCase.name, context: err.context }, err.message);
      }
      verdict = fail(err.code, err.message);
    } else {
      logger.error({ test: testCase.name, err }, 'Case aborted by unexpected error');
      verdict = fail(HarnessErrorCode.INTERNAL, err instanceof Error ? err.message : String(err));
    }
  }
  return { name: testCase.name, verdict, durationMs: Date.now() - start };
}

export function selectCases(suite: Suite, filter?: string): TestCase[] {
  if (!filter) return [...suite.cases];
  return suite.cases.filter(c => c.name.includes(filter));
}

/** Cases run one at a time in declaration order: a later case may consume an earlier case's artifact. */
export async function runSuite(suite: Suite, settings: DriverSettings, deps: DriverDeps): Promise<SuiteSummary> {
  const tracker = new ResultsTracker();

  for (const testCase of selectCases(suite, settings.filter)) {
    const report = settings.failFast && tracker.hasFailures() && skipReason(testCase) === undefined
      ? { name: testCase.name, verdict: skip(FAIL_FAST_SKIP_REASON) }
      : await runCase(testCase, settings, deps);
    logger.debug({ test: report.name, verdict: report.verdict.kind }, 'Case finished');
    tracker.record(report);
    deps.onCase?.(report);
  }

  const summary = tracker.summarize();
  logger.info({ passed: summary.passed, failed: summary.failed, skipped: summary.skipped }, 'Suite finished');
  return summary;
}
