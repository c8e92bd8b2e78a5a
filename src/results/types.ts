import type { HarnessErrorCode } from '../shared/errors.js';

export type Verdict =
  | { kind: 'pass' }
  | { kind: 'fail'; code: HarnessErrorCode; diagnostic: string }
  | { kind: 'skip'; reason: string };

export interface CaseReport {
  name: string;
  verdict: Verdict;
  durationMs?: number;
}

export interface SuiteSummary {
  passed: number;
  failed: number;
  skipped: number;
  cases: CaseReport[];
  /** 0 when no case failed. */
  exitCode: number;
}

export const PASS: Verdict = Object.freeze({ kind: 'pass' });

export function fail(code: HarnessErrorCode, diagnostic: string): Verdict {
  return { kind: 'fail', code, diagnostic };
}

export function skip(reason: string): Verdict {
  return { kind: 'skip', reason };
}
