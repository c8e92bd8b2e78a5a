import { indent } from '../shared/text.js';
import type { CaseReport, SuiteSummary } from '../results/types.js';

export function formatCaseLine(report: CaseReport): string {
  const { verdict } = report;
  switch (verdict.kind) {
    case 'pass':
      return `PASS ${report.name}`;
    case 'skip':
      return `SKIP ${report.name} (${verdict.reason})`;
    case 'fail':
      return `FAIL ${report.name} [${verdict.code}]\n${indent(verdict.diagnostic, 2)}`;
  }
}

export function formatSummary(summary: SuiteSummary): string {
  return `${summary.passed} passed, ${summary.failed} failed, ${summary.skipped} skipped`;
}
