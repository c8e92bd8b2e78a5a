// In-memory, ordered record of one suite run. Nothing here is persisted; the markdown
// report is rendered from summarize() by the CLI.
import type { CaseReport, SuiteSummary } from './types.js';

export class ResultsTracker {
  private reports: CaseReport[] = [];

  record(report: CaseReport): void {
    this.reports.push(report);
  }

  getAll(): CaseReport[] {
    return [...this.reports];
  }

  getPassCount(): number {
    return this.reports.filter(r => r.verdict.kind === 'pass').length;
  }

  getFailCount(): number {
    return this.reports.filter(r => r.verdict.kind === 'fail').length;
  }

  getSkipCount(): number {
    return this.reports.filter(r => r.verdict.kind === 'skip').length;
  }

  hasFailures(): boolean {
    return this.reports.some(r => r.verdict.kind === 'fail');
  }

  summarize(): SuiteSummary {
    const failed = this.getFailCount();
    return {
      passed: this.getPassCount(),
      failed,
      skipped: this.getSkipCount(),
      cases: this.getAll(),
      exitCode: failed === 0 ? 0 : 1,
    };
  }
}
