import fs from 'fs/promises';
import path from 'path';
import type { SuiteSummary, Verdict } from '../results/types.js';

export interface ReportMeta {
  suitePath: string;
  tool: string;
  startedAt: string;
  endedAt?: string;
}

function verdictCell(verdict: Verdict): string {
  switch (verdict.kind) {
    case 'pass':
      return 'pass';
    case 'fail':
      return `**fail** (${verdict.code})`;
    case 'skip':
      return `skip: ${verdict.reason.replace(/\|/g, '\\|')}`;
  }
}

export function renderReport(summary: SuiteSummary, meta: ReportMeta): string {
  const lines: string[] = [
    `# Suite Report`,
    ``,
    `**Suite:** ${meta.suitePath}`,
    `**Tool:** ${meta.tool}`,
    `**Started:** ${meta.startedAt}`,
    `**Ended:** ${meta.endedAt ?? new Date().toISOString()}`,
    ``,
    `| Passed | Failed | Skipped |`,
    `|--------|--------|---------|`,
    `| ${summary.passed} | ${summary.failed} | ${summary.skipped} |`,
    ``,
    `## Cases`,
    ``,
    `| Case | Verdict | Duration (ms) |`,
    `|------|---------|---------------|`,
    ...summary.cases.map(c =>
      `| ${c.name} | ${verdictCell(c.verdict)} | ${c.durationMs ?? '-'} |`
    ),
  ];

  const failing = summary.cases.filter(c => c.verdict.kind === 'fail');
  if (failing.length > 0) {
    lines.push(``, `## Failures`);
    for (const c of failing) {
      if (c.verdict.kind !== 'fail') continue;
      lines.push(``, `### ${c.name}`, ``, '```', c.verdict.diagnostic, '```');
    }
  }

  lines.push(
    ``,
    `## Status`,
    ``,
    summary.failed === 0
      ? `All ${summary.passed} executed cases passed.`
      : `${summary.failed} of ${summary.cases.length} cases failed.`
  );
  return lines.join('\n') + '\n';
}

export async function writeReport(reportPath: string, summary: SuiteSummary, meta: ReportMeta): Promise<void> {
  await fs.mkdir(path.dirname(reportPath), { recursive: true });
  await fs.writeFile(reportPath, renderReport(summary, meta), 'utf-8');
}
