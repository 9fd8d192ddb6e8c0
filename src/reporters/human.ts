import type { AuditReport, Category, Finding } from '../types.js';
import { computeScore } from '../utils/scoring.js';

const RULE = '='.repeat(72);
const THIN_RULE = '-'.repeat(72);

function groupByCategory(findings: readonly Finding[]): Map<Category, Finding[]> {
  // Map keeps insertion order, and findings already arrive in catalogue order
  const groups = new Map<Category, Finding[]>();
  for (const f of findings) {
    const items = groups.get(f.category);
    if (items) items.push(f);
    else groups.set(f.category, [f]);
  }
  return groups;
}

export function renderHuman(report: AuditReport): string {
  const lines: string[] = [
    RULE,
    'DevOps Readiness Report',
    RULE,
    `Project: ${report.root}`,
    `Score:   ${report.score}%`,
    `Passed:  ${report.passed}`,
    `Failed:  ${report.failed}`,
    THIN_RULE,
  ];

  for (const [category, items] of groupByCategory(report.findings)) {
    lines.push('', `[${category}] ${computeScore(items).score}%`);
    for (const f of items) {
      lines.push(`  ${f.passed ? '✅' : '❌'} ${f.name} (${f.severity})`);
      lines.push(`     ${f.details}`);
    }
  }

  lines.push('', 'Recommendations:');
  const todo = report.findings.filter((f) => !f.passed && f.severity !== 'info');
  if (todo.length === 0) {
    lines.push('  Nothing to recommend.');
  }
  for (const f of todo) {
    lines.push(`  - ${f.name}: ${f.details}`);
  }

  return lines.join('\n');
}
