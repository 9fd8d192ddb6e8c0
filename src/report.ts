import { SEVERITY_WEIGHTS } from './config/defaults.js';
import type { AuditReport, Finding, SeverityWeights } from './types.js';
import { computeScore } from './utils/scoring.js';

/**
 * Concatenate per-analyzer sections in the given order and freeze the result.
 * Pure: no I/O.
 */
export function buildReport(
  root: string,
  sections: readonly (readonly Finding[])[],
  weights: SeverityWeights = SEVERITY_WEIGHTS,
): AuditReport {
  const findings = Object.freeze(sections.flat().map((f) => Object.freeze({ ...f })));
  const passed = findings.filter((f) => f.passed).length;
  return Object.freeze({
    root,
    score: computeScore(findings, weights).score,
    passed,
    failed: findings.length - passed,
    findings,
  });
}

export function hasCriticalFailure(report: AuditReport): boolean {
  return report.findings.some((f) => !f.passed && f.severity === 'critical');
}

export function exitCodeFor(report: AuditReport, failOnCritical: boolean): 0 | 1 {
  return failOnCritical && hasCriticalFailure(report) ? 1 : 0;
}
