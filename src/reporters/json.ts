import { promises as fs } from 'fs';
import path from 'path';
import type { AuditReport, Category, Severity } from '../types.js';

/** Stable wire shape; field names and order are part of the output contract. */
export type JsonPayload = {
  root: string;
  score: number;
  passed: number;
  failed: number;
  checks: Array<{
    category: Category;
    name: string;
    passed: boolean;
    severity: Severity;
    details: string;
  }>;
};

export function toJsonPayload(report: AuditReport): JsonPayload {
  return {
    root: report.root,
    score: report.score,
    passed: report.passed,
    failed: report.failed,
    checks: report.findings.map((f) => ({
      category: f.category,
      name: f.name,
      passed: f.passed,
      severity: f.severity,
      details: f.details,
    })),
  };
}

export function renderJson(report: AuditReport): string {
  return JSON.stringify(toJsonPayload(report), null, 2);
}

/** Write `report.json` into `outDir` (created if needed) and return its path. */
export async function writeJson(report: AuditReport, outDir: string): Promise<string> {
  await fs.mkdir(outDir, { recursive: true });
  const file = path.join(outDir, 'report.json');
  await fs.writeFile(file, renderJson(report) + '\n', 'utf8');
  return file;
}
