import { CATALOGUE } from './analyzers/index.js';
import { IGNORE_DIRS, SEVERITY_WEIGHTS } from './config/defaults.js';
import { buildReport } from './report.js';
import type { Analyzer, AuditContext, AuditReport, Finding, SeverityWeights } from './types.js';
import { Evidence } from './utils/evidence.js';
import { FileIndex } from './utils/fileIndex.js';
import { getLogger, type Logger } from './utils/logger.js';

export const VERSION = '0.1.0';

export type AuditOptions = {
  /** Analyzers to run, in report order (defaults to the fixed catalogue) */
  analyzers?: readonly Analyzer[];
  ignoreDirs?: ReadonlySet<string>;
  weights?: SeverityWeights;
  logger?: Logger;
};

/**
 * Run one analyzer; an exception becomes a single failed finding so the
 * remaining analyzers and the report are unaffected.
 */
async function runIsolated(
  analyzer: Analyzer,
  ctx: AuditContext,
  logger: Logger,
): Promise<Finding[]> {
  const done = logger.time('Analyzer', { analyzer: analyzer.id });
  const log = logger.child({ analyzer: analyzer.id });
  try {
    return await analyzer.run(ctx);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    log.error('Analyzer failed', { error: message });
    return [
      {
        category: analyzer.category,
        name: `${analyzer.category} checks completed`,
        passed: false,
        severity: 'critical',
        details: `Checker failed: ${message}`,
      },
    ];
  } finally {
    done();
  }
}

/** Programmatic API: audit `targetDir` and return the frozen report. */
export async function runAudit(targetDir: string, options: AuditOptions = {}): Promise<AuditReport> {
  const logger = options.logger ?? getLogger();
  const analyzers = options.analyzers ?? CATALOGUE;

  const index = await FileIndex.build(targetDir, options.ignoreDirs ?? IGNORE_DIRS);
  const ctx: AuditContext = { root: index.root, index, evidence: new Evidence(index) };
  logger.info('Auditing project', { root: index.root, files: index.size });

  // Concurrent, but Promise.all keeps the catalogue order of the sections
  const sections = await Promise.all(analyzers.map((a) => runIsolated(a, ctx, logger)));
  const report = buildReport(index.root, sections, options.weights ?? SEVERITY_WEIGHTS);

  logger.info('Audit complete', { score: report.score, passed: report.passed, failed: report.failed });
  return report;
}

export { CATALOGUE } from './analyzers/index.js';
export { PathError, UsageError } from './errors.js';
export { buildReport, exitCodeFor, hasCriticalFailure } from './report.js';
export { renderHuman } from './reporters/human.js';
export { renderJson, toJsonPayload, writeJson } from './reporters/json.js';
export type {
  Analyzer,
  AuditContext,
  AuditReport,
  Category,
  Finding,
  Severity,
  SeverityWeights,
} from './types.js';
export { computeScore } from './utils/scoring.js';
