import type { Evidence } from './utils/evidence.js';
import type { FileIndex } from './utils/fileIndex.js';

export type Severity = 'info' | 'warning' | 'critical';

export type Category =
  | 'Docker'
  | 'CI/CD'
  | 'Quality'
  | 'IaC'
  | 'Kubernetes'
  | 'Observability'
  | 'Docs';

export interface Finding {
  /** Audit domain the check belongs to */
  readonly category: Category;
  /** Stable, human-friendly title of the check */
  readonly name: string;
  /** Pass/Fail result for this validation */
  readonly passed: boolean;
  /** Fixed per check; drives the score weight */
  readonly severity: Severity;
  /** Evidence found, or a hint on what is missing */
  readonly details: string;
}

export interface AuditReport {
  /** Canonical absolute path of the audited directory */
  readonly root: string;
  /** Weighted score in [0..100], two decimals */
  readonly score: number;
  readonly passed: number;
  readonly failed: number;
  /** All findings, in catalogue order */
  readonly findings: readonly Finding[];
}

export interface AuditContext {
  readonly root: string;
  readonly index: FileIndex;
  readonly evidence: Evidence;
}

export interface Analyzer {
  /** Stable machine-readable id (e.g. 'docker', 'cicd') */
  readonly id: string;
  readonly category: Category;
  readonly title: string;
  run(ctx: AuditContext): Promise<Finding[]>;
}

export type SeverityWeights = Readonly<Record<Severity, number>>;
