import type { Category, SeverityWeights } from '../types.js';

/** Directory names never descended into (build output, VCS, caches, IDEs). */
export const IGNORE_DIRS: ReadonlySet<string> = new Set([
  '.git',
  '.venv',
  'venv',
  'node_modules',
  '.terraform',
  '.idea',
  '.vscode',
  '__pycache__',
  'dist',
  'build',
]);

/**
 * Scoring policy: a passed finding earns its weight, a failed one earns nothing.
 * Critical gaps dominate the aggregate.
 */
export const SEVERITY_WEIGHTS: SeverityWeights = Object.freeze({
  critical: 3,
  warning: 2,
  info: 1,
});

export const CATEGORY_ORDER: readonly Category[] = Object.freeze([
  'Docker',
  'CI/CD',
  'Quality',
  'IaC',
  'Kubernetes',
  'Observability',
  'Docs',
] as const);
