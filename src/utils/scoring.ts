import { SEVERITY_WEIGHTS } from '../config/defaults.js';
import type { Finding, SeverityWeights } from '../types.js';

export type FindingLike = Pick<Finding, 'passed' | 'severity'>;

export interface ScoreBreakdown {
  score: number;
  maxPoints: number;
  earnedPoints: number;
}

/**
 * Pass-ratio with severity weights.
 * - Each finding contributes weight(severity) points if passed, 0 if failed.
 * - Score = round(earned / max * 100, 2).
 * - No findings => 0.
 */
export function computeScore(
  findings: readonly FindingLike[],
  weights: SeverityWeights = SEVERITY_WEIGHTS,
): ScoreBreakdown {
  let maxPoints = 0;
  let earnedPoints = 0;
  for (const f of findings) {
    const w = weights[f.severity];
    maxPoints += w;
    if (f.passed) earnedPoints += w;
  }
  const score = maxPoints === 0 ? 0 : Math.round((earnedPoints / maxPoints) * 100 * 100) / 100;
  return { score, maxPoints, earnedPoints };
}
