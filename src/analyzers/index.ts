import { CATEGORY_ORDER } from '../config/defaults.js';
import type { Analyzer } from '../types.js';
import { cicdAnalyzer } from './cicdIntegration.js';
import { dockerAnalyzer } from './docker.js';
import { docsAnalyzer } from './documentation.js';
import { iacAnalyzer } from './infrastructure.js';
import { kubernetesAnalyzer } from './kubernetes.js';
import { observabilityAnalyzer } from './observability.js';
import { qualityAnalyzer } from './testsQuality.js';

const ANALYZERS: readonly Analyzer[] = [
  cicdAnalyzer,
  dockerAnalyzer,
  docsAnalyzer,
  iacAnalyzer,
  kubernetesAnalyzer,
  observabilityAnalyzer,
  qualityAnalyzer,
];

/** Fixed, versioned rule catalogue, one analyzer per category in `CATEGORY_ORDER`. */
export const CATALOGUE: readonly Analyzer[] = Object.freeze(
  CATEGORY_ORDER.map((category) => {
    const analyzer = ANALYZERS.find((a) => a.category === category);
    if (!analyzer) throw new Error(`No analyzer registered for ${category}`);
    return analyzer;
  }),
);

export {
  cicdAnalyzer,
  dockerAnalyzer,
  docsAnalyzer,
  iacAnalyzer,
  kubernetesAnalyzer,
  observabilityAnalyzer,
  qualityAnalyzer,
};
