import type { Analyzer, Severity } from '../types.js';
import { emit, plural } from '../utils/helpers.js';
import { containsAny, extractAll, ok } from '../utils/matcher.js';
import { Patterns } from '../utils/patterns.js';

const MANIFEST_DIRS = new Set(['k8s', 'kubernetes', 'manifests', 'deploy', 'deployment', 'helm']);

// Alphabetical by kind; `label` is the published check name
const REQUIRED_KINDS: ReadonlyArray<{ kind: string; label: string; sev: Severity }> = [
  { kind: 'ConfigMap', label: 'Configmap', sev: 'warning' },
  { kind: 'Deployment', label: 'Deployment', sev: 'critical' },
  { kind: 'Secret', label: 'Secret', sev: 'warning' },
  { kind: 'Service', label: 'Service', sev: 'critical' },
];

const LLM_KEY_REFS = [
  'openai_api_key',
  'anthropic_api_key',
  'llm_api_key',
  'azure_openai_api_key',
  'gemini_api_key',
  'secretkeyref',
];

export const kubernetesAnalyzer: Analyzer = {
  id: 'kubernetes',
  category: 'Kubernetes',
  title: 'Kubernetes Manifests',

  async run({ index, evidence }) {
    const manifests = evidence
      .filesMatching(['*.yml', '*.yaml'])
      .filter(
        (f) =>
          f.dirs.some((d) => MANIFEST_DIRS.has(d.toLowerCase())) ||
          f.name.toLowerCase().includes('k8s'),
      );
    const texts = await Promise.all(manifests.map((f) => index.read(f)));

    const kinds = new Set(
      texts.flatMap((t) => extractAll(t, Patterns.k8sKind)).map((k) => k.toLowerCase()),
    );
    const serviceTexts = texts.filter((t) => containsAny(t, ['service']));
    const secretText = texts.filter((t) => containsAny(t, ['secret'])).join('\n');

    return emit('Kubernetes', [
      {
        name: 'Kubernetes manifests present',
        pass: manifests.length > 0,
        sev: 'critical',
        msgPass: `Found ${plural(manifests.length, 'K8s YAML file')}.`,
        msgFail: 'No Kubernetes YAML files detected.',
      },
      ...REQUIRED_KINDS.map(({ kind, label, sev }) => ({
        name: `Kubernetes ${label} manifest`,
        pass: kinds.has(kind.toLowerCase()),
        sev,
        msgPass: `Found ${kind} manifest.`,
        msgFail: `Missing ${kind} manifest.`,
      })),
      {
        name: 'Service exposes app (NodePort/LoadBalancer)',
        pass: serviceTexts.some((t) => ok(Patterns.serviceExposure, t)),
        sev: 'warning',
        msgPass: 'Service type exposes app.',
        msgFail: 'No NodePort/LoadBalancer detected.',
      },
      {
        name: 'LLM API key stored in Secret',
        pass: containsAny(secretText, LLM_KEY_REFS),
        sev: 'critical',
        msgPass: 'Secret references LLM key.',
        msgFail: 'No LLM key found in Secret manifest.',
      },
      {
        name: 'Helm chart present (optional)',
        pass: evidence.hasFileMatching(['Chart.yaml']),
        sev: 'info',
        msgPass: 'Helm chart found.',
        msgFail: 'No Helm chart found.',
      },
    ]);
  },
};
