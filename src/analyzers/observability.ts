import type { Analyzer } from '../types.js';
import { emit } from '../utils/helpers.js';

const PROMETHEUS_GLOBS = [
  'prometheus.yml',
  'prometheus.yaml',
  '**/{k8s,manifests,monitoring}/**/prometheus*.{yml,yaml}',
];

const GRAFANA_GLOBS = ['**/grafana/**/*.json', '**/dashboards/**/*.json'];

const DEPENDENCY_MANIFESTS = [
  'pyproject.toml',
  'requirements*.txt',
  'poetry.lock',
  'Pipfile',
  'Pipfile.lock',
  'package.json',
  'go.mod',
  'pom.xml',
  'build.gradle',
  'build.gradle.kts',
  'Gemfile',
];

const METRICS_CLIENTS = [
  'prometheus_client',
  'prometheus-client',
  'prom-client',
  'prometheus/client_golang',
  'micrometer-registry-prometheus',
  'prometheus-client-ruby',
  '@opentelemetry/sdk-metrics',
];

const SOURCE_GLOBS = ['*.py', '*.js', '*.mjs', '*.cjs', '*.ts', '*.go', '*.java', '*.rb'];

const LLM_METRIC_KEYWORDS = ['llm', 'token', 'latency'];

export const observabilityAnalyzer: Analyzer = {
  id: 'observability',
  category: 'Observability',
  title: 'Monitoring & Observability',

  async run({ evidence }) {
    const [metricsClient, metricsEndpoint, llmMetrics] = await Promise.all([
      evidence.anyFileContains(DEPENDENCY_MANIFESTS, METRICS_CLIENTS),
      evidence.anyFileContains(SOURCE_GLOBS, ['/metrics']),
      evidence.anyFileContains(SOURCE_GLOBS, LLM_METRIC_KEYWORDS),
    ]);

    return emit('Observability', [
      {
        name: 'Prometheus config/manifests present',
        pass: evidence.hasFileMatching(PROMETHEUS_GLOBS),
        sev: 'warning',
        msgPass: 'Prometheus config/manifests found.',
        msgFail: 'No Prometheus config/manifests detected.',
      },
      {
        name: 'Grafana dashboard present',
        pass: evidence.hasFileMatching(GRAFANA_GLOBS),
        sev: 'warning',
        msgPass: 'Grafana dashboard(s) found.',
        msgFail: 'No Grafana dashboard JSON detected.',
      },
      {
        name: 'App dependencies include prometheus_client',
        pass: metricsClient,
        sev: 'warning',
        msgPass: 'Metrics client dependency detected.',
        msgFail: 'No metrics client dependency (e.g. prometheus_client, prom-client) detected.',
      },
      {
        name: 'Metrics endpoint exposed',
        pass: metricsEndpoint,
        sev: 'warning',
        msgPass: 'Metrics endpoint found.',
        msgFail: 'No /metrics endpoint detected.',
      },
      {
        name: 'LLM metrics instrumentation',
        pass: llmMetrics,
        sev: 'info',
        msgPass: 'LLM metric keywords detected.',
        msgFail: 'No LLM-specific metrics detected.',
      },
    ]);
  },
};
