import { afterEach, describe, expect, it } from 'vitest';
import { observabilityAnalyzer } from '../../src/analyzers/observability.js';
import { findingNamed, runAnalyzer, TestProject } from '../helpers/project.js';

describe('observabilityAnalyzer', () => {
  let project: TestProject;

  afterEach(() => project.destroy());

  it('passes a Python service with Prometheus and Grafana', async () => {
    project = TestProject.create({
      'prometheus.yml': 'scrape_configs: []\n',
      'grafana/dashboards/api.json': '{}',
      'requirements.txt': 'fastapi\nprometheus-client==0.20\n',
      'api/main.py': [
        '@app.get("/metrics")',
        'def metrics(): ...',
        'LLM_TOKENS = Counter("llm_tokens_total", "tokens")',
        '',
      ].join('\n'),
    });
    const findings = await runAnalyzer(observabilityAnalyzer, project.dir);

    expect(findings.map((f) => [f.name, f.passed])).toEqual([
      ['Prometheus config/manifests present', true],
      ['Grafana dashboard present', true],
      ['App dependencies include prometheus_client', true],
      ['Metrics endpoint exposed', true],
      ['LLM metrics instrumentation', true],
    ]);
  });

  it('recognises a Node service', async () => {
    project = TestProject.create({
      'package.json': '{"dependencies":{"prom-client":"^15.0.0"}}',
      'src/server.ts': "app.get('/metrics', handler);\n",
    });
    const findings = await runAnalyzer(observabilityAnalyzer, project.dir);

    expect(findings.map((f) => [f.name, f.passed])).toEqual([
      ['Prometheus config/manifests present', false],
      ['Grafana dashboard present', false],
      ['App dependencies include prometheus_client', true],
      ['Metrics endpoint exposed', true],
      ['LLM metrics instrumentation', false],
    ]);
  });

  it('only looks for the endpoint in source files', async () => {
    project = TestProject.create({ 'README.md': 'Scrape /metrics on port 8000.' });
    const findings = await runAnalyzer(observabilityAnalyzer, project.dir);

    expect(findingNamed(findings, 'Metrics endpoint exposed')).toMatchObject({
      passed: false,
      severity: 'warning',
      details: 'No /metrics endpoint detected.',
    });
  });

  it('finds Prometheus manifests and nested dashboards', async () => {
    project = TestProject.create({
      'monitoring/prometheus-config.yaml': 'global: {}\n',
      'ops/grafana/api.json': '{}',
    });
    const findings = await runAnalyzer(observabilityAnalyzer, project.dir);

    expect(findingNamed(findings, 'Prometheus config/manifests present').passed).toBe(true);
    expect(findingNamed(findings, 'Grafana dashboard present').passed).toBe(true);
  });
});
