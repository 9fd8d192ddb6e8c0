import { afterEach, describe, expect, it } from 'vitest';
import { docsAnalyzer } from '../../src/analyzers/documentation.js';
import { findingNamed, runAnalyzer, TestProject } from '../helpers/project.js';

const FULL_README = [
  'This project uses CI/CD, Kubernetes, Monitoring, Deployment, Grafana and Prometheus.',
  '![Architecture](docs/architecture.png)',
  '',
].join('\n');

describe('docsAnalyzer', () => {
  let project: TestProject;

  afterEach(() => project.destroy());

  it('fails every README check without a README', async () => {
    project = TestProject.create({ 'src/app.py': 'x' });
    const findings = await runAnalyzer(docsAnalyzer, project.dir);

    expect(findings.map((f) => [f.name, f.severity, f.details])).toEqual([
      ['README present', 'critical', 'Missing README.'],
      ['README covers CI/CD, K8s, Monitoring', 'warning', 'No README to inspect.'],
      ['Screenshots/diagrams referenced', 'info', 'No README to inspect.'],
      ['Architecture documentation present', 'info', 'No architecture docs detected.'],
    ]);
    expect(findings.some((f) => f.passed)).toBe(false);
  });

  it('passes a README covering every topic', async () => {
    project = TestProject.create({ 'README.md': FULL_README, 'docs/architecture.md': '# Arch\n' });
    const findings = await runAnalyzer(docsAnalyzer, project.dir);

    expect(findings.every((f) => f.passed)).toBe(true);
    expect(findings[0]?.details).toBe('README found (README.md).');
  });

  it('lists the missing topics', async () => {
    project = TestProject.create({ 'README.md': 'Covers CI/CD and Kubernetes only.\n' });
    const findings = await runAnalyzer(docsAnalyzer, project.dir);

    expect(findingNamed(findings, 'README covers CI/CD, K8s, Monitoring').details).toBe(
      'README missing required topics: monitoring, deployment, grafana, prometheus.',
    );
    expect(findingNamed(findings, 'Screenshots/diagrams referenced').details).toBe(
      'No images referenced in README.',
    );
  });

  it('prefers the root README over nested ones', async () => {
    project = TestProject.create({ 'docs/README.md': FULL_README, 'README.md': 'hello\n' });
    const findings = await runAnalyzer(docsAnalyzer, project.dir);

    expect(findings[0]?.details).toBe('README found (README.md).');
    expect(findingNamed(findings, 'README covers CI/CD, K8s, Monitoring').passed).toBe(false);
  });

  it('accepts architecture decision records', async () => {
    project = TestProject.create({ 'docs/adr/0001-record.md': '# Decision\n' });
    const findings = await runAnalyzer(docsAnalyzer, project.dir);

    expect(findingNamed(findings, 'Architecture documentation present').passed).toBe(true);
  });
});
