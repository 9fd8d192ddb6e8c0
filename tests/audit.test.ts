import * as fs from 'node:fs';
import { afterEach, describe, expect, it } from 'vitest';
import { dockerAnalyzer, docsAnalyzer } from '../src/analyzers/index.js';
import { CATEGORY_ORDER } from '../src/config/defaults.js';
import { CATALOGUE, PathError, renderJson, runAudit } from '../src/index.js';
import type { Analyzer, Category } from '../src/types.js';
import { Logger } from '../src/utils/logger.js';
import { categoryFindings, COMPLETE_PROJECT, INFRA_FILES, TestProject } from './helpers/project.js';

const silent = new Logger({ level: 'silent', json: false });

function distinctCategories(categories: readonly Category[]): Category[] {
  return categories.filter((c, i) => categories.indexOf(c) === i);
}

describe('runAudit', () => {
  let project: TestProject;

  afterEach(() => project.destroy());

  it('fails every check in an empty directory', async () => {
    project = TestProject.create();
    const report = await runAudit(project.dir, { logger: silent });

    expect(report.findings).toHaveLength(34);
    expect(report).toMatchObject({ score: 0, passed: 0, failed: 34 });
    expect(distinctCategories(report.findings.map((f) => f.category))).toEqual(CATEGORY_ORDER);
  });

  it('scores a fully prepared repository at 100', async () => {
    project = TestProject.create({ ...COMPLETE_PROJECT, ...INFRA_FILES });
    const report = await runAudit(project.dir, { logger: silent });

    expect(report.findings.filter((f) => !f.passed)).toEqual([]);
    expect(report).toMatchObject({ score: 100, passed: 38, failed: 0 });
  });

  it('runs the catalogue in category order', () => {
    expect(CATALOGUE.map((a) => a.category)).toEqual(CATEGORY_ORDER);
  });

  it('reports the canonical root', async () => {
    project = TestProject.create();
    const report = await runAudit(project.dir, { logger: silent });

    expect(report.root).toBe(fs.realpathSync(project.dir));
  });

  it('rejects a missing path', async () => {
    project = TestProject.create();
    await expect(runAudit(project.path('missing'), { logger: silent })).rejects.toBeInstanceOf(
      PathError,
    );
  });

  it('keeps passed and failed counts consistent', async () => {
    project = TestProject.create(COMPLETE_PROJECT);
    const report = await runAudit(project.dir, { logger: silent });

    expect(report.passed + report.failed).toBe(report.findings.length);
    expect(report.passed).toBe(report.findings.filter((f) => f.passed).length);
  });

  it('produces identical output for an unchanged tree', async () => {
    project = TestProject.create(COMPLETE_PROJECT);
    const first = await runAudit(project.dir, { logger: silent });
    const second = await runAudit(project.dir, { logger: silent });

    expect(renderJson(second)).toBe(renderJson(first));
  });

  it('changes only the category whose evidence changed', async () => {
    project = TestProject.create(COMPLETE_PROJECT);
    const before = await runAudit(project.dir, { logger: silent });
    project.write(INFRA_FILES);
    const after = await runAudit(project.dir, { logger: silent });

    for (const category of CATEGORY_ORDER.filter((c) => c !== 'IaC')) {
      expect(categoryFindings(after, category)).toEqual(categoryFindings(before, category));
    }
    expect(categoryFindings(before, 'IaC').some((f) => f.passed)).toBe(false);
    expect(categoryFindings(after, 'IaC').every((f) => f.passed)).toBe(true);
  });

  it('turns an analyzer exception into a single failed finding', async () => {
    project = TestProject.create({ 'README.md': 'hello' });
    const broken: Analyzer = {
      id: 'broken',
      category: 'IaC',
      title: 'Broken',
      run: async () => {
        throw new Error('kaboom');
      },
    };
    const report = await runAudit(project.dir, {
      analyzers: [dockerAnalyzer, broken, docsAnalyzer],
      logger: silent,
    });

    expect(distinctCategories(report.findings.map((f) => f.category))).toEqual([
      'Docker',
      'IaC',
      'Docs',
    ]);
    expect(categoryFindings(report, 'IaC')).toEqual([
      {
        category: 'IaC',
        name: 'IaC checks completed',
        passed: false,
        severity: 'critical',
        details: 'Checker failed: kaboom',
      },
    ]);
    expect(categoryFindings(report, 'Docs')).toHaveLength(4);
  });

  it('logs the analyzer failure', async () => {
    project = TestProject.create();
    const lines: string[] = [];
    const logger = new Logger({ level: 'error', json: true }, (line) => lines.push(line));
    const broken: Analyzer = {
      id: 'broken',
      category: 'Docs',
      title: 'Broken',
      run: () => Promise.reject(new Error('nope')),
    };
    await runAudit(project.dir, { analyzers: [broken], logger });

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '')).toMatchObject({
      level: 'error',
      msg: 'Analyzer failed',
      analyzer: 'broken',
      error: 'nope',
    });
  });
});
