import type { Analyzer } from '../types.js';
import { emit } from '../utils/helpers.js';

const TEST_DIR_GLOBS = ['tests/**', 'test/**', '__tests__/**'];

const TEST_FILE_GLOBS = [
  '*_test.py',
  'test_*.py',
  '*_test.go',
  '*.spec.{js,jsx,ts,tsx}',
  '*.test.{js,jsx,ts,tsx}',
];

const LINT_CONFIGS = [
  // Python
  '.flake8',
  'pyproject.toml',
  'ruff.toml',
  '.ruff.toml',
  'pylintrc',
  '.pylintrc',
  // JS / TS
  '.eslintrc',
  '.eslintrc.js',
  '.eslintrc.cjs',
  '.eslintrc.json',
  '.eslintrc.yml',
  '.eslintrc.yaml',
  'eslint.config.js',
  'eslint.config.mjs',
  'eslint.config.cjs',
  'eslint.config.ts',
  'biome.json',
  '.prettierrc',
  '.prettierrc.json',
  'prettier.config.js',
  // Go
  '.golangci.yml',
  '.golangci.yaml',
];

export const qualityAnalyzer: Analyzer = {
  id: 'quality',
  category: 'Quality',
  title: 'Testing & Code Quality',

  async run({ evidence }) {
    const hasTests =
      evidence.hasFileMatching(TEST_DIR_GLOBS) || evidence.hasFileMatching(TEST_FILE_GLOBS);
    const hasLint = evidence.hasFileNamed(LINT_CONFIGS);

    return emit('Quality', [
      {
        name: 'Automated tests present',
        pass: hasTests,
        sev: 'critical',
        msgPass: 'Found test files/directories.',
        msgFail: 'No test files/directories detected.',
      },
      {
        name: 'Lint/format config present',
        pass: hasLint,
        sev: 'warning',
        msgPass: 'Lint/format config found.',
        msgFail: 'No lint/format config detected.',
      },
    ]);
  },
};
