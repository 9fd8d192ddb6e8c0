import type { Analyzer } from '../types.js';
import type { IndexedFile } from '../utils/fileIndex.js';
import { emit } from '../utils/helpers.js';
import { containsAny, ok } from '../utils/matcher.js';
import { Patterns } from '../utils/patterns.js';

const README_NAMES = ['readme.md', 'readme', 'readme.rst', 'readme.txt'];

// All-or-nothing: partial coverage earns no credit
const REQUIRED_TOPICS = ['ci/cd', 'kubernetes', 'monitoring', 'deployment', 'grafana', 'prometheus'];

const ARCHITECTURE_DOCS = ['docs/architecture.md', 'docs/adr/*.md', 'ARCHITECTURE.md'];

// The root README is preferred over nested ones
function shallowest(files: readonly IndexedFile[]): IndexedFile | undefined {
  let best: IndexedFile | undefined;
  for (const f of files) {
    if (!best || f.dirs.length < best.dirs.length) best = f;
  }
  return best;
}

export const docsAnalyzer: Analyzer = {
  id: 'docs',
  category: 'Docs',
  title: 'Documentation',

  async run({ index, evidence }) {
    const readme = shallowest(evidence.filesNamed(README_NAMES));
    const text = readme ? await index.read(readme) : '';
    const missingTopics = REQUIRED_TOPICS.filter((t) => !containsAny(text, [t]));

    return emit('Docs', [
      {
        name: 'README present',
        pass: readme !== undefined,
        sev: 'critical',
        msgPass: `README found (${readme ? readme.rel : ''}).`,
        msgFail: 'Missing README.',
      },
      {
        name: 'README covers CI/CD, K8s, Monitoring',
        pass: readme !== undefined && missingTopics.length === 0,
        sev: 'warning',
        msgPass: 'README references required topics.',
        msgFail: readme
          ? `README missing required topics: ${missingTopics.join(', ')}.`
          : 'No README to inspect.',
      },
      {
        name: 'Screenshots/diagrams referenced',
        pass: ok(Patterns.markdownImage, text),
        sev: 'info',
        msgPass: 'README references images.',
        msgFail: readme ? 'No images referenced in README.' : 'No README to inspect.',
      },
      {
        name: 'Architecture documentation present',
        pass: evidence.hasFileMatching(ARCHITECTURE_DOCS),
        sev: 'info',
        msgPass: 'Architecture docs found.',
        msgFail: 'No architecture docs detected.',
      },
    ]);
  },
};
