import type { Analyzer, AuditContext } from '../types.js';
import type { IndexedFile } from '../utils/fileIndex.js';
import { type Check, emit, plural } from '../utils/helpers.js';
import { extractAll, ok } from '../utils/matcher.js';
import { Patterns } from '../utils/patterns.js';

const COMPOSE_FILES = ['docker-compose.yml', 'docker-compose.yaml', 'compose.yml', 'compose.yaml'];

export type TagStatus = 'pinned' | 'latest' | 'untagged';

/**
 * Classify an image reference. Digests, `scratch` and `${ARG}` references count as pinned;
 * a colon only starts a tag when it follows the last `/` (registry ports are not tags).
 */
export function imageTagStatus(ref: string): TagStatus {
  if (ref.includes('$') || ref.includes('@') || ref.toLowerCase() === 'scratch') return 'pinned';
  const colon = ref.lastIndexOf(':');
  if (colon <= ref.lastIndexOf('/')) return 'untagged';
  const tag = ref.slice(colon + 1).toLowerCase();
  if (tag === '') return 'untagged';
  return tag === 'latest' ? 'latest' : 'pinned';
}

/** External images named by FROM lines; `--flags` and references to earlier stages are dropped. */
export function baseImages(dockerfile: string): string[] {
  const stages = new Set<string>();
  const images: string[] = [];
  for (const line of extractAll(dockerfile, Patterns.dockerFrom)) {
    const [image, keyword, alias] = line.split(/\s+/).filter((t) => !t.startsWith('--'));
    if (!image) continue;
    if (!stages.has(image.toLowerCase())) images.push(image);
    if (keyword?.toLowerCase() === 'as' && alias) stages.add(alias.toLowerCase());
  }
  return images;
}

async function dockerfileChecks(ctx: AuditContext, file: IndexedFile): Promise<Check[]> {
  const text = await ctx.index.read(file);
  const hasFrom = ok(Patterns.dockerFrom, text);

  const offending = baseImages(text)
    .map((ref) => ({ ref, status: imageTagStatus(ref) }))
    .find((i) => i.status !== 'pinned');
  let tagProblem = '';
  if (offending) {
    tagProblem =
      offending.status === 'latest'
        ? `Image ${offending.ref} uses latest tag (pin versions).`
        : `Image ${offending.ref} has no tag (pin versions).`;
  }

  return [
    {
      name: `${file.rel}: has FROM`,
      pass: hasFrom,
      sev: 'critical',
      msgPass: 'Base image is specified.',
      msgFail: 'Missing FROM instruction.',
    },
    {
      name: `${file.rel}: avoids latest tag`,
      // A missing FROM is reported once, by the check above
      pass: !offending,
      sev: 'warning',
      msgPass: hasFrom ? 'Pinned image tag detected.' : 'No base image to pin.',
      msgFail: tagProblem,
    },
    {
      name: `${file.rel}: non-root USER set`,
      pass: ok(Patterns.dockerUser, text),
      sev: 'warning',
      msgPass: 'USER instruction found.',
      msgFail: 'No USER instruction found (runs as root by default).',
    },
    {
      name: `${file.rel}: HEALTHCHECK present`,
      pass: ok(Patterns.dockerHealthcheck, text),
      sev: 'info',
      msgPass: 'HEALTHCHECK found.',
      msgFail: 'No HEALTHCHECK found.',
    },
  ];
}

export const dockerAnalyzer: Analyzer = {
  id: 'docker',
  category: 'Docker',
  title: 'Containerization',

  async run(ctx) {
    const { evidence } = ctx;
    const dockerfiles = evidence.filesNamed(['Dockerfile']);
    const hasDockerignore = evidence.hasFileNamed(['.dockerignore']);
    const perFile = await Promise.all(dockerfiles.map((f) => dockerfileChecks(ctx, f)));
    const hasCompose = evidence.hasFileMatching(COMPOSE_FILES);

    return emit('Docker', [
      {
        name: 'Dockerfile exists',
        pass: dockerfiles.length > 0,
        sev: 'critical',
        msgPass: `Found ${plural(dockerfiles.length, 'Dockerfile')}.`,
        msgFail: 'No Dockerfile found.',
      },
      {
        name: '.dockerignore exists',
        pass: hasDockerignore,
        sev: 'warning',
        msgPass: 'Found .dockerignore.',
        msgFail: 'Missing .dockerignore (recommended).',
      },
      ...perFile.flat(),
      {
        name: 'Compose file exists',
        pass: hasCompose,
        sev: 'info',
        msgPass: 'Found Docker Compose file.',
        msgFail: 'No Compose file found (optional).',
      },
    ]);
  },
};
