import fg from 'fast-glob';
import { promises as fs } from 'fs';
import path from 'path';
import { IGNORE_DIRS } from '../config/defaults.js';
import { PathError } from '../errors.js';
import { getLogger } from './logger.js';
import { readText } from './matcher.js';

export interface IndexedFile {
  /** POSIX path relative to the index root */
  readonly rel: string;
  readonly abs: string;
  /** Bare file name */
  readonly name: string;
  /** Directory segments of `rel`, without the file name */
  readonly dirs: readonly string[];
}

function toIndexedFile(root: string, rel: string): IndexedFile {
  const segments = rel.split('/');
  return Object.freeze({
    rel,
    abs: path.join(root, ...segments),
    name: segments[segments.length - 1] ?? rel,
    dirs: Object.freeze(segments.slice(0, -1)),
  });
}

/**
 * Snapshot of the regular files under a root, taken once per audit.
 * Every analyzer reads from the same snapshot; file texts are cached for its lifetime.
 */
export class FileIndex {
  private readonly texts = new Map<string, Promise<string>>();

  private constructor(
    readonly root: string,
    readonly files: readonly IndexedFile[],
  ) {}

  static async build(
    target: string,
    ignoreDirs: ReadonlySet<string> = IGNORE_DIRS,
  ): Promise<FileIndex> {
    const resolved = path.resolve(target);
    const stat = await fs.stat(resolved).catch(() => undefined);
    if (!stat) throw new PathError(resolved, 'missing');
    if (!stat.isDirectory()) throw new PathError(resolved, 'not-a-directory');

    const root = await fs.realpath(resolved);
    const entries = await fg('**/*', {
      cwd: root,
      dot: true,
      onlyFiles: true,
      followSymbolicLinks: true,
      suppressErrors: true,
      ignore: [...ignoreDirs].map((d) => `**/${d}/**`),
    });

    // The glob ignore prunes the walk; this also drops files named like an ignored dir
    const candidates = entries
      .filter((rel) => !rel.split('/').some((segment) => ignoreDirs.has(segment)))
      .sort()
      .map((rel) => toIndexedFile(root, rel));

    // Symlinked directories can reach one file by many paths (or loop); keep its first path
    const targets = await Promise.all(
      candidates.map((f) =>
        fs.realpath(f.abs).catch((err: unknown) => {
          getLogger().debug('Unresolvable path skipped', { file: f.rel, error: String(err) });
          return undefined;
        }),
      ),
    );
    const seen = new Set<string>();
    const files = candidates.filter((_, i) => {
      const target = targets[i];
      if (target === undefined || seen.has(target)) return false;
      seen.add(target);
      return true;
    });

    getLogger().debug('Indexed project files', { root, files: files.length });
    return new FileIndex(root, Object.freeze(files));
  }

  get size(): number {
    return this.files.length;
  }

  read(file: IndexedFile): Promise<string> {
    let text = this.texts.get(file.abs);
    if (!text) {
      text = readText(file.abs);
      this.texts.set(file.abs, text);
    }
    return text;
  }
}
