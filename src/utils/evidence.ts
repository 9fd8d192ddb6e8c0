import type { FileIndex, IndexedFile } from './fileIndex.js';
import { containsAny, matchesAnyGlob } from './matcher.js';

/**
 * The three evidence queries every analyzer is written in:
 * files by bare name, files by glob, and files by glob whose text contains a needle.
 */
export class Evidence {
  constructor(private readonly index: FileIndex) {}

  filesNamed(names: readonly string[]): IndexedFile[] {
    const wanted = new Set(names.map((n) => n.toLowerCase()));
    return this.index.files.filter((f) => wanted.has(f.name.toLowerCase()));
  }

  hasFileNamed(names: readonly string[]): boolean {
    return this.filesNamed(names).length > 0;
  }

  filesMatching(globs: readonly string[]): IndexedFile[] {
    return this.index.files.filter((f) => matchesAnyGlob(f.rel, globs));
  }

  hasFileMatching(globs: readonly string[]): boolean {
    return this.index.files.some((f) => matchesAnyGlob(f.rel, globs));
  }

  async anyFileContains(globs: readonly string[], needles: readonly string[]): Promise<boolean> {
    for (const file of this.filesMatching(globs)) {
      if (containsAny(await this.index.read(file), needles)) return true;
    }
    return false;
  }

  /** Texts of the given files joined by newlines. */
  async textOf(files: readonly IndexedFile[]): Promise<string> {
    const texts = await Promise.all(files.map((f) => this.index.read(f)));
    return texts.join('\n');
  }
}
