import { promises as fs } from 'fs';
import micromatch from 'micromatch';
import { getLogger } from './logger.js';

const GLOB_OPTIONS: micromatch.Options = { nocase: true, dot: true };

// A NUL byte this early means the file is not text
const BINARY_SNIFF_BYTES = 8000;

/**
 * Shell-glob match applied to both the relative path and the bare file name;
 * either one matching is enough. Case-insensitive.
 * Example: matchesGlob('api/Dockerfile', 'dockerfile') === true
 */
export function matchesGlob(relPath: string, pattern: string): boolean {
  const name = relPath.slice(relPath.lastIndexOf('/') + 1);
  return (
    micromatch.isMatch(relPath, pattern, GLOB_OPTIONS) ||
    micromatch.isMatch(name, pattern, GLOB_OPTIONS)
  );
}

export function matchesAnyGlob(relPath: string, patterns: readonly string[]): boolean {
  return patterns.some((p) => matchesGlob(relPath, p));
}

export function containsAny(
  text: string,
  needles: readonly string[],
  caseInsensitive = true,
): boolean {
  if (!text) return false;
  const haystack = caseInsensitive ? text.toLowerCase() : text;
  return needles.some((n) => haystack.includes(caseInsensitive ? n.toLowerCase() : n));
}

/** Best-effort text of a file; '' when it is unreadable or binary. Never throws. */
export async function readText(absPath: string): Promise<string> {
  try {
    const data = await fs.readFile(absPath);
    if (data.subarray(0, BINARY_SNIFF_BYTES).includes(0)) return '';
    return data.toString('utf8');
  } catch (err) {
    getLogger().debug('Unreadable file treated as empty', { file: absPath, error: String(err) });
    return '';
  }
}

/**
 * Safe boolean regex test. Handles undefined/empty texts.
 * Example: ok(Patterns.dockerHealthcheck, dockerfileText)
 */
export function ok(re: RegExp, text: string | undefined | null): boolean {
  if (!text) return false;
  // Fresh copy without the global flag: no lastIndex carried between calls
  return new RegExp(re.source, re.flags.replace('g', '')).test(text);
}

/** First capture group (trimmed) of every match, in document order. */
export function extractAll(text: string | undefined | null, re: RegExp): string[] {
  if (!text) return [];
  const flags = re.flags.includes('g') ? re.flags : re.flags + 'g';
  return Array.from(text.matchAll(new RegExp(re.source, flags)), (m) => (m[1] ?? m[0]).trim());
}
