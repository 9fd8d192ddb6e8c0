/** The audit root is missing or not a directory. Aborts the run before any check. */
export class PathError extends Error {
  constructor(
    readonly root: string,
    readonly reason: 'missing' | 'not-a-directory',
  ) {
    super(reason === 'missing' ? `Path does not exist: ${root}` : `Not a directory: ${root}`);
    this.name = 'PathError';
  }
}

/** Bad command line: unknown flag, stray argument or an invalid value. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}
