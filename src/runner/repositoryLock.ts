import path from 'node:path';

/**
 * Per-repository mutual exclusion.
 *
 * Workflows switch branches, which is state of the working copy rather than of
 * a single command, so two workflows on the same repository must not interleave.
 * Callers queue on the resolved repository path; other repositories are unaffected.
 */
export class RepositoryLock {
  private readonly tails: Map<string, Promise<void>> = new Map();

  async withLock<T>(repositoryPath: string, fn: () => Promise<T>): Promise<T> {
    const key = path.resolve(repositoryPath);
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(repositoryPath: string): boolean {
    return this.tails.has(path.resolve(repositoryPath));
  }
}

export const repositoryLock = new RepositoryLock();
