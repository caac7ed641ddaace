import { describe, it, expect } from 'vitest';
import { CommandTimeoutError, RepositoryStateError } from '../src/shared/errors.js';
import { failure, failureFromError, renderOutcome, success } from '../src/shared/outcome.js';

describe('failureFromError', () => {
  it('keeps the code of known errors', () => {
    expect(failureFromError(new CommandTimeoutError('git', 3000))).toEqual({
      ok: false,
      code: 'COMMAND_TIMEOUT',
      reason: 'git timed out after 3000ms',
    });
    expect(failureFromError(new RepositoryStateError('detached HEAD'))).toEqual({
      ok: false,
      code: 'REPOSITORY_STATE',
      reason: 'detached HEAD',
    });
  });

  it('wraps anything else as an internal error', () => {
    expect(failureFromError('disk full')).toEqual({
      ok: false,
      code: 'INTERNAL',
      reason: 'Unexpected error: disk full',
    });
  });
});

describe('renderOutcome', () => {
  it('renders success as the message and failure with an Error prefix', () => {
    expect(renderOutcome(success('Done.'))).toBe('Done.');
    expect(renderOutcome(failure('COMMAND_FAILED', 'push rejected'))).toBe('Error: push rejected');
  });
});
