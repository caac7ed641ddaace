import { describe, it, expect, beforeEach, vi } from 'vitest';

const { execaMock, FakeExecaError } = vi.hoisted(() => {
  class FakeExecaError extends Error {
    exitCode?: number;
    stdout = '';
    stderr = '';
    timedOut = false;
    code?: string;

    constructor(fields: { message?: string; exitCode?: number; stdout?: string; stderr?: string; timedOut?: boolean; code?: string }) {
      super(fields.message ?? 'Command failed');
      Object.assign(this, fields);
    }
  }
  return { execaMock: vi.fn(), FakeExecaError };
});

vi.mock('execa', () => ({ execa: execaMock, ExecaError: FakeExecaError }));

import { ExecaCommandRunner } from '../src/runner/commandRunner.js';
import {
  CommandTimeoutError,
  ExternalToolUnavailableError,
  RepositoryStateError,
  UnexpectedInternalError,
} from '../src/shared/errors.js';

describe('ExecaCommandRunner', () => {
  const runner = new ExecaCommandRunner();

  beforeEach(() => {
    execaMock.mockReset();
  });

  it('runs the command in the given directory', async () => {
    execaMock.mockResolvedValue({ exitCode: 0, stdout: 'feature-x', stderr: '' });

    const result = await runner.run('git', ['branch', '--show-current'], { cwd: '/repo', timeoutMs: 1000 });

    expect(result).toEqual({ exitCode: 0, stdout: 'feature-x', stderr: '' });
    expect(execaMock).toHaveBeenCalledWith('git', ['branch', '--show-current'], { cwd: '/repo', timeout: 1000 });
  });

  it('returns non-zero exits instead of throwing', async () => {
    execaMock.mockRejectedValue(new FakeExecaError({ exitCode: 1, stderr: 'error: failed to push some refs' }));

    const result = await runner.run('git', ['push'], { cwd: '/repo' });

    expect(result).toEqual({ exitCode: 1, stdout: '', stderr: 'error: failed to push some refs' });
  });

  it('signals a missing executable', async () => {
    execaMock.mockRejectedValue(new FakeExecaError({ code: 'ENOENT', message: 'spawn glab ENOENT' }));

    const run = runner.run('glab', ['auth', 'status'], { cwd: process.cwd() });

    await expect(run).rejects.toBeInstanceOf(ExternalToolUnavailableError);
    await expect(run).rejects.toThrow('Command not found: glab');
  });

  it('blames the working directory when it does not exist', async () => {
    execaMock.mockRejectedValue(new FakeExecaError({ code: 'ENOENT', message: 'spawn git ENOENT' }));

    const run = runner.run('git', ['branch', '--show-current'], { cwd: '/nonexistent/gitlab-flow-repo' });

    await expect(run).rejects.toBeInstanceOf(RepositoryStateError);
    await expect(run).rejects.toThrow('Working directory does not exist: /nonexistent/gitlab-flow-repo');
  });

  it('signals a timeout', async () => {
    execaMock.mockRejectedValue(new FakeExecaError({ timedOut: true }));

    const run = runner.run('glab', ['auth', 'status'], { cwd: '/repo', timeoutMs: 100 });

    await expect(run).rejects.toBeInstanceOf(CommandTimeoutError);
    await expect(run).rejects.toThrow('glab timed out after 100ms');
  });

  it('treats a process without exit code as an internal error', async () => {
    execaMock.mockRejectedValue(new FakeExecaError({ message: 'Command was killed with SIGKILL' }));

    await expect(runner.run('git', ['pull'], { cwd: '/repo' })).rejects.toBeInstanceOf(UnexpectedInternalError);
  });

  it('wraps errors that do not come from execa', async () => {
    execaMock.mockRejectedValue(new TypeError('bad options'));

    await expect(runner.run('git', ['pull'], { cwd: '/repo' })).rejects.toThrow('Failed to run git: TypeError: bad options');
  });
});
