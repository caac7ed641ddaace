/**
 * Thin helpers binding the runner to a configured repository.
 */

import type { Configuration } from '../config/index.js';
import type { CommandResult, CommandRunner } from '../runner/commandRunner.js';
import { ExternalCommandError, RepositoryStateError } from '../shared/errors.js';

export function runGit(runner: CommandRunner, config: Configuration, args: readonly string[]): Promise<CommandResult> {
  return runner.run(config.gitBin, args, { cwd: config.repositoryPath, timeoutMs: config.commandTimeoutMs });
}

export function runGlab(runner: CommandRunner, config: Configuration, args: readonly string[]): Promise<CommandResult> {
  return runner.run(config.glabBin, args, { cwd: config.repositoryPath, timeoutMs: config.commandTimeoutMs });
}

/**
 * Best text to show for a failed command: stderr, else stdout, else the exit code.
 */
export function diagnostic(result: CommandResult): string {
  const stderr = result.stderr.trim();
  if (stderr) return stderr;
  const stdout = result.stdout.trim();
  if (stdout) return stdout;
  return `exit code ${result.exitCode}`;
}

/**
 * Both streams, for commands such as rebase that split their report across them.
 */
export function combinedOutput(result: CommandResult): string {
  const parts = [result.stdout.trim(), result.stderr.trim()].filter((part) => part.length > 0);
  return parts.length > 0 ? parts.join('\n') : `exit code ${result.exitCode}`;
}

/**
 * Current branch via `git branch --show-current`.
 * An empty answer means a detached HEAD.
 */
export async function getCurrentBranch(runner: CommandRunner, config: Configuration): Promise<string> {
  const result = await runGit(runner, config, ['branch', '--show-current']);
  if (result.exitCode !== 0) {
    throw new ExternalCommandError(
      `Could not determine current branch: ${diagnostic(result)}`,
      'git branch --show-current',
      result.exitCode,
      result.stderr
    );
  }

  const branch = result.stdout.trim();
  if (!branch) {
    throw new RepositoryStateError('Could not determine current branch (detached HEAD?)');
  }
  return branch;
}
