/**
 * Bring the current branch up to date with the target branch:
 * checkout target, pull, checkout back, rebase, force-with-lease push.
 *
 * Conflicts abort the rebase so the branch is left as it was. Every partial
 * state (left on target, rebased but not pushed) gets its own failure code.
 */

import { loadConfig, type Configuration } from '../config/index.js';
import { gitLogger, serializeError } from '../logging/index.js';
import { repositoryLock } from '../runner/repositoryLock.js';
import type { CommandResult, CommandRunner } from '../runner/commandRunner.js';
import { RepositoryStateError, type FailureCode } from '../shared/errors.js';
import { failure, failureFromError, success, type OperationOutcome } from '../shared/outcome.js';
import { combinedOutput, diagnostic, getCurrentBranch, runGit } from './commands.js';
import type { WorkflowDeps } from './types.js';

/**
 * Undo a stopped rebase. The outcome of the abort is logged, not reported:
 * callers already get the conflict as their failure.
 */
async function abortRebase(runner: CommandRunner, config: Configuration, branch: string): Promise<void> {
  try {
    const abort = await runGit(runner, config, ['rebase', '--abort']);
    if (abort.exitCode !== 0) {
      // TODO: surface a failed abort to the caller once there is a distinct code for "mid-rebase"
      gitLogger.warn({ branch, stderr: abort.stderr }, 'git rebase --abort failed; repository may be mid-rebase');
    }
  } catch (error) {
    gitLogger.warn({ branch, error: serializeError(error) }, 'git rebase --abort could not run; repository may be mid-rebase');
  }
}

type Attempt = { ok: true; result: CommandResult } | { ok: false; error: unknown };

// A throw (timeout, missing binary) is a failed step like a non-zero exit.
async function attemptGit(runner: CommandRunner, config: Configuration, args: readonly string[]): Promise<Attempt> {
  try {
    return { ok: true, result: await runGit(runner, config, args) };
  } catch (error) {
    return { ok: false, error };
  }
}

function describeFailure(attempt: Attempt): { code: FailureCode; detail: string } {
  if (attempt.ok) {
    return { code: 'COMMAND_FAILED', detail: diagnostic(attempt.result) };
  }
  const { code, reason } = failureFromError(attempt.error);
  return { code, detail: reason };
}

async function rebaseSteps(runner: CommandRunner, config: Configuration): Promise<OperationOutcome> {
  const target = config.targetBranch;
  const branch = await getCurrentBranch(runner, config);

  if (branch === target) {
    throw new RepositoryStateError(`Cannot rebase: already on '${target}'. Switch to a feature branch first.`);
  }

  gitLogger.info({ branch, target }, 'Rebasing branch onto target');

  const checkoutTarget = await runGit(runner, config, ['checkout', target]);
  if (checkoutTarget.exitCode !== 0) {
    return failure('COMMAND_FAILED', `Failed to checkout '${target}': ${diagnostic(checkoutTarget)}`);
  }

  const pull = await attemptGit(runner, config, ['pull']);
  if (!pull.ok || pull.result.exitCode !== 0) {
    const pullFailure = describeFailure(pull);
    const back = await attemptGit(runner, config, ['checkout', branch]);
    if (!back.ok || back.result.exitCode !== 0) {
      const backFailure = describeFailure(back);
      gitLogger.warn({ branch, target, detail: backFailure.detail }, 'Could not return to original branch after failed pull');
      return failure(
        'LEFT_ON_TARGET',
        `Failed to pull '${target}': ${pullFailure.detail}\n` +
        `Switching back to '${branch}' also failed (${backFailure.detail}); the repository is still on '${target}'.`
      );
    }
    return failure(pullFailure.code, `Failed to pull '${target}': ${pullFailure.detail}`);
  }

  const checkoutBranch = await attemptGit(runner, config, ['checkout', branch]);
  if (!checkoutBranch.ok || checkoutBranch.result.exitCode !== 0) {
    return failure(
      'LEFT_ON_TARGET',
      `Pulled '${target}' but failed to checkout '${branch}' again: ${describeFailure(checkoutBranch).detail}\n` +
      `The repository is still on '${target}'.`
    );
  }

  const rebase = await attemptGit(runner, config, ['rebase', target]);
  if (!rebase.ok) {
    await abortRebase(runner, config, branch);
    const { code, detail } = describeFailure(rebase);
    gitLogger.warn({ branch, target, detail }, 'Rebase did not complete and was aborted');
    return failure(code, `Rebase of '${branch}' onto '${target}' did not complete (${detail}) and was aborted.`);
  }
  if (rebase.result.exitCode !== 0) {
    await abortRebase(runner, config, branch);
    gitLogger.warn({ branch, target }, 'Rebase stopped on conflicts and was aborted');
    return failure(
      'REBASE_CONFLICT',
      `Rebase of '${branch}' onto '${target}' hit conflicts and was aborted; '${branch}' is unchanged.\n` +
      `Resolve manually: git rebase ${target}, fix the conflicting files, git rebase --continue, ` +
      `then git push --force-with-lease.\n\n${combinedOutput(rebase.result)}`
    );
  }

  const push = await attemptGit(runner, config, ['push', '--force-with-lease']);
  if (!push.ok || push.result.exitCode !== 0) {
    const { detail } = describeFailure(push);
    gitLogger.warn({ branch, detail }, 'Force push failed after successful rebase');
    return failure(
      'REBASED_NOT_PUSHED',
      `Rebased '${branch}' onto '${target}' locally, but the push was rejected: ${detail}\n` +
      `The local branch is ahead of the remote; push it manually with git push --force-with-lease.`
    );
  }

  gitLogger.info({ branch, target }, 'Rebase pushed');
  return success(`Successfully rebased '${branch}' onto the latest '${target}' and force-pushed.`);
}

export async function rebaseOnTarget(deps: WorkflowDeps): Promise<OperationOutcome> {
  const loaded = loadConfig(deps.env);
  if (!loaded.ok) {
    return loaded;
  }
  const { config } = loaded;
  const lock = deps.lock ?? repositoryLock;

  try {
    return await lock.withLock(config.repositoryPath, () => rebaseSteps(deps.runner, config));
  } catch (error) {
    gitLogger.error({ error: serializeError(error), repositoryPath: config.repositoryPath }, 'Rebase workflow failed');
    return failureFromError(error);
  }
}
