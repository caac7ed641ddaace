/**
 * Merge request creation: push the current branch, then `glab mr create`.
 */

import { DEFAULT_REMOTE_NAME, loadConfig, type Configuration } from '../config/index.js';
import { gitLogger, serializeError } from '../logging/index.js';
import { repositoryLock } from '../runner/repositoryLock.js';
import type { CommandRunner } from '../runner/commandRunner.js';
import { failure, failureFromError, success, type OperationOutcome } from '../shared/outcome.js';
import { diagnostic, getCurrentBranch, runGit, runGlab } from './commands.js';
import type { CreateMergeRequestInput, WorkflowDeps } from './types.js';

export function buildMergeRequestArgs(
  input: { title: string; description: string; draft: boolean },
  sourceBranch: string,
  config: Pick<Configuration, 'targetBranch' | 'username'>
): string[] {
  const args = [
    'mr', 'create',
    '--title', input.title,
    '--description', input.description,
    '--source-branch', sourceBranch,
    '--target-branch', config.targetBranch,
    '--assignee', config.username,
    '--remove-source-branch',
    '--yes',
  ];
  if (input.draft) {
    args.push('--draft');
  }
  return args;
}

async function pushAndCreate(
  input: CreateMergeRequestInput,
  runner: CommandRunner,
  config: Configuration
): Promise<OperationOutcome> {
  const sourceBranch = await getCurrentBranch(runner, config);
  const draft = input.draft ?? config.draft;

  gitLogger.info({ sourceBranch, targetBranch: config.targetBranch, draft }, 'Creating merge request');

  const push = await runGit(runner, config, ['push', '-u', DEFAULT_REMOTE_NAME, sourceBranch]);
  if (push.exitCode !== 0) {
    gitLogger.warn({ sourceBranch, exitCode: push.exitCode, stderr: push.stderr }, 'Push failed');
    return failure('COMMAND_FAILED', `Failed to push branch '${sourceBranch}': ${diagnostic(push)}`);
  }

  const create = await runGlab(runner, config, buildMergeRequestArgs({ ...input, draft }, sourceBranch, config));
  if (create.exitCode !== 0) {
    // The push is not rolled back; the branch stays on the remote
    gitLogger.warn({ sourceBranch, exitCode: create.exitCode, stderr: create.stderr }, 'glab mr create failed after push');
    return failure(
      'PUSHED_WITHOUT_MERGE_REQUEST',
      `Branch '${sourceBranch}' was pushed to ${DEFAULT_REMOTE_NAME}, but creating the merge request failed: ${diagnostic(create)}`
    );
  }

  gitLogger.info({ sourceBranch, targetBranch: config.targetBranch }, 'Merge request created');
  return success(`Successfully created merge request!\n\n${create.stdout.trim()}`);
}

/**
 * Push the current branch upstream and open a merge request into the
 * configured target branch, assigned to GITLAB_USERNAME.
 */
export async function createMergeRequest(input: CreateMergeRequestInput, deps: WorkflowDeps): Promise<OperationOutcome> {
  const loaded = loadConfig(deps.env);
  if (!loaded.ok) {
    return loaded;
  }
  const { config } = loaded;
  const lock = deps.lock ?? repositoryLock;

  try {
    return await lock.withLock(config.repositoryPath, () => pushAndCreate(input, deps.runner, config));
  } catch (error) {
    gitLogger.error({ error: serializeError(error), repositoryPath: config.repositoryPath }, 'Merge request workflow failed');
    return failureFromError(error);
  }
}
