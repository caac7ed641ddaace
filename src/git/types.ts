import type { CommandRunner } from '../runner/commandRunner.js';
import type { RepositoryLock } from '../runner/repositoryLock.js';

/**
 * Collaborators shared by the workflows. Tests substitute the runner and the
 * environment; production code uses the defaults wired in mcp/server.ts.
 */
export interface WorkflowDeps {
  runner: CommandRunner;
  env?: NodeJS.ProcessEnv;
  lock?: RepositoryLock;
}

export interface CreateMergeRequestInput {
  title: string;
  description: string;
  /** Falls back to MR_DRAFT when omitted */
  draft?: boolean;
}
