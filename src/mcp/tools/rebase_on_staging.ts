import { z } from 'zod';
import { rebaseOnTarget } from '../../git/stagingRebase.js';
import type { WorkflowDeps } from '../../git/types.js';
import { formatDuration, mcpLogger } from '../../logging/index.js';
import { outcomeResponse, type ToolResponse } from './shared/response.js';

export const rebaseOnStagingParams = z.object({});

export const rebaseOnStagingSchema = {
  description: `Rebase the current branch of PROJECT_DIR onto the latest TARGET_BRANCH (default "staging").

Checks out the target branch, pulls it, returns to the current branch, rebases,
and pushes with --force-with-lease. On conflicts the rebase is aborted and the
branch is left unchanged. Refuses to run when already on the target branch.`,
  inputSchema: rebaseOnStagingParams.shape,
};

export async function rebaseOnStaging(deps: WorkflowDeps): Promise<ToolResponse> {
  mcpLogger.toolCall('rebase_on_staging');
  const startedAt = Date.now();
  const outcome = await rebaseOnTarget(deps);

  if (!outcome.ok) {
    mcpLogger.toolError('rebase_on_staging', `${outcome.code}: ${outcome.reason}`);
  } else {
    mcpLogger.info({ duration: formatDuration(Date.now() - startedAt) }, 'Rebase completed');
  }
  return outcomeResponse(outcome);
}
