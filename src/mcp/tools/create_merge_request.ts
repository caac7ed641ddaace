import { z } from 'zod';
import { createMergeRequest as runCreateMergeRequest } from '../../git/mergeRequest.js';
import type { WorkflowDeps } from '../../git/types.js';
import { formatDuration, mcpLogger } from '../../logging/index.js';
import { formatValidationIssues, outcomeResponse, textResponse, type ToolResponse } from './shared/response.js';

export const createMergeRequestParams = z.object({
  title: z.string().min(1).describe('Title of the merge request'),
  description: z.string().describe('Description/body of the merge request (Markdown)'),
  draft: z.boolean().optional().describe('Open as draft. Defaults to the server setting MR_DRAFT.'),
});

export const createMergeRequestSchema = {
  description: `Create a GitLab merge request for the current branch of PROJECT_DIR.

Pushes the branch to origin (setting upstream), then opens a merge request into
TARGET_BRANCH (default "staging"), assigned to GITLAB_USERNAME, with
"remove source branch" enabled.

Parameters:
- title: Merge request title (required)
- description: Merge request body (required, may be empty)
- draft: Open as draft (optional)

Returns: glab's output including the merge request URL, or an error message.
If the push succeeded but creation failed, the branch stays pushed.`,
  inputSchema: createMergeRequestParams.shape,
};

export async function createMergeRequest(args: unknown, deps: WorkflowDeps): Promise<ToolResponse> {
  const parsed = createMergeRequestParams.safeParse(args);
  if (!parsed.success) {
    return textResponse(`Error: Invalid arguments: ${formatValidationIssues(parsed.error.issues)}`, true);
  }

  mcpLogger.toolCall('create_merge_request', { title: parsed.data.title, draft: parsed.data.draft });
  const startedAt = Date.now();
  const outcome = await runCreateMergeRequest(parsed.data, deps);

  if (!outcome.ok) {
    mcpLogger.toolError('create_merge_request', `${outcome.code}: ${outcome.reason}`);
  } else {
    mcpLogger.info({ duration: formatDuration(Date.now() - startedAt) }, 'Merge request created');
  }
  return outcomeResponse(outcome);
}
