import { renderOutcome, type OperationOutcome } from '../../../shared/outcome.js';

export type ToolResponse = {
  content: { type: 'text'; text: string }[];
  isError?: boolean;
};

export function textResponse(text: string, isError = false): ToolResponse {
  return {
    content: [{ type: 'text' as const, text }],
    ...(isError ? { isError: true } : {}),
  };
}

export function outcomeResponse(outcome: OperationOutcome): ToolResponse {
  return textResponse(renderOutcome(outcome), !outcome.ok);
}

/**
 * zod issues flattened to "path: message; ..." for a tool-call error.
 */
export function formatValidationIssues(issues: { path: (string | number)[]; message: string }[]): string {
  return issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message)).join('; ');
}
