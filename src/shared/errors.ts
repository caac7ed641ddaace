/**
 * Error taxonomy for the git/glab workflows.
 *
 * Workflows never let these escape: they are caught at the operation boundary
 * and turned into a failed OperationOutcome carrying the same `code`.
 */

export type FailureCode =
  | 'CONFIGURATION_MISSING'
  | 'REPOSITORY_STATE'
  | 'COMMAND_FAILED'
  | 'TOOL_UNAVAILABLE'
  | 'COMMAND_TIMEOUT'
  | 'INTERNAL'
  | 'PUSHED_WITHOUT_MERGE_REQUEST'
  | 'LEFT_ON_TARGET'
  | 'REBASE_CONFLICT'
  | 'REBASED_NOT_PUSHED';

export class GitlabFlowError extends Error {
  constructor(message: string, public readonly code: FailureCode) {
    super(message);
    this.name = 'GitlabFlowError';
  }
}

export class ConfigurationMissingError extends GitlabFlowError {
  constructor(public readonly missing: string[]) {
    super(`${missing.join(' and ')} must be set in the environment or .env`, 'CONFIGURATION_MISSING');
    this.name = 'ConfigurationMissingError';
  }
}

export class RepositoryStateError extends GitlabFlowError {
  constructor(message: string) {
    super(message, 'REPOSITORY_STATE');
    this.name = 'RepositoryStateError';
  }
}

export class ExternalCommandError extends GitlabFlowError {
  constructor(
    message: string,
    public readonly command: string,
    public readonly exitCode: number,
    public readonly stderr: string
  ) {
    super(message, 'COMMAND_FAILED');
    this.name = 'ExternalCommandError';
  }
}

export class ExternalToolUnavailableError extends GitlabFlowError {
  constructor(public readonly command: string) {
    super(`Command not found: ${command}`, 'TOOL_UNAVAILABLE');
    this.name = 'ExternalToolUnavailableError';
  }
}

export class CommandTimeoutError extends GitlabFlowError {
  constructor(public readonly command: string, public readonly timeoutMs: number) {
    super(`${command} timed out after ${timeoutMs}ms`, 'COMMAND_TIMEOUT');
    this.name = 'CommandTimeoutError';
  }
}

export class UnexpectedInternalError extends GitlabFlowError {
  constructor(message: string, public readonly originalError?: unknown) {
    super(message, 'INTERNAL');
    this.name = 'UnexpectedInternalError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message || error.toString();
  if (typeof error === 'string') return error;
  return String(error);
}
