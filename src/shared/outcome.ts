import { GitlabFlowError, errorMessage, type FailureCode } from './errors.js';

export type Success = { ok: true; message: string };
export type Failure = { ok: false; code: FailureCode; reason: string };

/**
 * Result of every public workflow. Rendered to text only at the MCP boundary.
 */
export type OperationOutcome = Success | Failure;

export function success(message: string): Success {
  return { ok: true, message };
}

export function failure(code: FailureCode, reason: string): Failure {
  return { ok: false, code, reason };
}

/**
 * Map anything thrown inside a workflow onto a Failure.
 */
export function failureFromError(error: unknown): Failure {
  if (error instanceof GitlabFlowError) {
    return failure(error.code, error.message);
  }
  return failure('INTERNAL', `Unexpected error: ${errorMessage(error)}`);
}

export function renderOutcome(outcome: OperationOutcome): string {
  return outcome.ok ? outcome.message : `Error: ${outcome.reason}`;
}
