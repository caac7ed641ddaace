/**
 * External process execution for git and glab.
 *
 * Every call names its working directory explicitly; the process-global cwd is
 * never changed, so concurrent tool calls cannot observe each other's repository.
 */

import { existsSync } from 'node:fs';
import { execa, ExecaError } from 'execa';
import { gitLogger, serializeError } from '../logging/index.js';
import {
  CommandTimeoutError,
  ExternalToolUnavailableError,
  RepositoryStateError,
  UnexpectedInternalError,
} from '../shared/errors.js';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  cwd: string;
  timeoutMs?: number;
}

export interface CommandRunner {
  /**
   * Run `command` with `args`. Resolves for any exit code; rejects with
   * ExternalToolUnavailableError, CommandTimeoutError or UnexpectedInternalError.
   */
  run(command: string, args: readonly string[], options: RunOptions): Promise<CommandResult>;
}

function textOf(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

export class ExecaCommandRunner implements CommandRunner {
  async run(command: string, args: readonly string[], { cwd, timeoutMs }: RunOptions): Promise<CommandResult> {
    const startedAt = Date.now();

    try {
      const result = await execa(command, args, { cwd, timeout: timeoutMs });
      const commandResult: CommandResult = {
        exitCode: result.exitCode ?? 0,
        stdout: textOf(result.stdout),
        stderr: textOf(result.stderr),
      };
      gitLogger.command(command, args, commandResult.exitCode, Date.now() - startedAt);
      return commandResult;
    } catch (error) {
      if (!(error instanceof ExecaError)) {
        gitLogger.error({ command, args, error: serializeError(error) }, 'Failed to spawn command');
        throw new UnexpectedInternalError(`Failed to run ${command}: ${String(error)}`, error);
      }

      if (error.code === 'ENOENT') {
        // spawn reports a missing cwd the same way as a missing executable
        if (!existsSync(cwd)) {
          throw new RepositoryStateError(`Working directory does not exist: ${cwd}`);
        }
        gitLogger.warn({ command, cwd }, 'Executable not found');
        throw new ExternalToolUnavailableError(command);
      }

      if (error.timedOut) {
        gitLogger.warn({ command, args, timeoutMs }, 'Command timed out');
        throw new CommandTimeoutError(command, timeoutMs ?? 0);
      }

      if (typeof error.exitCode === 'number') {
        const commandResult: CommandResult = {
          exitCode: error.exitCode,
          stdout: textOf(error.stdout),
          stderr: textOf(error.stderr),
        };
        gitLogger.command(command, args, commandResult.exitCode, Date.now() - startedAt);
        return commandResult;
      }

      // Killed by a signal or failed before producing an exit code
      gitLogger.error({ command, args, error: serializeError(error) }, 'Command terminated abnormally');
      throw new UnexpectedInternalError(`${command} terminated abnormally: ${error.message}`, error);
    }
  }
}
