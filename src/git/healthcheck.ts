/**
 * Environment and tooling report. Never throws: each check degrades to a ❌ line.
 */

import { existsSync } from 'node:fs';
import { readSettings, type Settings } from '../config/index.js';
import { gitLogger, serializeError } from '../logging/index.js';
import type { CommandRunner } from '../runner/commandRunner.js';
import { CommandTimeoutError, ExternalToolUnavailableError, errorMessage } from '../shared/errors.js';
import { diagnostic } from './commands.js';

export interface HealthCheckDeps {
  runner: CommandRunner;
  env?: NodeJS.ProcessEnv;
}

const MAX_DETAIL_LENGTH = 200;

// Reports are one line per check
function firstLine(text: string): string {
  const line = text.split('\n').map((l) => l.trim()).find((l) => l.length > 0) ?? '';
  return line.length > MAX_DETAIL_LENGTH ? `${line.slice(0, MAX_DETAIL_LENGTH)}…` : line;
}

function checkUsername(settings: Settings): string {
  return settings.username
    ? `✅ GITLAB_USERNAME: ${settings.username}`
    : '❌ GITLAB_USERNAME is not set';
}

function checkProjectDir(settings: Settings): string {
  if (!settings.repositoryPath) {
    return '❌ PROJECT_DIR is not set';
  }
  if (!existsSync(settings.repositoryPath)) {
    return `❌ PROJECT_DIR does not exist: ${settings.repositoryPath}`;
  }
  return `✅ PROJECT_DIR: ${settings.repositoryPath}`;
}

function checkTargetBranch(settings: Settings): string {
  return `✅ TARGET_BRANCH: ${settings.targetBranch}${settings.targetBranchIsDefault ? ' (default)' : ''}`;
}

async function checkGlabAuth(runner: CommandRunner, settings: Settings, cwd: string): Promise<string> {
  const tool = settings.glabBin;
  try {
    const result = await runner.run(tool, ['auth', 'status'], { cwd, timeoutMs: settings.healthCheckTimeoutMs });
    if (result.exitCode === 0) {
      return `✅ ${tool} is authenticated`;
    }
    return `❌ ${tool} authentication failed: ${firstLine(diagnostic(result))}`;
  } catch (error) {
    if (error instanceof ExternalToolUnavailableError) {
      return `❌ ${tool} not found; install the GitLab CLI`;
    }
    if (error instanceof CommandTimeoutError) {
      return `❌ ${tool} auth status timed out after ${error.timeoutMs}ms`;
    }
    gitLogger.warn({ error: serializeError(error) }, 'glab auth probe failed');
    return `❌ ${tool} auth status failed: ${firstLine(errorMessage(error))}`;
  }
}

async function checkGitVersion(runner: CommandRunner, settings: Settings, cwd: string): Promise<string> {
  const tool = settings.gitBin;
  try {
    const result = await runner.run(tool, ['--version'], { cwd, timeoutMs: settings.healthCheckTimeoutMs });
    if (result.exitCode === 0) {
      return `✅ ${tool} available: ${firstLine(result.stdout)}`;
    }
    return `❌ ${tool} --version failed: ${firstLine(diagnostic(result))}`;
  } catch (error) {
    if (error instanceof ExternalToolUnavailableError) {
      return `❌ ${tool} not found`;
    }
    if (error instanceof CommandTimeoutError) {
      return `❌ ${tool} --version timed out after ${error.timeoutMs}ms`;
    }
    gitLogger.warn({ error: serializeError(error) }, 'git version probe failed');
    return `❌ ${tool} --version failed: ${firstLine(errorMessage(error))}`;
  }
}

/**
 * Run every check in fixed order: username, project dir, target branch,
 * glab authentication, git availability.
 */
export async function checkHealth(deps: HealthCheckDeps): Promise<string[]> {
  const settings = readSettings(deps.env);
  const probeCwd = settings.repositoryPath && existsSync(settings.repositoryPath)
    ? settings.repositoryPath
    : process.cwd();

  const lines = [
    checkUsername(settings),
    checkProjectDir(settings),
    checkTargetBranch(settings),
  ];
  lines.push(await checkGlabAuth(deps.runner, settings, probeCwd));
  lines.push(await checkGitVersion(deps.runner, settings, probeCwd));
  return lines;
}
