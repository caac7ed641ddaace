/**
 * Configuration module for the GitLab flow MCP server.
 *
 * All environment access goes through the zod schema below. `readSettings`
 * is lenient and never fails (the health check reports on whatever it finds);
 * `loadConfig` adds the presence checks the two mutating workflows need.
 *
 * Calling code is responsible for loading .env (see env/index.ts) before the
 * first read.
 */

import { z } from 'zod';
import { configLogger } from '../logging/index.js';
import { ConfigurationMissingError } from '../shared/errors.js';
import { failure, type Failure } from '../shared/outcome.js';

export const DEFAULT_TARGET_BRANCH = 'staging';
export const DEFAULT_HEALTH_CHECK_TIMEOUT_MS = 5000;
export const DEFAULT_REMOTE_NAME = 'origin';

// Blank values count as unset
const optionalString = z.preprocess(
  (v) => (typeof v === 'string' && v.trim() === '' ? undefined : v),
  z.string().trim().optional()
);

const TRUTHY = ['1', 'true', 'yes', 'on'];

const settingsSchema = z.object({
  // GITLAB_USERNAME: assignee of created merge requests (required by workflows)
  GITLAB_USERNAME: optionalString,

  // PROJECT_DIR: working copy every git/glab command runs in (required by workflows)
  PROJECT_DIR: optionalString,

  // TARGET_BRANCH: merge request target and rebase base
  TARGET_BRANCH: optionalString,

  // MR_DRAFT: open merge requests as drafts unless the caller says otherwise
  MR_DRAFT: z.string().optional().transform((v) => (v ? TRUTHY.includes(v.trim().toLowerCase()) : false)),

  // COMMAND_TIMEOUT_MS: applied to every workflow command; unset means no timeout
  COMMAND_TIMEOUT_MS: z.coerce.number().int().positive().optional().catch(undefined),

  HEALTH_CHECK_TIMEOUT_MS: z.coerce.number().int().positive().optional().catch(undefined),

  GIT_BIN: optionalString,
  GLAB_BIN: optionalString,
});

export interface Settings {
  username?: string;
  repositoryPath?: string;
  targetBranch: string;
  targetBranchIsDefault: boolean;
  draft: boolean;
  commandTimeoutMs?: number;
  healthCheckTimeoutMs: number;
  gitBin: string;
  glabBin: string;
}

export interface Configuration {
  repositoryPath: string;
  username: string;
  targetBranch: string;
  draft: boolean;
  commandTimeoutMs?: number;
  gitBin: string;
  glabBin: string;
}

export type ConfigResult = { ok: true; config: Configuration } | Failure;

/**
 * Read every known variable without enforcing presence.
 */
export function readSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = settingsSchema.parse(env);

  return {
    username: parsed.GITLAB_USERNAME,
    repositoryPath: parsed.PROJECT_DIR,
    targetBranch: parsed.TARGET_BRANCH ?? DEFAULT_TARGET_BRANCH,
    targetBranchIsDefault: parsed.TARGET_BRANCH === undefined,
    draft: parsed.MR_DRAFT,
    commandTimeoutMs: parsed.COMMAND_TIMEOUT_MS,
    healthCheckTimeoutMs: parsed.HEALTH_CHECK_TIMEOUT_MS ?? DEFAULT_HEALTH_CHECK_TIMEOUT_MS,
    gitBin: parsed.GIT_BIN ?? 'git',
    glabBin: parsed.GLAB_BIN ?? 'glab',
  };
}

/**
 * Resolve the configuration a mutating workflow needs, or a
 * CONFIGURATION_MISSING failure naming what is absent.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ConfigResult {
  const settings = readSettings(env);
  const { username, repositoryPath } = settings;

  if (!username || !repositoryPath) {
    const missing: string[] = [];
    if (!username) missing.push('GITLAB_USERNAME');
    if (!repositoryPath) missing.push('PROJECT_DIR');
    const error = new ConfigurationMissingError(missing);
    configLogger.warn({ missing }, 'Required configuration missing');
    return failure(error.code, error.message);
  }

  return {
    ok: true,
    config: {
      repositoryPath,
      username,
      targetBranch: settings.targetBranch,
      draft: settings.draft,
      commandTimeoutMs: settings.commandTimeoutMs,
      gitBin: settings.gitBin,
      glabBin: settings.glabBin,
    },
  };
}
