import * as dotenv from 'dotenv';
import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';

let loadedFrom: string | null | undefined;

/**
 * Idempotent .env loader for the MCP server.
 *
 * Load order (first found wins):
 * 1) Explicit file via GITLAB_FLOW_ENV_PATH
 * 2) process.cwd()/.env and up to 3 parent dirs
 * 3) the package root (two levels above this module, src/ or dist/)
 *
 * Variables already present in the process environment are never overridden,
 * so an MCP client's `env` block takes precedence over the file.
 *
 * Returns the file that was loaded, or null when none was found.
 */
export function loadEnvOnce(): string | null {
  if (loadedFrom !== undefined) {
    return loadedFrom;
  }

  const candidates: string[] = [];

  const explicit = process.env.GITLAB_FLOW_ENV_PATH;
  if (explicit) {
    candidates.push(path.resolve(explicit));
  }

  let cur = process.cwd();
  for (let i = 0; i < 4; i++) {
    candidates.push(path.join(cur, '.env'));
    const parent = path.dirname(cur);
    if (parent === cur) break;
    cur = parent;
  }

  const here = path.dirname(fileURLToPath(import.meta.url));
  candidates.push(path.resolve(here, '..', '..', '.env'));

  loadedFrom = null;
  const tried = new Set<string>();
  for (const candidate of candidates) {
    if (tried.has(candidate)) continue;
    tried.add(candidate);
    if (!fs.existsSync(candidate)) continue;

    const res = dotenv.config({ path: candidate, override: false, quiet: true });
    if (!res.error) {
      loadedFrom = candidate;
      break;
    }
  }

  return loadedFrom;
}
