import { describe, it, expect, vi } from 'vitest';
import { loadConfig, readSettings } from '../src/config/index.js';
import { configLogger } from '../src/logging/index.js';

describe('loadConfig', () => {
  it('reports both required variables when neither is set', () => {
    expect(loadConfig({})).toEqual({
      ok: false,
      code: 'CONFIGURATION_MISSING',
      reason: 'GITLAB_USERNAME and PROJECT_DIR must be set in the environment or .env',
    });
  });

  it('reports only the missing variable', () => {
    expect(loadConfig({ GITLAB_USERNAME: 'alice' })).toEqual({
      ok: false,
      code: 'CONFIGURATION_MISSING',
      reason: 'PROJECT_DIR must be set in the environment or .env',
    });
  });

  it('logs the missing variables', () => {
    const warn = vi.spyOn(configLogger, 'warn');

    loadConfig({ GITLAB_USERNAME: 'alice' });

    expect(warn).toHaveBeenCalledWith({ missing: ['PROJECT_DIR'] }, 'Required configuration missing');
    warn.mockRestore();
  });

  it('treats blank values as unset', () => {
    const result = loadConfig({ GITLAB_USERNAME: '   ', PROJECT_DIR: '/repo' });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.reason).toBe('GITLAB_USERNAME must be set in the environment or .env');
    }
  });

  it('applies defaults', () => {
    expect(loadConfig({ GITLAB_USERNAME: 'alice', PROJECT_DIR: '/repo' })).toEqual({
      ok: true,
      config: {
        repositoryPath: '/repo',
        username: 'alice',
        targetBranch: 'staging',
        draft: false,
        commandTimeoutMs: undefined,
        gitBin: 'git',
        glabBin: 'glab',
      },
    });
  });

  it('reads optional settings', () => {
    const result = loadConfig({
      GITLAB_USERNAME: 'alice',
      PROJECT_DIR: '/repo',
      TARGET_BRANCH: 'develop',
      MR_DRAFT: 'true',
      COMMAND_TIMEOUT_MS: '30000',
      GLAB_BIN: '/opt/bin/glab',
    });
    expect(result).toMatchObject({
      ok: true,
      config: {
        targetBranch: 'develop',
        draft: true,
        commandTimeoutMs: 30000,
        glabBin: '/opt/bin/glab',
      },
    });
  });
});

describe('readSettings', () => {
  it('never fails on an empty environment', () => {
    expect(readSettings({})).toEqual({
      username: undefined,
      repositoryPath: undefined,
      targetBranch: 'staging',
      targetBranchIsDefault: true,
      draft: false,
      commandTimeoutMs: undefined,
      healthCheckTimeoutMs: 5000,
      gitBin: 'git',
      glabBin: 'glab',
    });
  });

  it('trims values and marks an explicit target branch', () => {
    const settings = readSettings({ PROJECT_DIR: ' /repo ', TARGET_BRANCH: 'main' });
    expect(settings.repositoryPath).toBe('/repo');
    expect(settings.targetBranch).toBe('main');
    expect(settings.targetBranchIsDefault).toBe(false);
  });

  it.each([
    ['1', true],
    ['YES', true],
    ['on', true],
    ['0', false],
    ['false', false],
  ])('parses MR_DRAFT=%s as %s', (value, expected) => {
    expect(readSettings({ MR_DRAFT: value }).draft).toBe(expected);
  });

  it('falls back to defaults for unparseable timeouts', () => {
    const settings = readSettings({ COMMAND_TIMEOUT_MS: 'soon', HEALTH_CHECK_TIMEOUT_MS: '-5' });
    expect(settings.commandTimeoutMs).toBeUndefined();
    expect(settings.healthCheckTimeoutMs).toBe(5000);
  });

  it('accepts a custom health check timeout', () => {
    expect(readSettings({ HEALTH_CHECK_TIMEOUT_MS: '2500' }).healthCheckTimeoutMs).toBe(2500);
  });
});
