import { describe, it, expect } from 'vitest';
import { getLoggingConfig } from '../src/logging/config.js';
import { prettyDestination } from '../src/logging/factory.js';

describe('getLoggingConfig', () => {
  it('logs to stderr as json by default', () => {
    expect(getLoggingConfig({})).toEqual({ level: 'info', destination: 'stderr', format: 'json' });
  });

  it('keeps a file destination alongside the pretty format', () => {
    expect(getLoggingConfig({ LOG_FORMAT: 'pretty', LOG_DESTINATION: '/tmp/gitlab-flow.log' })).toEqual({
      level: 'info',
      destination: '/tmp/gitlab-flow.log',
      format: 'pretty',
    });
  });
});

describe('prettyDestination', () => {
  it('maps the standard streams to their file descriptors', () => {
    expect(prettyDestination('stdout')).toBe(1);
    expect(prettyDestination('stderr')).toBe(2);
  });

  it('passes a file path through', () => {
    expect(prettyDestination('/tmp/gitlab-flow.log')).toBe('/tmp/gitlab-flow.log');
  });
});
