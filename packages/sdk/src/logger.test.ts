// @outline-admin/sdk - Tests for the logger singleton

import { describe, it, expect, afterEach } from 'vitest';
import { getLogger, initLogger } from './logger.js';

describe('logger', () => {
  const originalLevel = process.env.LOG_LEVEL;

  afterEach(() => {
    if (originalLevel === undefined) delete process.env.LOG_LEVEL;
    else process.env.LOG_LEVEL = originalLevel;
  });

  it('uses the level from config', () => {
    expect(initLogger({ logLevel: 'debug', logFormat: 'json' }).level).toBe('debug');
  });

  it('falls back to LOG_LEVEL', () => {
    process.env.LOG_LEVEL = 'warn';
    expect(initLogger().level).toBe('warn');
  });

  it('getLogger returns the initialized instance', () => {
    const logger = initLogger({ logLevel: 'silent', logFormat: 'json' });
    expect(getLogger()).toBe(logger);
  });
});
