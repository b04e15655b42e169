/**
 * Logger tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import { getDefaultConfig, resetConfig, setConfig } from '../config/index.js';
import { createLogger, getLogger, resetLogger } from './logger.js';

describe('getLogger', () => {
  afterEach(() => {
    resetConfig();
    resetLogger();
  });

  it('should return the same instance until reset', () => {
    const first = getLogger();

    expect(getLogger()).toBe(first);
    resetLogger();
    expect(getLogger()).not.toBe(first);
  });

  it('should pick up the configured level after a reset', () => {
    setConfig({ ...getDefaultConfig(), logLevel: 'warn', logFormat: 'json' });
    resetLogger();

    expect(getLogger().level).toBe('warn');
  });

  it('should bind context on child loggers', () => {
    setConfig({ ...getDefaultConfig(), logLevel: 'silent', logFormat: 'json' });
    resetLogger();

    expect(createLogger({ module: 'loader' }).bindings()).toMatchObject({ module: 'loader' });
  });
});
