import { describe, it, expect, afterEach, vi } from 'vitest';
import { resolveLogLevel } from '../../src/logger.js';

describe('resolveLogLevel', () => {
  it('should default to info', () => {
    expect(resolveLogLevel(undefined)).toBe('info');
  });

  it('should accept pino level names and silent', () => {
    expect(resolveLogLevel('debug')).toBe('debug');
    expect(resolveLogLevel('trace')).toBe('trace');
    expect(resolveLogLevel('silent')).toBe('silent');
  });

  it('should fall back to info for unknown names', () => {
    expect(resolveLogLevel('verbose')).toBe('info');
    expect(resolveLogLevel('')).toBe('info');
  });
});

describe('logger', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.resetModules();
  });

  it('should load with an unknown EXIF_CARRY_LOG_LEVEL', async () => {
    vi.stubEnv('EXIF_CARRY_LOG_LEVEL', 'verbose');
    vi.resetModules();

    const { logger } = await import('../../src/logger.js');

    expect(logger.level).toBe('info');
  });

  it('should honour a valid EXIF_CARRY_LOG_LEVEL', async () => {
    vi.stubEnv('EXIF_CARRY_LOG_LEVEL', 'warn');
    vi.resetModules();

    const { logger } = await import('../../src/logger.js');

    expect(logger.level).toBe('warn');
  });
});
