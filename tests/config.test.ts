/**
 * Tests for configuration and logger replacement.
 */
import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  configure,
  getConfig,
  resetConfig,
  setLogger,
  getLogger,
  resetLogger,
  ConfigurationException,
} from '../src/index.js';

afterEach(() => {
  resetConfig();
  resetLogger();
  vi.restoreAllMocks();
});

describe('configuration', () => {
  it('should start from the defaults', () => {
    expect(getConfig()).toEqual({
      overriddenSuffix: '__overridden',
      commentsKey: '_comments',
      defaultViewMode: 'simple',
      qualifierSeparator: '.',
    });
  });

  it('should merge partial settings', () => {
    configure({ commentsKey: '__labels' });
    configure({ defaultViewMode: 'full' });

    expect(getConfig()).toEqual({
      overriddenSuffix: '__overridden',
      commentsKey: '__labels',
      defaultViewMode: 'full',
      qualifierSeparator: '.',
    });
  });

  it('should reject invalid settings and keep the previous ones', () => {
    configure({ commentsKey: '__labels' });

    expect(() => configure({ qualifierSeparator: '::' })).toThrow(ConfigurationException);
    expect(getConfig().commentsKey).toBe('__labels');
    expect(getConfig().qualifierSeparator).toBe('.');
  });

  it('should list the failing settings in the exception details', () => {
    try {
      configure({ overriddenSuffix: '' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationException);
      if (error instanceof ConfigurationException) {
        expect(error.message).toBe('Invalid entity-kit configuration');
        expect(error.code).toBe('CONFIGURATION_ERROR');
        expect(error.details).toMatchObject([{ path: 'overriddenSuffix' }]);
      }
    }
  });

  it('should restore the defaults on reset', () => {
    configure({ overriddenSuffix: '_orig' });
    resetConfig();

    expect(getConfig().overriddenSuffix).toBe('__overridden');
  });
});

describe('logger', () => {
  it('should write to the console with a prefix by default', () => {
    const spy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    getLogger().warn('Something odd', { entity: 'Book' });
    getLogger().warn('No context');

    expect(spy).toHaveBeenNthCalledWith(1, '[entity-kit] Something odd', { entity: 'Book' });
    expect(spy).toHaveBeenNthCalledWith(2, '[entity-kit] No context');
  });

  it('should use a replacement logger', () => {
    const logger = { warn: vi.fn(), error: vi.fn() };
    setLogger(logger);

    getLogger().error('Failed', { field: 'title' });

    expect(logger.error).toHaveBeenCalledWith('Failed', { field: 'title' });
    expect(getLogger()).toBe(logger);
  });
});
