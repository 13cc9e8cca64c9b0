// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION TESTS — Schema Validation and Environment Loading
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  LibraryConfigSchema,
  ConfigValidationError,
  formatConfigErrors,
  getDefaultConfig,
  safeValidateConfig,
  validateConfig,
} from '../schema.js';
import {
  envBool,
  envString,
  getConfig,
  getEnvironment,
  isConfigLoaded,
  loadConfig,
  loadTestConfig,
  resetConfig,
} from '../loader.js';

// ─────────────────────────────────────────────────────────────────────────────────
// SCHEMA TESTS
// ─────────────────────────────────────────────────────────────────────────────────

describe('Configuration Schema', () => {
  describe('LibraryConfigSchema', () => {
    it('should accept empty object with all defaults', () => {
      const result = LibraryConfigSchema.safeParse({});
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data).toEqual({
          environment: 'development',
          logging: { level: 'info', pretty: true, enabled: true },
          address: { collapseMappedIpv4: true },
          codec: { legacyCompat: false },
        });
      }
    });

    it('should reject an unknown log level', () => {
      const result = safeValidateConfig({ logging: { level: 'verbose' } });
      expect(result.success).toBe(false);
      if (!result.success) {
        const messages = formatConfigErrors(result.error);
        expect(messages).toHaveLength(1);
        expect(messages[0]?.startsWith('logging.level: ')).toBe(true);
      }
    });

    it('should reject non-boolean switches', () => {
      expect(safeValidateConfig({ codec: { legacyCompat: 'yes' } }).success).toBe(false);
    });
  });

  describe('validateConfig', () => {
    it('should throw ConfigValidationError with issues', () => {
      try {
        validateConfig({ environment: 'staging' });
        expect.unreachable('validateConfig should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigValidationError);
        if (error instanceof ConfigValidationError) {
          expect(error.issues).toHaveLength(1);
          expect(error.issues[0]?.startsWith('environment: ')).toBe(true);
          expect(error.message.startsWith('Invalid configuration: environment: ')).toBe(true);
        }
      }
    });
  });

  describe('getDefaultConfig', () => {
    it('should log JSON in production', () => {
      expect(getDefaultConfig('production').logging.pretty).toBe(false);
      expect(getDefaultConfig('production').logging.enabled).toBe(true);
    });

    it('should keep tests quiet', () => {
      expect(getDefaultConfig('test').logging.enabled).toBe(false);
    });

    it('should log pretty output in development', () => {
      const config = getDefaultConfig('development');
      expect(config.logging.pretty).toBe(true);
      expect(config.address.collapseMappedIpv4).toBe(true);
      expect(config.codec.legacyCompat).toBe(false);
    });
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// LOADER TESTS
// ─────────────────────────────────────────────────────────────────────────────────

describe('Configuration Loader', () => {
  beforeEach(() => {
    resetConfig();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  describe('environment helpers', () => {
    it('should read boolean spellings', () => {
      vi.stubEnv('IFADDR_TEST_FLAG', 'YES');
      expect(envBool('IFADDR_TEST_FLAG')).toBe(true);
      vi.stubEnv('IFADDR_TEST_FLAG', ' 0 ');
      expect(envBool('IFADDR_TEST_FLAG')).toBe(false);
      vi.stubEnv('IFADDR_TEST_FLAG', 'maybe');
      expect(envBool('IFADDR_TEST_FLAG')).toBe('maybe');
      vi.stubEnv('IFADDR_TEST_FLAG', '');
      expect(envBool('IFADDR_TEST_FLAG')).toBeUndefined();
    });

    it('should treat blank strings as unset', () => {
      vi.stubEnv('IFADDR_TEST_TEXT', '   ');
      expect(envString('IFADDR_TEST_TEXT')).toBeUndefined();
      vi.stubEnv('IFADDR_TEST_TEXT', ' debug ');
      expect(envString('IFADDR_TEST_TEXT')).toBe('debug');
    });

    it('should fall back to development for unknown NODE_ENV', () => {
      vi.stubEnv('NODE_ENV', 'staging');
      expect(getEnvironment()).toBe('development');
      vi.stubEnv('NODE_ENV', 'production');
      expect(getEnvironment()).toBe('production');
    });
  });

  describe('loadConfig', () => {
    it('should read settings from the environment', () => {
      vi.stubEnv('NODE_ENV', 'production');
      vi.stubEnv('IFADDR_LOG_LEVEL', 'debug');
      vi.stubEnv('IFADDR_COLLAPSE_MAPPED_IPV4', 'false');
      vi.stubEnv('IFADDR_CODEC_LEGACY_COMPAT', 'true');

      const config = loadConfig();
      expect(config.environment).toBe('production');
      expect(config.logging.level).toBe('debug');
      expect(config.logging.pretty).toBe(false);
      expect(config.address.collapseMappedIpv4).toBe(false);
      expect(config.codec.legacyCompat).toBe(true);
    });

    it('should apply environment defaults when variables are unset', () => {
      vi.stubEnv('NODE_ENV', 'test');
      vi.stubEnv('IFADDR_LOG_ENABLED', '');
      expect(loadConfig().logging.enabled).toBe(false);
    });

    it('should reject unusable values', () => {
      vi.stubEnv('IFADDR_LOG_ENABLED', 'maybe');
      expect(() => loadConfig()).toThrow(ConfigValidationError);
      expect(isConfigLoaded()).toBe(false);
    });

    it('should cache the loaded configuration', () => {
      const first = loadConfig();
      expect(isConfigLoaded()).toBe(true);
      expect(getConfig()).toBe(first);
      resetConfig();
      expect(isConfigLoaded()).toBe(false);
    });
  });

  describe('loadTestConfig', () => {
    it('should merge overrides over environment defaults', () => {
      vi.stubEnv('NODE_ENV', 'test');
      const config = loadTestConfig({ codec: { legacyCompat: true } });
      expect(config.codec.legacyCompat).toBe(true);
      expect(config.logging.enabled).toBe(false);
      expect(config.address.collapseMappedIpv4).toBe(true);
      expect(getConfig()).toBe(config);
    });
  });
});
