// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG LOADER — Environment Variables → Validated Config
// ifaddr Configuration
// ═══════════════════════════════════════════════════════════════════════════════
//
// Environment variables:
//   NODE_ENV                       development | test | production
//   IFADDR_LOG_LEVEL               trace | debug | info | warn | error | fatal
//   IFADDR_LOG_PRETTY              true | false
//   IFADDR_LOG_ENABLED             true | false
//   IFADDR_COLLAPSE_MAPPED_IPV4    true | false
//   IFADDR_CODEC_LEGACY_COMPAT     true | false
//
// ═══════════════════════════════════════════════════════════════════════════════

import {
  EnvironmentSchema,
  getDefaultConfig,
  validateConfig,
  type Environment,
  type LibraryConfig,
  type LibraryConfigInput,
} from './schema.js';

// ─────────────────────────────────────────────────────────────────────────────────
// ENVIRONMENT HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Read a boolean variable. Unset yields undefined so schema defaults apply;
 * anything other than a recognised spelling is passed through as a string and
 * rejected by the schema.
 */
export function envBool(key: string): boolean | string | undefined {
  const value = process.env[key]?.trim().toLowerCase();
  if (value === undefined || value === '') return undefined;
  if (value === 'true' || value === '1' || value === 'yes') return true;
  if (value === 'false' || value === '0' || value === 'no') return false;
  return value;
}

export function envString(key: string): string | undefined {
  const value = process.env[key]?.trim();
  return value === '' ? undefined : value;
}

/**
 * Current environment. Unrecognised NODE_ENV values fall back to development,
 * and vitest's default of `test` is honoured.
 */
export function getEnvironment(): Environment {
  const parsed = EnvironmentSchema.safeParse(envString('NODE_ENV'));
  return parsed.success ? parsed.data : 'development';
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOADING
// ─────────────────────────────────────────────────────────────────────────────────

let cachedConfig: LibraryConfig | null = null;

/**
 * Raw, unvalidated settings; the schema decides what is acceptable.
 */
function readEnvironment(environment: Environment): Record<string, unknown> {
  const defaults = getDefaultConfig(environment);

  return {
    environment,
    logging: {
      level: envString('IFADDR_LOG_LEVEL') ?? defaults.logging.level,
      pretty: envBool('IFADDR_LOG_PRETTY') ?? defaults.logging.pretty,
      enabled: envBool('IFADDR_LOG_ENABLED') ?? defaults.logging.enabled,
    },
    address: {
      collapseMappedIpv4: envBool('IFADDR_COLLAPSE_MAPPED_IPV4') ?? defaults.address.collapseMappedIpv4,
    },
    codec: {
      legacyCompat: envBool('IFADDR_CODEC_LEGACY_COMPAT') ?? defaults.codec.legacyCompat,
    },
  };
}

/**
 * Load and cache configuration from the environment.
 * Throws ConfigValidationError when a variable holds an unusable value.
 */
export function loadConfig(): LibraryConfig {
  if (cachedConfig) return cachedConfig;
  cachedConfig = validateConfig(readEnvironment(getEnvironment()));
  return cachedConfig;
}

/**
 * Cached configuration, loading it on first use.
 */
export function getConfig(): LibraryConfig {
  return cachedConfig ?? loadConfig();
}

export function isConfigLoaded(): boolean {
  return cachedConfig !== null;
}

export function resetConfig(): void {
  cachedConfig = null;
}

/**
 * Install configuration built from environment defaults plus overrides.
 */
export function loadTestConfig(overrides: LibraryConfigInput = {}): LibraryConfig {
  const base = getDefaultConfig(getEnvironment());
  cachedConfig = validateConfig({
    ...base,
    ...overrides,
    logging: { ...base.logging, ...overrides.logging },
    address: { ...base.address, ...overrides.address },
    codec: { ...base.codec, ...overrides.codec },
  });
  return cachedConfig;
}
