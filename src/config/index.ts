// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG MODULE — Exports
// ifaddr Configuration
// ═══════════════════════════════════════════════════════════════════════════════

export {
  EnvironmentSchema,
  LogLevelSchema,
  LoggingConfigSchema,
  AddressConfigSchema,
  CodecConfigSchema,
  LibraryConfigSchema,
  ConfigValidationError,
  formatConfigErrors,
  validateConfig,
  safeValidateConfig,
  getDefaultConfig,
  type Environment,
  type LibraryConfig,
  type LibraryConfigInput,
} from './schema.js';

export {
  envBool,
  envString,
  getEnvironment,
  loadConfig,
  getConfig,
  isConfigLoaded,
  resetConfig,
  loadTestConfig,
} from './loader.js';
