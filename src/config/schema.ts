// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION SCHEMA — Zod Validation for Library Settings
// ifaddr Configuration
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';

// ─────────────────────────────────────────────────────────────────────────────────
// ENVIRONMENT
// ─────────────────────────────────────────────────────────────────────────────────

export const EnvironmentSchema = z.enum(['development', 'test', 'production']);

export type Environment = z.infer<typeof EnvironmentSchema>;

// ─────────────────────────────────────────────────────────────────────────────────
// SECTIONS
// ─────────────────────────────────────────────────────────────────────────────────

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']);

export const LoggingConfigSchema = z.object({
  /** Minimum level written */
  level: LogLevelSchema.default('info'),

  /** Single-line colored output instead of JSON */
  pretty: z.boolean().default(true),

  /** Master switch; tests usually turn this off */
  enabled: z.boolean().default(true),
});

export const AddressConfigSchema = z.object({
  /**
   * Parse `::ffff:a.b.c.d` as the IPv4 address `a.b.c.d`, so that the two
   * spellings compare equal. Existing callers depend on this.
   */
  collapseMappedIpv4: z.boolean().default(true),
});

export const CodecConfigSchema = z.object({
  /** Read only the four legacy fields and ignore anything after them */
  legacyCompat: z.boolean().default(false),
});

// ─────────────────────────────────────────────────────────────────────────────────
// ROOT SCHEMA
// ─────────────────────────────────────────────────────────────────────────────────

export const LibraryConfigSchema = z.object({
  environment: EnvironmentSchema.default('development'),
  logging: LoggingConfigSchema.default({}),
  address: AddressConfigSchema.default({}),
  codec: CodecConfigSchema.default({}),
});

export type LibraryConfig = z.infer<typeof LibraryConfigSchema>;

/**
 * Input accepted by the schema: every key optional, defaults filled in.
 */
export type LibraryConfigInput = z.input<typeof LibraryConfigSchema>;

// ─────────────────────────────────────────────────────────────────────────────────
// VALIDATION HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Raised when configuration fails schema validation.
 */
export class ConfigValidationError extends Error {
  readonly name = 'ConfigValidationError';
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

/**
 * Format zod issues as `path: message` strings.
 */
export function formatConfigErrors(error: z.ZodError): string[] {
  return error.errors.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Validate raw configuration, throwing ConfigValidationError on failure.
 */
export function validateConfig(input: unknown): LibraryConfig {
  const result = LibraryConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigValidationError(formatConfigErrors(result.error));
  }
  return result.data;
}

export function safeValidateConfig(input: unknown): z.SafeParseReturnType<LibraryConfigInput, LibraryConfig> {
  return LibraryConfigSchema.safeParse(input);
}

/**
 * Defaults for an environment. Production logs JSON; tests stay quiet.
 */
export function getDefaultConfig(environment: Environment): LibraryConfig {
  switch (environment) {
    case 'production':
      return validateConfig({ environment, logging: { pretty: false } });
    case 'test':
      return validateConfig({ environment, logging: { enabled: false } });
    default:
      return validateConfig({ environment });
  }
}
