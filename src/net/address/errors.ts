// ═══════════════════════════════════════════════════════════════════════════════
// ADDRESS ERRORS — Validation and Decode Failures
// ifaddr Address Model
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// VALIDATION
// ─────────────────────────────────────────────────────────────────────────────────

export type InvalidAddressReason =
  | 'NullAddress'
  | 'PrefixOutOfRange'
  | 'MulticastAddress'
  | 'AsymmetricLifetime'
  | 'DeprecationAfterExpiration'
  | 'NegativeTimestamp';

/**
 * Raised when descriptor inputs violate a construction rule.
 * No descriptor is produced.
 */
export class InvalidAddressDescriptorError extends Error {
  readonly name = 'InvalidAddressDescriptorError';
  readonly reason: InvalidAddressReason;

  constructor(reason: InvalidAddressReason, message: string) {
    super(message);
    this.reason = reason;
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// ENCODING
// ─────────────────────────────────────────────────────────────────────────────────

export type AddressEncodeReason =
  | 'FlagsOutOfRange'
  | 'ScopeOutOfRange';

/**
 * Raised when a descriptor holds a value its wire field cannot carry:
 * flags outside uint32 or a scope outside int32.
 */
export class AddressEncodeError extends Error {
  readonly name = 'AddressEncodeError';
  readonly reason: AddressEncodeReason;

  constructor(reason: AddressEncodeReason, message: string) {
    super(message);
    this.reason = reason;
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// DECODING
// ─────────────────────────────────────────────────────────────────────────────────

export type AddressDecodeReason =
  | 'Truncated'
  | 'TrailingData'
  | 'BadAddressLength'
  | 'TimestampOutOfRange'
  | 'InvalidDescriptor';

/**
 * Raised when encoded bytes cannot be turned into a descriptor.
 * When the fields parse but fail validation, `cause` holds the
 * InvalidAddressDescriptorError.
 */
export class AddressDecodeError extends Error {
  readonly name = 'AddressDecodeError';
  readonly reason: AddressDecodeReason;

  constructor(reason: AddressDecodeReason, message: string, options?: { cause?: InvalidAddressDescriptorError }) {
    super(message, options);
    this.reason = reason;
  }
}
