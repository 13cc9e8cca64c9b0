// ═══════════════════════════════════════════════════════════════════════════════
// LIFECYCLE — Lifetime Validation and Read-Time Flag Derivation
// ifaddr Address Model
// ═══════════════════════════════════════════════════════════════════════════════

import { InvalidAddressDescriptorError } from './errors.js';
import {
  AddressFlag,
  LIFETIME_PERMANENT,
  LIFETIME_UNKNOWN,
  type Lifetime,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// PREDICATES
// ─────────────────────────────────────────────────────────────────────────────────

export function isUnknownLifetime(time: Lifetime): boolean {
  return time === LIFETIME_UNKNOWN;
}

export function isPermanentLifetime(time: Lifetime): boolean {
  return time === LIFETIME_PERMANENT;
}

/**
 * A real point on the clock: neither sentinel.
 */
export function isConcreteLifetime(time: Lifetime): boolean {
  return !isUnknownLifetime(time) && !isPermanentLifetime(time);
}

// ─────────────────────────────────────────────────────────────────────────────────
// VALIDATION
// ─────────────────────────────────────────────────────────────────────────────────

function checkTimestamp(label: string, time: Lifetime): InvalidAddressDescriptorError | null {
  if (isUnknownLifetime(time) || isPermanentLifetime(time)) {
    return null;
  }
  // Fractions and values past 2^53 have no exact wire form either.
  if (!Number.isSafeInteger(time) || time < 0) {
    return new InvalidAddressDescriptorError(
      'NegativeTimestamp',
      `${label} must be a non-negative integer timestamp, LIFETIME_UNKNOWN or LIFETIME_PERMANENT, got ${time}`
    );
  }
  return null;
}

/**
 * Check a deprecation/expiration pair. Returns the first violation, or null.
 *
 * Both must be unknown, or both known; when both are known the address
 * cannot be deprecated after it expires.
 */
export function validateLifetimes(
  deprecationTime: Lifetime,
  expirationTime: Lifetime
): InvalidAddressDescriptorError | null {
  const negative =
    checkTimestamp('deprecationTime', deprecationTime) ??
    checkTimestamp('expirationTime', expirationTime);
  if (negative) {
    return negative;
  }

  if (isUnknownLifetime(deprecationTime) !== isUnknownLifetime(expirationTime)) {
    return new InvalidAddressDescriptorError(
      'AsymmetricLifetime',
      'deprecationTime and expirationTime must both be known or both be LIFETIME_UNKNOWN'
    );
  }

  if (!isUnknownLifetime(deprecationTime) && deprecationTime > expirationTime) {
    return new InvalidAddressDescriptorError(
      'DeprecationAfterExpiration',
      `deprecationTime ${deprecationTime} is later than expirationTime ${expirationTime}`
    );
  }

  return null;
}

// ─────────────────────────────────────────────────────────────────────────────────
// DERIVATION
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Flags as observed at `now`.
 *
 * - Both lifetimes unknown: stored flags unchanged.
 * - DEPRECATED is set once `now` reaches the deprecation time and cleared
 *   before it, whatever was stored.
 * - PERMANENT is set when both lifetimes are permanent and cleared when
 *   either is a concrete time.
 *
 * The stored value is never modified.
 */
export function effectiveFlags(
  stored: number,
  deprecationTime: Lifetime,
  expirationTime: Lifetime,
  now: number
): number {
  if (isUnknownLifetime(deprecationTime) && isUnknownLifetime(expirationTime)) {
    return stored;
  }

  let flags = stored;

  if (!isUnknownLifetime(deprecationTime)) {
    flags = now >= deprecationTime
      ? flags | AddressFlag.DEPRECATED
      : flags & ~AddressFlag.DEPRECATED;
  }

  if (isPermanentLifetime(deprecationTime) && isPermanentLifetime(expirationTime)) {
    flags |= AddressFlag.PERMANENT;
  } else if (isConcreteLifetime(deprecationTime) || isConcreteLifetime(expirationTime)) {
    flags &= ~AddressFlag.PERMANENT;
  }

  return flags >>> 0;
}
