// ═══════════════════════════════════════════════════════════════════════════════
// WIRE CODEC — Stable Binary Layout for Address Descriptors
// ifaddr Address Model
// ═══════════════════════════════════════════════════════════════════════════════
//
// Big-endian layout:
//
//   u8      address length (4 or 16)
//   bytes   address
//   u8      prefix length
//   u32     flags (as stored, not lifetime-adjusted)
//   i32     scope
//   ── legacy layout ends here ──
//   i64     deprecation time   (-1 unknown, 2^63-1 permanent)
//   i64     expiration time
//
// The current layout only appends fields, so a legacy reader that stops
// after scope is unaffected. Which layout a record uses is decided by its
// total length.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { getConfig } from '../../config/index.js';
import { loggers } from '../../observability/index.js';
import { err, mapErr, ok, unwrap, type Result } from '../../types/result.js';
import { IPV4_LENGTH, IPV6_LENGTH, IpAddress } from '../ip/ip-address.js';
import { AddressDescriptor } from './descriptor.js';
import { AddressDecodeError, AddressEncodeError } from './errors.js';
import { isPermanentLifetime, isUnknownLifetime } from './lifecycle.js';
import { LIFETIME_PERMANENT, LIFETIME_UNKNOWN, type Lifetime } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// CONSTANTS
// ─────────────────────────────────────────────────────────────────────────────────

export type WireLayout = 'legacy' | 'current';

/** Fields per layout: address, prefix, flags, scope (+ deprecation, expiration) */
export const LAYOUT_FIELD_COUNT: Record<WireLayout, number> = {
  legacy: 4,
  current: 6,
};

/** Length byte + prefix + flags + scope, excluding the address itself */
const LEGACY_FIXED_BYTES = 1 + 1 + 4 + 4;
const LIFETIME_BYTES = 8 + 8;

const WIRE_UNKNOWN = -1n;
const WIRE_PERMANENT = 0x7fff_ffff_ffff_ffffn;
const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);
const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER);

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface DecodeOptions {
  /**
   * Read the four legacy fields and ignore whatever follows them.
   * Defaults to the `codec.legacyCompat` config value.
   */
  readonly legacyCompat?: boolean;
}

export interface DecodedAddress {
  readonly descriptor: AddressDescriptor;
  /** Layout the record was read as; pass it back to encode for identical bytes */
  readonly layout: WireLayout;
}

// ─────────────────────────────────────────────────────────────────────────────────
// HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Encoded size of a descriptor whose address has `addressLength` bytes.
 */
export function encodedLength(addressLength: number, layout: WireLayout): number {
  const legacy = LEGACY_FIXED_BYTES + addressLength;
  return layout === 'legacy' ? legacy : legacy + LIFETIME_BYTES;
}

function lifetimeToWire(time: Lifetime): bigint {
  if (isUnknownLifetime(time)) return WIRE_UNKNOWN;
  if (isPermanentLifetime(time)) return WIRE_PERMANENT;
  return BigInt(time);
}

function lifetimeFromWire(value: bigint, label: string): Result<Lifetime, AddressDecodeError> {
  if (value === WIRE_UNKNOWN) return ok(LIFETIME_UNKNOWN);
  if (value === WIRE_PERMANENT) return ok(LIFETIME_PERMANENT);
  if (value > MAX_SAFE || value < MIN_SAFE) {
    return err(new AddressDecodeError('TimestampOutOfRange', `${label} ${value} is not representable`));
  }
  return ok(Number(value));
}

function resolveLayout(
  length: number,
  addressLength: number,
  legacyCompat: boolean
): Result<WireLayout, AddressDecodeError> {
  const legacy = encodedLength(addressLength, 'legacy');
  const current = encodedLength(addressLength, 'current');

  if (length < legacy) {
    return err(new AddressDecodeError('Truncated', `Expected at least ${legacy} bytes, got ${length}`));
  }
  if (legacyCompat || length === legacy) {
    return ok('legacy');
  }
  if (length === current) {
    return ok('current');
  }
  if (length < current) {
    return err(new AddressDecodeError('Truncated', `Expected ${legacy} or ${current} bytes, got ${length}`));
  }
  return err(new AddressDecodeError('TrailingData', `${length - current} unexpected trailing bytes`));
}

// ─────────────────────────────────────────────────────────────────────────────────
// ENCODE
// ─────────────────────────────────────────────────────────────────────────────────

function isUint32(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 0xffff_ffff;
}

function isInt32(value: number): boolean {
  return Number.isInteger(value) && value >= -0x8000_0000 && value <= 0x7fff_ffff;
}

/**
 * Serialize a descriptor. The legacy layout drops the lifetimes.
 *
 * Flags must fit uint32 and scope int32; anything else would be truncated
 * on the wire, so it is refused.
 */
export function tryEncodeAddressDescriptor(
  descriptor: AddressDescriptor,
  layout: WireLayout = 'current'
): Result<Uint8Array, AddressEncodeError> {
  const { storedFlags, scope } = descriptor;
  if (!isUint32(storedFlags)) {
    return rejectEncode(new AddressEncodeError('FlagsOutOfRange', `Flags ${storedFlags} do not fit in uint32`));
  }
  if (!isInt32(scope)) {
    return rejectEncode(new AddressEncodeError('ScopeOutOfRange', `Scope ${scope} does not fit in int32`));
  }
  return ok(writeDescriptor(descriptor, layout));
}

function rejectEncode(error: AddressEncodeError): Result<Uint8Array, AddressEncodeError> {
  loggers.codec.warn('Failed to encode address descriptor', { reason: error.reason });
  return err(error);
}

/**
 * Throwing form of tryEncodeAddressDescriptor.
 */
export function encodeAddressDescriptor(
  descriptor: AddressDescriptor,
  layout: WireLayout = 'current'
): Uint8Array {
  return unwrap(tryEncodeAddressDescriptor(descriptor, layout));
}

function writeDescriptor(descriptor: AddressDescriptor, layout: WireLayout): Uint8Array {
  const address = descriptor.address.toBytes();
  const out = new Uint8Array(encodedLength(address.length, layout));
  const view = new DataView(out.buffer);

  let offset = 0;
  view.setUint8(offset, address.length);
  offset += 1;
  out.set(address, offset);
  offset += address.length;
  view.setUint8(offset, descriptor.prefixLength);
  offset += 1;
  view.setUint32(offset, descriptor.storedFlags, false);
  offset += 4;
  view.setInt32(offset, descriptor.scope, false);
  offset += 4;

  if (layout === 'current') {
    view.setBigInt64(offset, lifetimeToWire(descriptor.deprecationTime), false);
    offset += 8;
    view.setBigInt64(offset, lifetimeToWire(descriptor.expirationTime), false);
  }

  return out;
}

// ─────────────────────────────────────────────────────────────────────────────────
// DECODE
// ─────────────────────────────────────────────────────────────────────────────────

function decode(bytes: Uint8Array, legacyCompat: boolean): Result<DecodedAddress, AddressDecodeError> {
  if (bytes.length < 1) {
    return err(new AddressDecodeError('Truncated', 'Empty record'));
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const addressLength = view.getUint8(0);
  if (addressLength !== IPV4_LENGTH && addressLength !== IPV6_LENGTH) {
    return err(new AddressDecodeError('BadAddressLength', `Address length ${addressLength} is neither 4 nor 16`));
  }

  const layout = resolveLayout(bytes.length, addressLength, legacyCompat);
  if (!layout.ok) {
    return layout;
  }

  let offset = 1;
  // Never collapse mapped addresses here: the bytes must survive re-encoding.
  const address = IpAddress.fromBytes(bytes.subarray(offset, offset + addressLength), { collapseMappedIpv4: false });
  offset += addressLength;
  const prefixLength = view.getUint8(offset);
  offset += 1;
  const flags = view.getUint32(offset, false);
  offset += 4;
  const scope = view.getInt32(offset, false);
  offset += 4;

  let deprecationTime: Lifetime = LIFETIME_UNKNOWN;
  let expirationTime: Lifetime = LIFETIME_UNKNOWN;
  if (layout.value === 'current') {
    const deprecation = lifetimeFromWire(view.getBigInt64(offset, false), 'deprecationTime');
    if (!deprecation.ok) return deprecation;
    const expiration = lifetimeFromWire(view.getBigInt64(offset + 8, false), 'expirationTime');
    if (!expiration.ok) return expiration;
    deprecationTime = deprecation.value;
    expirationTime = expiration.value;
  }

  const descriptor = mapErr(
    AddressDescriptor.tryCreate({ address, prefixLength, flags, scope, deprecationTime, expirationTime }),
    (cause) => new AddressDecodeError('InvalidDescriptor', `Decoded fields are invalid: ${cause.message}`, { cause })
  );
  if (!descriptor.ok) {
    return descriptor;
  }

  return ok({ descriptor: descriptor.value, layout: layout.value });
}

/**
 * Parse an encoded descriptor.
 *
 * Strict by default: a record must be exactly the legacy or the current
 * length. In legacy-compatibility mode the four legacy fields are read and
 * trailing bytes ignored.
 */
export function decodeAddressDescriptor(
  bytes: Uint8Array,
  options: DecodeOptions = {}
): Result<DecodedAddress, AddressDecodeError> {
  const legacyCompat = options.legacyCompat ?? getConfig().codec.legacyCompat;
  const result = decode(bytes, legacyCompat);
  if (!result.ok) {
    loggers.codec.warn('Failed to decode address descriptor', {
      reason: result.error.reason,
      length: bytes.length,
      legacyCompat,
    });
  }
  return result;
}
