// ═══════════════════════════════════════════════════════════════════════════════
// ADDRESS DESCRIPTOR — Immutable Interface Address Value
// ifaddr Address Model
// ═══════════════════════════════════════════════════════════════════════════════
//
// One address assigned to a network interface: address, prefix length,
// flags, routing scope and optional deprecation/expiration lifetimes.
//
// Every entry point (create, of, parse, platform interface info, wire decode)
// goes through AddressDescriptor.tryCreate, the only place validation rules
// live.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { getConfig } from '../../config/index.js';
import { loggers } from '../../observability/index.js';
import { err, ok, unwrap, type Result } from '../../types/result.js';
import { IpAddress, type IpParseOptions } from '../ip/ip-address.js';
import { monotonicClock, type Clock } from './clock.js';
import { InvalidAddressDescriptorError } from './errors.js';
import { effectiveFlags, isPermanentLifetime, isUnknownLifetime, validateLifetimes } from './lifecycle.js';
import { isGlobalPreferred } from './preference.js';
import { scopeForUnicastAddress } from './scope.js';
import {
  LIFETIME_UNKNOWN,
  type AddressDescriptorInit,
  type AddressDescriptorJSON,
  type AddressLifetimeOptions,
  type AddressStateOptions,
  type Lifetime,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// OPTIONS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Parsing behaviour. Unset fields fall back to the `address` config section.
 */
export type DescriptorParseOptions = IpParseOptions;

function resolveParseOptions(options: DescriptorParseOptions): Required<IpParseOptions> {
  return {
    collapseMappedIpv4: options.collapseMappedIpv4 ?? getConfig().address.collapseMappedIpv4,
  };
}

const PREFIX_DIGITS = /^\d+$/;

function maxPrefixLength(address: IpAddress): number {
  return address.isIpv4() ? 32 : 128;
}

/** Number equality under which NaN matches NaN, so equals() stays reflexive */
function sameNumber(a: number, b: number): boolean {
  return a === b || (Number.isNaN(a) && Number.isNaN(b));
}

function lifetimeToJSON(time: Lifetime): number | 'permanent' | null {
  if (isUnknownLifetime(time)) return null;
  if (isPermanentLifetime(time)) return 'permanent';
  return time;
}

// ─────────────────────────────────────────────────────────────────────────────────
// ADDRESS DESCRIPTOR
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Immutable description of one interface address.
 *
 * @example
 * ```typescript
 * const addr = AddressDescriptor.parse('fe80::1/64');
 * addr.scope;              // Scope.LINK
 * addr.isGlobalPreferred(); // false
 * ```
 */
export class AddressDescriptor {
  readonly address: IpAddress;
  readonly prefixLength: number;

  /**
   * Flags exactly as supplied, never folded into 32 bits; see getFlags() for
   * the lifetime-adjusted view. Values outside uint32 cannot be encoded.
   */
  readonly storedFlags: number;

  readonly scope: number;
  readonly deprecationTime: Lifetime;
  readonly expirationTime: Lifetime;

  private constructor(
    address: IpAddress,
    prefixLength: number,
    storedFlags: number,
    scope: number,
    deprecationTime: Lifetime,
    expirationTime: Lifetime
  ) {
    this.address = address;
    this.prefixLength = prefixLength;
    this.storedFlags = storedFlags;
    this.scope = scope;
    this.deprecationTime = deprecationTime;
    this.expirationTime = expirationTime;
    Object.freeze(this);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // VALIDATION
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Validate raw parts and build a descriptor.
   *
   * Rules, first failure wins: address present and parseable; prefix length
   * within the family range; not multicast; lifetimes consistent.
   */
  static tryCreate(
    init: AddressDescriptorInit,
    options: DescriptorParseOptions = {}
  ): Result<AddressDescriptor, InvalidAddressDescriptorError> {
    const result = AddressDescriptor.validate(init, options);
    if (!result.ok) {
      loggers.address.debug('Rejected address descriptor', {
        reason: result.error.reason,
        address: init.address === null || init.address === undefined ? null : String(init.address),
        prefixLength: init.prefixLength,
      });
    }
    return result;
  }

  private static validate(
    init: AddressDescriptorInit,
    options: DescriptorParseOptions
  ): Result<AddressDescriptor, InvalidAddressDescriptorError> {
    const address = typeof init.address === 'string'
      ? IpAddress.parse(init.address, resolveParseOptions(options))
      : init.address ?? null;
    if (!address) {
      return err(new InvalidAddressDescriptorError(
        'NullAddress',
        init.address ? `Not a numeric IP address: ${String(init.address)}` : 'Address must not be null'
      ));
    }

    const maxPrefix = maxPrefixLength(address);
    const { prefixLength } = init;
    if (!Number.isInteger(prefixLength) || prefixLength < 0 || prefixLength > maxPrefix) {
      return err(new InvalidAddressDescriptorError(
        'PrefixOutOfRange',
        `Prefix length ${prefixLength} out of range 0..${maxPrefix} for ${address.toString()}`
      ));
    }

    if (address.isMulticast()) {
      return err(new InvalidAddressDescriptorError(
        'MulticastAddress',
        `Multicast address ${address.toString()} cannot be an interface address`
      ));
    }

    const deprecationTime = init.deprecationTime ?? LIFETIME_UNKNOWN;
    const expirationTime = init.expirationTime ?? LIFETIME_UNKNOWN;
    const lifetimeError = validateLifetimes(deprecationTime, expirationTime);
    if (lifetimeError) {
      return err(lifetimeError);
    }

    return ok(new AddressDescriptor(
      address,
      prefixLength,
      init.flags ?? 0,
      init.scope ?? scopeForUnicastAddress(address),
      deprecationTime,
      expirationTime
    ));
  }

  // ───────────────────────────────────────────────────────────────────────────
  // FACTORIES
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Throwing form of tryCreate.
   */
  static create(init: AddressDescriptorInit, options: DescriptorParseOptions = {}): AddressDescriptor {
    return unwrap(AddressDescriptor.tryCreate(init, options));
  }

  /**
   * Address plus prefix, optionally with flags, scope and lifetimes.
   */
  static of(
    address: IpAddress | string | null | undefined,
    prefixLength: number,
    state: AddressLifetimeOptions = {}
  ): AddressDescriptor {
    return AddressDescriptor.create({ address, prefixLength, ...state });
  }

  /**
   * Parse `"<address>/<prefixLength>"`, e.g. `"192.0.2.1/24"`.
   */
  static tryParse(
    text: string | null | undefined,
    state: AddressStateOptions = {},
    options: DescriptorParseOptions = {}
  ): Result<AddressDescriptor, InvalidAddressDescriptorError> {
    const trimmed = text?.trim() ?? '';
    const slash = trimmed.indexOf('/');
    const addressText = slash === -1 ? trimmed : trimmed.slice(0, slash);
    const prefixText = slash === -1 ? '' : trimmed.slice(slash + 1);

    // A missing or non-decimal prefix only matters once the address is known
    // to be valid, so that a bad address reports NullAddress first.
    const prefixLength = PREFIX_DIGITS.test(prefixText) ? parseInt(prefixText, 10) : -1;

    return AddressDescriptor.tryCreate(
      { address: addressText === '' ? null : addressText, prefixLength, ...state },
      options
    );
  }

  /**
   * Throwing form of tryParse.
   */
  static parse(
    text: string | null | undefined,
    state: AddressStateOptions = {},
    options: DescriptorParseOptions = {}
  ): AddressDescriptor {
    return unwrap(AddressDescriptor.tryParse(text, state, options));
  }

  // ───────────────────────────────────────────────────────────────────────────
  // ACCESSORS
  // ───────────────────────────────────────────────────────────────────────────

  isIpv4(): boolean {
    return this.address.isIpv4();
  }

  isIpv6(): boolean {
    return this.address.isIpv6();
  }

  /** IPv6 Unique Local Address (`fc00::/7`) */
  isIpv6Ula(): boolean {
    return this.address.isUniqueLocal();
  }

  /**
   * Flags with DEPRECATED and PERMANENT reconciled against the lifetimes at
   * the clock's current reading.
   */
  getFlags(clock: Clock = monotonicClock): number {
    return effectiveFlags(this.storedFlags, this.deprecationTime, this.expirationTime, clock.now());
  }

  /**
   * Whether address selection may use this as a default global source address.
   */
  isGlobalPreferred(clock: Clock = monotonicClock): boolean {
    return isGlobalPreferred(this, clock);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // EQUIVALENCE
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Same address, prefix length, stored flags and scope. Lifetimes are
   * ignored: a refreshed lease is the same administrative address.
   */
  equals(other: AddressDescriptor | null | undefined): boolean {
    if (!other) return false;
    if (other === this) return true;
    return this.isSameAddressAs(other)
      && sameNumber(this.storedFlags, other.storedFlags)
      && sameNumber(this.scope, other.scope);
  }

  /**
   * Same address and prefix length, regardless of flags and scope.
   */
  isSameAddressAs(other: AddressDescriptor | null | undefined): boolean {
    if (!other) return false;
    return this.address.equals(other.address) && this.prefixLength === other.prefixLength;
  }

  /**
   * Hash over the fields equals() compares.
   */
  hashCode(): number {
    let hash = 1;
    for (const field of [this.address.hashCode(), this.prefixLength, this.storedFlags, this.scope]) {
      hash = (Math.imul(31, hash) + field) | 0;
    }
    return hash;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // RENDERING
  // ───────────────────────────────────────────────────────────────────────────

  toString(): string {
    return `${this.address.toString()}/${this.prefixLength}`;
  }

  toJSON(): AddressDescriptorJSON {
    return {
      address: this.address.toString(),
      prefixLength: this.prefixLength,
      flags: this.storedFlags,
      scope: this.scope,
      deprecationTime: lifetimeToJSON(this.deprecationTime),
      expirationTime: lifetimeToJSON(this.expirationTime),
    };
  }
}

/**
 * Non-throwing text parse, for callers handling untrusted input.
 */
export function tryParseAddressDescriptor(
  text: string | null | undefined,
  state: AddressStateOptions = {}
): Result<AddressDescriptor, InvalidAddressDescriptorError> {
  return AddressDescriptor.tryParse(text, state);
}

