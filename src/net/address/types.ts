// ═══════════════════════════════════════════════════════════════════════════════
// ADDRESS TYPES — Flags, Scopes, Lifetime Sentinels
// ifaddr Address Model
// ═══════════════════════════════════════════════════════════════════════════════

import type { IpAddress } from '../ip/ip-address.js';

// ─────────────────────────────────────────────────────────────────────────────────
// FLAGS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Interface address flag bits, numerically identical to the kernel's
 * `IFA_F_*` constants so that values can be passed through unchanged.
 */
export const AddressFlag = {
  TEMPORARY: 0x01,
  NODAD: 0x02,
  OPTIMISTIC: 0x04,
  DADFAILED: 0x08,
  HOMEADDRESS: 0x10,
  DEPRECATED: 0x20,
  TENTATIVE: 0x40,
  PERMANENT: 0x80,
  MANAGETEMPADDR: 0x100,
  NOPREFIXROUTE: 0x200,
  MCAUTOJOIN: 0x400,
  STABLE_PRIVACY: 0x800,
} as const;

export type AddressFlagName = keyof typeof AddressFlag;

// ─────────────────────────────────────────────────────────────────────────────────
// SCOPES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Routing scopes (`RT_SCOPE_*`). Narrower scopes have larger values.
 *
 * Descriptors store any integer a caller supplies; these are the values the
 * classifier produces and the policy code understands.
 */
export const Scope = {
  UNIVERSE: 0,
  SITE: 200,
  LINK: 253,
  HOST: 254,
  NOWHERE: 255,
} as const;

export type KnownScope = typeof Scope[keyof typeof Scope];

// ─────────────────────────────────────────────────────────────────────────────────
// LIFETIMES
// ─────────────────────────────────────────────────────────────────────────────────

/** Lifetime not known; legacy, lifetime-unaware construction. */
export const LIFETIME_UNKNOWN = -1;

/** Lifetime never ends. Serialized as the largest signed 64-bit integer. */
export const LIFETIME_PERMANENT = Number.POSITIVE_INFINITY;

/**
 * Milliseconds on the monotonic clock (see `Clock`), or one of the sentinels.
 */
export type Lifetime = number;

// ─────────────────────────────────────────────────────────────────────────────────
// CONSTRUCTION INPUT
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Everything a descriptor is built from. Only `address` and `prefixLength`
 * are required.
 */
export interface AddressDescriptorInit {
  readonly address: IpAddress | string | null | undefined;
  readonly prefixLength: number;
  readonly flags?: number;
  readonly scope?: number;
  readonly deprecationTime?: Lifetime;
  readonly expirationTime?: Lifetime;
}

/**
 * Optional state accepted by the string and platform entry points.
 */
export interface AddressStateOptions {
  readonly flags?: number;
  readonly scope?: number;
}

/**
 * Optional lifetimes accepted alongside flags and scope.
 */
export interface AddressLifetimeOptions extends AddressStateOptions {
  readonly deprecationTime?: Lifetime;
  readonly expirationTime?: Lifetime;
}

/**
 * Plain-object form produced by `AddressDescriptor.toJSON()`.
 */
export interface AddressDescriptorJSON {
  readonly address: string;
  readonly prefixLength: number;
  readonly flags: number;
  readonly scope: number;
  readonly deprecationTime: number | 'permanent' | null;
  readonly expirationTime: number | 'permanent' | null;
}
