// ═══════════════════════════════════════════════════════════════════════════════
// IP ADDRESS — Numeric IPv4 / IPv6 Address Value
// ifaddr Net Layer
// ═══════════════════════════════════════════════════════════════════════════════
//
// Parses and formats numeric addresses only. Host names are never resolved.
//
// Accepted text:
// - IPv4 dotted quad, decimal octets without leading zeros
// - IPv6 with optional `::` compression, an optional trailing dotted quad
//   and an optional `%zone` suffix (dropped)
//
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export type IpFamily = 4 | 6;

export const IPV4_LENGTH = 4;
export const IPV6_LENGTH = 16;

export interface IpParseOptions {
  /**
   * Treat IPv4-mapped IPv6 addresses (`::ffff:0:0/96`) as the embedded IPv4
   * address. Defaults to true.
   */
  readonly collapseMappedIpv4?: boolean;
}

// ─────────────────────────────────────────────────────────────────────────────────
// PARSING HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

const IPV4_OCTET = /^(0|[1-9]\d{0,2})$/;
const IPV6_GROUP = /^[0-9a-fA-F]{1,4}$/;

function parseIpv4Octets(text: string): number[] | null {
  const parts = text.split('.');
  if (parts.length !== 4) return null;

  const octets: number[] = [];
  for (const part of parts) {
    if (!IPV4_OCTET.test(part)) return null;
    const value = parseInt(part, 10);
    if (value > 255) return null;
    octets.push(value);
  }
  return octets;
}

function parseGroups(parts: readonly string[]): number[] | null {
  const groups: number[] = [];
  for (const part of parts) {
    if (!IPV6_GROUP.test(part)) return null;
    groups.push(parseInt(part, 16));
  }
  return groups;
}

/**
 * Parse IPv6 text to 8 groups (16-bit each).
 */
function parseIpv6Groups(text: string): number[] | null {
  let cleaned = text;
  if (cleaned.startsWith('[') && cleaned.endsWith(']')) {
    cleaned = cleaned.slice(1, -1);
  }

  const zoneIndex = cleaned.indexOf('%');
  if (zoneIndex !== -1) {
    cleaned = cleaned.substring(0, zoneIndex);
  }

  const halves = cleaned.split('::');
  if (halves.length > 2) return null;

  const compressed = halves.length === 2;
  const leftText = halves[0] ?? '';
  const rightText = halves[1] ?? '';
  let left = leftText === '' ? [] : leftText.split(':');
  let right = rightText === '' ? [] : rightText.split(':');

  // A trailing dotted quad stands for the last two groups.
  let tail: number[] = [];
  const lastSide = compressed ? right : left;
  const last = lastSide[lastSide.length - 1];
  if (last !== undefined && last.includes('.')) {
    const octets = parseIpv4Octets(last);
    if (!octets) return null;
    const [a = 0, b = 0, c = 0, d = 0] = octets;
    tail = [(a << 8) | b, (c << 8) | d];
    if (lastSide === right) {
      right = right.slice(0, -1);
    } else {
      left = left.slice(0, -1);
    }
  }

  const leftGroups = parseGroups(left);
  const rightGroups = parseGroups(right);
  if (!leftGroups || !rightGroups) return null;

  const explicit = leftGroups.length + rightGroups.length + tail.length;
  if (compressed) {
    const zerosNeeded = 8 - explicit;
    if (zerosNeeded < 1) return null;
    return [...leftGroups, ...new Array<number>(zerosNeeded).fill(0), ...rightGroups, ...tail];
  }

  if (explicit !== 8) return null;
  return [...leftGroups, ...tail];
}

function groupsToBytes(groups: readonly number[]): Uint8Array {
  const bytes = new Uint8Array(IPV6_LENGTH);
  groups.forEach((group, i) => {
    bytes[i * 2] = (group >>> 8) & 0xff;
    bytes[i * 2 + 1] = group & 0xff;
  });
  return bytes;
}

function byteAt(bytes: Uint8Array, index: number): number {
  return bytes[index] ?? 0;
}

function isMappedIpv4Bytes(bytes: Uint8Array): boolean {
  if (bytes.length !== IPV6_LENGTH) return false;
  for (let i = 0; i < 10; i++) {
    if (byteAt(bytes, i) !== 0) return false;
  }
  return byteAt(bytes, 10) === 0xff && byteAt(bytes, 11) === 0xff;
}

// ─────────────────────────────────────────────────────────────────────────────────
// FORMATTING HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Canonical IPv6 text: lowercase, no leading zeros, longest run of two or
 * more zero groups (leftmost on ties) replaced by `::`.
 */
function formatIpv6(bytes: Uint8Array): string {
  const groups: number[] = [];
  for (let i = 0; i < IPV6_LENGTH; i += 2) {
    groups.push((byteAt(bytes, i) << 8) | byteAt(bytes, i + 1));
  }

  if (isMappedIpv4Bytes(bytes)) {
    return `::ffff:${formatIpv4(bytes.subarray(12))}`;
  }

  let bestStart = -1;
  let bestLength = 0;
  for (let i = 0; i < 8;) {
    if (groups[i] !== 0) {
      i++;
      continue;
    }
    let end = i;
    while (end < 8 && groups[end] === 0) end++;
    if (end - i > bestLength) {
      bestStart = i;
      bestLength = end - i;
    }
    i = end;
  }

  const hex = (from: number, to: number): string =>
    groups.slice(from, to).map((g) => g.toString(16)).join(':');

  if (bestLength < 2) {
    return hex(0, 8);
  }
  return `${hex(0, bestStart)}::${hex(bestStart + bestLength, 8)}`;
}

function formatIpv4(bytes: Uint8Array): string {
  return Array.from(bytes.subarray(0, IPV4_LENGTH)).join('.');
}

// ─────────────────────────────────────────────────────────────────────────────────
// IP ADDRESS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Immutable numeric IP address. Equality is byte-wise within a family.
 */
export class IpAddress {
  readonly family: IpFamily;
  private readonly bytes: Uint8Array;

  private constructor(bytes: Uint8Array) {
    this.bytes = bytes;
    this.family = bytes.length === IPV4_LENGTH ? 4 : 6;
    Object.freeze(this);
  }

  /**
   * Parse numeric address text. Returns null for anything that is not a
   * literal IPv4 or IPv6 address.
   */
  static parse(text: string, options: IpParseOptions = {}): IpAddress | null {
    const trimmed = text.trim();
    if (trimmed === '') return null;

    if (!trimmed.includes(':')) {
      const octets = parseIpv4Octets(trimmed);
      return octets ? new IpAddress(Uint8Array.from(octets)) : null;
    }

    const groups = parseIpv6Groups(trimmed);
    return groups ? IpAddress.fromBytes(groupsToBytes(groups), options) : null;
  }

  /**
   * Build from 4 or 16 raw bytes (copied). Returns null for other lengths.
   */
  static fromBytes(bytes: Uint8Array | readonly number[], options: IpParseOptions = {}): IpAddress | null {
    const copy = Uint8Array.from(bytes);
    if (copy.length === IPV4_LENGTH) {
      return new IpAddress(copy);
    }
    if (copy.length !== IPV6_LENGTH) {
      return null;
    }
    if ((options.collapseMappedIpv4 ?? true) && isMappedIpv4Bytes(copy)) {
      return new IpAddress(copy.slice(12));
    }
    return new IpAddress(copy);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // ACCESSORS
  // ───────────────────────────────────────────────────────────────────────────

  isIpv4(): boolean {
    return this.family === 4;
  }

  isIpv6(): boolean {
    return this.family === 6;
  }

  get byteLength(): number {
    return this.bytes.length;
  }

  /**
   * Copy of the network-order bytes.
   */
  toBytes(): Uint8Array {
    return this.bytes.slice();
  }

  byte(index: number): number {
    return byteAt(this.bytes, index);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // CLASSIFICATION
  // ───────────────────────────────────────────────────────────────────────────

  /** `0.0.0.0` or `::` */
  isUnspecified(): boolean {
    return this.bytes.every((b) => b === 0);
  }

  /** `127.0.0.0/8` or `::1` */
  isLoopback(): boolean {
    if (this.isIpv4()) {
      return this.byte(0) === 127;
    }
    for (let i = 0; i < IPV6_LENGTH - 1; i++) {
      if (this.byte(i) !== 0) return false;
    }
    return this.byte(IPV6_LENGTH - 1) === 1;
  }

  /** `169.254.0.0/16` or `fe80::/10` */
  isLinkLocal(): boolean {
    if (this.isIpv4()) {
      return this.byte(0) === 169 && this.byte(1) === 254;
    }
    return this.byte(0) === 0xfe && (this.byte(1) & 0xc0) === 0x80;
  }

  /** Deprecated IPv6 site-local block `fec0::/10`. Never true for IPv4. */
  isSiteLocal(): boolean {
    return this.isIpv6() && this.byte(0) === 0xfe && (this.byte(1) & 0xc0) === 0xc0;
  }

  /** `224.0.0.0/4` or `ff00::/8` */
  isMulticast(): boolean {
    if (this.isIpv4()) {
      return (this.byte(0) & 0xf0) === 0xe0;
    }
    return this.byte(0) === 0xff;
  }

  /** IPv6 Unique Local Address, `fc00::/7` */
  isUniqueLocal(): boolean {
    return this.isIpv6() && (this.byte(0) & 0xfe) === 0xfc;
  }

  /** `::ffff:0:0/96`; only observable when mapped addresses are not collapsed */
  isIpv4Mapped(): boolean {
    return isMappedIpv4Bytes(this.bytes);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // EQUALITY
  // ───────────────────────────────────────────────────────────────────────────

  equals(other: IpAddress | null | undefined): boolean {
    if (!other) return false;
    if (other === this) return true;
    if (other.bytes.length !== this.bytes.length) return false;
    return this.bytes.every((b, i) => b === other.bytes[i]);
  }

  hashCode(): number {
    let hash = 1;
    for (const b of this.bytes) {
      hash = (Math.imul(31, hash) + b) | 0;
    }
    return hash;
  }

  toString(): string {
    return this.isIpv4() ? formatIpv4(this.bytes) : formatIpv6(this.bytes);
  }
}
