// ═══════════════════════════════════════════════════════════════════════════════
// SCOPE CLASSIFIER — Routing Scope from Address Bytes
// ifaddr Address Model
// ═══════════════════════════════════════════════════════════════════════════════
//
// Tables are evaluated top to bottom; the first match wins.
//
//   IPv4   0.0.0.0                          → HOST
//          127.0.0.0/8, 169.254.0.0/16      → LINK
//          everything else                  → UNIVERSE
//
//   IPv6   ::                               → HOST
//          ::1, fe80::/10                   → LINK
//          fec0::/10                        → SITE
//          everything else                  → UNIVERSE
//
// IPv6 loopback is LINK, not HOST. Private IPv4 ranges (RFC 1918) stay
// UNIVERSE, as RFC 6724 §3.2 requires.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { IpAddress } from '../ip/ip-address.js';
import { Scope, type KnownScope } from './types.js';

interface ScopeRule {
  readonly name: string;
  readonly check: (address: IpAddress) => boolean;
  readonly scope: KnownScope;
}

const IPV4_SCOPE_RULES: readonly ScopeRule[] = [
  { name: 'Unspecified', check: (a) => a.isUnspecified(), scope: Scope.HOST },
  { name: 'Loopback', check: (a) => a.isLoopback(), scope: Scope.LINK },
  { name: 'Link-Local', check: (a) => a.isLinkLocal(), scope: Scope.LINK },
];

const IPV6_SCOPE_RULES: readonly ScopeRule[] = [
  { name: 'Unspecified', check: (a) => a.isUnspecified(), scope: Scope.HOST },
  { name: 'Loopback', check: (a) => a.isLoopback(), scope: Scope.LINK },
  { name: 'Link-Local', check: (a) => a.isLinkLocal(), scope: Scope.LINK },
  { name: 'Site-Local', check: (a) => a.isSiteLocal(), scope: Scope.SITE },
];

/**
 * Scope of a unicast address when the caller did not supply one.
 */
export function scopeForUnicastAddress(address: IpAddress): KnownScope {
  const rules = address.isIpv4() ? IPV4_SCOPE_RULES : IPV6_SCOPE_RULES;
  for (const rule of rules) {
    if (rule.check(address)) {
      return rule.scope;
    }
  }
  return Scope.UNIVERSE;
}

/**
 * Human-readable scope name, or the number for caller-defined scopes.
 */
export function describeScope(scope: number): string {
  switch (scope) {
    case Scope.UNIVERSE:
      return 'universe';
    case Scope.SITE:
      return 'site';
    case Scope.LINK:
      return 'link';
    case Scope.HOST:
      return 'host';
    case Scope.NOWHERE:
      return 'nowhere';
    default:
      return String(scope);
  }
}
