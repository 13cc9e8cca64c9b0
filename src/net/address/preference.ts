// ═══════════════════════════════════════════════════════════════════════════════
// GLOBAL PREFERENCE — Default Source Address Eligibility
// ifaddr Address Model
// ═══════════════════════════════════════════════════════════════════════════════

import type { Clock } from './clock.js';
import type { AddressDescriptor } from './descriptor.js';
import { AddressFlag, Scope } from './types.js';

/**
 * Flags that rule an address out whatever else is set.
 */
const DISQUALIFYING_FLAGS = AddressFlag.DADFAILED | AddressFlag.DEPRECATED;

/**
 * Whether the address may be handed out as a default global source address.
 *
 * Requires universe scope, not an IPv6 ULA, and effective flags (lifetimes
 * applied at `clock`) with neither DADFAILED nor DEPRECATED, and TENTATIVE
 * only when OPTIMISTIC accompanies it.
 *
 * ULAs classify as universe scope but are privately routed, so they are
 * excluded explicitly.
 */
export function isGlobalPreferred(descriptor: AddressDescriptor, clock: Clock): boolean {
  if (descriptor.scope !== Scope.UNIVERSE || descriptor.isIpv6Ula()) {
    return false;
  }

  const flags = descriptor.getFlags(clock);
  if ((flags & DISQUALIFYING_FLAGS) !== 0) {
    return false;
  }

  const tentative = (flags & AddressFlag.TENTATIVE) !== 0;
  const optimistic = (flags & AddressFlag.OPTIMISTIC) !== 0;
  return !tentative || optimistic;
}
