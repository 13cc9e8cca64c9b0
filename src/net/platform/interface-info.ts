// ═══════════════════════════════════════════════════════════════════════════════
// PLATFORM ADAPTER — Descriptors from os.networkInterfaces()
// ifaddr Platform
// ═══════════════════════════════════════════════════════════════════════════════
//
// Converts the host's interface address records into AddressDescriptors.
// The platform reports address and netmask only, so flags and lifetimes
// start empty and scope is classified from the address unless supplied.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { networkInterfaces } from 'node:os';
import { z } from 'zod';
import { loggers } from '../../observability/index.js';
import { err, unwrap, type Result } from '../../types/result.js';
import { IpAddress } from '../ip/ip-address.js';
import { AddressDescriptor, type DescriptorParseOptions } from '../address/descriptor.js';
import { InvalidAddressDescriptorError } from '../address/errors.js';
import { describeScope } from '../address/scope.js';
import type { AddressStateOptions } from '../address/types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// SCHEMA
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * One record of `os.NetworkInterfaceInfo`. `family` is a string on current
 * Node releases and was briefly numeric on Node 18.0.
 */
export interface InterfaceInfo {
  readonly address: string;
  readonly netmask?: string;
  readonly family?: string | number;
  readonly mac?: string;
  readonly internal?: boolean;
  readonly cidr?: string | null;
  readonly scopeid?: number;
}

/**
 * The fields conversion reads. Only `address` is required; a malformed
 * `netmask` or `cidr` is dropped, which leaves the prefix unknown.
 */
export const InterfaceInfoSchema = z.object({
  address: z.string(),
  netmask: z.string().optional().catch(undefined),
  cidr: z.string().nullable().optional().catch(undefined),
});

/**
 * Source of interface records, keyed by interface name.
 */
export type InterfaceSource = () => Record<string, readonly InterfaceInfo[] | undefined>;

// ─────────────────────────────────────────────────────────────────────────────────
// PREFIX LENGTH
// ─────────────────────────────────────────────────────────────────────────────────

const CIDR_PREFIX = /\/(\d+)$/;

/**
 * Prefix length of a contiguous netmask, or null when the mask is not a
 * numeric address or its one-bits are not contiguous.
 */
export function prefixLengthFromNetmask(netmask: string): number | null {
  const mask = IpAddress.parse(netmask, { collapseMappedIpv4: false });
  if (!mask) return null;

  let length = 0;
  let seenZero = false;
  for (let i = 0; i < mask.byteLength; i++) {
    const byte = mask.byte(i);
    for (let bit = 7; bit >= 0; bit--) {
      if ((byte >> bit) & 1) {
        if (seenZero) return null;
        length++;
      } else {
        seenZero = true;
      }
    }
  }
  return length;
}

/**
 * Prefix from `cidr` when present, otherwise from the netmask.
 * Unknown prefixes come back as -1 so that validation reports them.
 */
function resolvePrefixLength(info: z.output<typeof InterfaceInfoSchema>): number {
  const fromCidr = info.cidr ? CIDR_PREFIX.exec(info.cidr)?.[1] : undefined;
  if (fromCidr !== undefined) {
    return parseInt(fromCidr, 10);
  }
  if (info.netmask) {
    return prefixLengthFromNetmask(info.netmask) ?? -1;
  }
  return -1;
}

// ─────────────────────────────────────────────────────────────────────────────────
// CONVERSION
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Build a descriptor from one platform interface record.
 */
export function tryDescriptorFromInterfaceInfo(
  info: InterfaceInfo | null | undefined,
  state: AddressStateOptions = {},
  options: DescriptorParseOptions = {}
): Result<AddressDescriptor, InvalidAddressDescriptorError> {
  const parsed = InterfaceInfoSchema.safeParse(info);
  if (!parsed.success) {
    return err(new InvalidAddressDescriptorError('NullAddress', 'Interface record has no address'));
  }

  return AddressDescriptor.tryCreate(
    {
      address: parsed.data.address,
      prefixLength: resolvePrefixLength(parsed.data),
      ...state,
    },
    options
  );
}

/**
 * Throwing form of tryDescriptorFromInterfaceInfo.
 */
export function descriptorFromInterfaceInfo(
  info: InterfaceInfo | null | undefined,
  state: AddressStateOptions = {},
  options: DescriptorParseOptions = {}
): AddressDescriptor {
  return unwrap(tryDescriptorFromInterfaceInfo(info, state, options));
}

/**
 * Descriptors for every interface the source reports. Records that fail
 * validation are logged and left out; interfaces with none left still
 * appear, with an empty list.
 */
export function snapshotInterfaces(
  source: InterfaceSource = networkInterfaces,
  options: DescriptorParseOptions = {}
): Map<string, AddressDescriptor[]> {
  const logger = loggers.platform;
  const snapshot = new Map<string, AddressDescriptor[]>();

  for (const [name, infos] of Object.entries(source())) {
    const descriptors: AddressDescriptor[] = [];

    for (const info of infos ?? []) {
      const result = tryDescriptorFromInterfaceInfo(info, {}, options);
      if (!result.ok) {
        logger.warn('Skipping interface address', {
          interface: name,
          address: info.address,
          reason: result.error.reason,
        });
        continue;
      }
      logger.trace('Interface address', {
        interface: name,
        address: result.value.toString(),
        scope: describeScope(result.value.scope),
      });
      descriptors.push(result.value);
    }

    snapshot.set(name, descriptors);
  }

  logger.debug('Interface snapshot', { interfaces: snapshot.size });
  return snapshot;
}
