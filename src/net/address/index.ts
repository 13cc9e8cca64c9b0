// ═══════════════════════════════════════════════════════════════════════════════
// ADDRESS MODULE — Exports
// ifaddr Address Model
// ═══════════════════════════════════════════════════════════════════════════════

export {
  AddressFlag,
  Scope,
  LIFETIME_UNKNOWN,
  LIFETIME_PERMANENT,
  type AddressFlagName,
  type KnownScope,
  type Lifetime,
  type AddressDescriptorInit,
  type AddressStateOptions,
  type AddressLifetimeOptions,
  type AddressDescriptorJSON,
} from './types.js';

export {
  InvalidAddressDescriptorError,
  AddressEncodeError,
  AddressDecodeError,
  type InvalidAddressReason,
  type AddressEncodeReason,
  type AddressDecodeReason,
} from './errors.js';

export { monotonicClock, fixedClock, type Clock } from './clock.js';

export { scopeForUnicastAddress, describeScope } from './scope.js';

export {
  isUnknownLifetime,
  isPermanentLifetime,
  isConcreteLifetime,
  validateLifetimes,
  effectiveFlags,
} from './lifecycle.js';

export { isGlobalPreferred } from './preference.js';

export {
  AddressDescriptor,
  tryParseAddressDescriptor,
  type DescriptorParseOptions,
} from './descriptor.js';

export {
  encodeAddressDescriptor,
  tryEncodeAddressDescriptor,
  decodeAddressDescriptor,
  encodedLength,
  LAYOUT_FIELD_COUNT,
  type WireLayout,
  type DecodeOptions,
  type DecodedAddress,
} from './codec.js';
