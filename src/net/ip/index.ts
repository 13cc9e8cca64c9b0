// ═══════════════════════════════════════════════════════════════════════════════
// IP MODULE — Exports
// ifaddr Net Layer
// ═══════════════════════════════════════════════════════════════════════════════

export {
  IpAddress,
  IPV4_LENGTH,
  IPV6_LENGTH,
  type IpFamily,
  type IpParseOptions,
} from './ip-address.js';
