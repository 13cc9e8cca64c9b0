// ═══════════════════════════════════════════════════════════════════════════════
// PLATFORM MODULE — Exports
// ifaddr Platform
// ═══════════════════════════════════════════════════════════════════════════════

export {
  InterfaceInfoSchema,
  prefixLengthFromNetmask,
  tryDescriptorFromInterfaceInfo,
  descriptorFromInterfaceInfo,
  snapshotInterfaces,
  type InterfaceInfo,
  type InterfaceSource,
} from './interface-info.js';
