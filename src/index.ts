// ═══════════════════════════════════════════════════════════════════════════════
// IFADDR — Interface Address Model
// ═══════════════════════════════════════════════════════════════════════════════

export * from './net/ip/index.js';
export * from './net/address/index.js';
export * from './net/platform/index.js';

export {
  loadConfig,
  getConfig,
  resetConfig,
  ConfigValidationError,
  type LibraryConfig,
  type LibraryConfigInput,
} from './config/index.js';

export {
  getLogger,
  setLogSink,
  type ILogger,
  type LogLevel,
  type LogSink,
} from './observability/index.js';

export {
  ok,
  err,
  unwrap,
  mapErr,
  type Result,
  type Ok,
  type Err,
} from './types/result.js';
