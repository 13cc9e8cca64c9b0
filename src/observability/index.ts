// ═══════════════════════════════════════════════════════════════════════════════
// OBSERVABILITY — Barrel Export
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type LogLevel,
  type LogSink,
  type LoggerOptions,
  type ILogger,
  LOG_LEVELS,
  getLogger,
  resetLogger,
  setLogSink,
  loggers,
} from './logging/logger.js';
