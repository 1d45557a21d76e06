/**
 * Engine Logging Module Index
 */

export {
  type EngineLogLevel,
  type EngineLogEntry,
  type LogFormatter,
  type LogTransport,
  type EngineLogger,
  type LogContext,
  compareLogLevels,
  shouldLog,
  createDefaultFormatter,
  ConsoleTransport,
  FileTransport,
  MemoryTransport,
  EngineLoggerImpl,
  createEngineLogger,
} from "./logger.js";
