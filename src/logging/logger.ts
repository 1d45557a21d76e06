/**
 * Engine Logging Subsystem
 *
 * Structured, levelled logging for the lifecycle core. Loggers are
 * organised by subsystem (`engine/scheduler`, `engine/lifecycle`, ...) and
 * can carry a resource/task context that every entry inherits.
 */

import { createWriteStream, type WriteStream } from "node:fs";
import type { LogDestination, LoggingConfig } from "../types.js";

// =============================================================================
// Logger Types
// =============================================================================

export type EngineLogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export type EngineLogEntry = {
  timestamp: Date;
  level: EngineLogLevel;
  subsystem: string;
  message: string;
  metadata?: Record<string, unknown>;
  resourceName?: string;
  action?: string;
  taskId?: string;
};

export type LogFormatter = (entry: EngineLogEntry) => string;

export interface LogTransport {
  name: string;
  write(entry: EngineLogEntry): void | Promise<void>;
  flush?(): void | Promise<void>;
  close?(): void | Promise<void>;
}

export interface EngineLogger {
  readonly subsystem: string;

  trace(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  fatal(message: string, meta?: Record<string, unknown>): void;

  child(name: string): EngineLogger;
  withContext(context: LogContext): EngineLogger;
  setLevel(level: EngineLogLevel): void;
  getLevel(): EngineLogLevel;
  isLevelEnabled(level: EngineLogLevel): boolean;
  /** Flush and close every transport; shared by the logger's children */
  close(): Promise<void>;
}

export type LogContext = {
  resourceName?: string;
  action?: string;
  taskId?: string;
};

// =============================================================================
// Log Level Utilities
// =============================================================================

const LOG_LEVEL_PRIORITY: Record<EngineLogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
};

export function compareLogLevels(a: EngineLogLevel, b: EngineLogLevel): -1 | 0 | 1 {
  const pa = LOG_LEVEL_PRIORITY[a];
  const pb = LOG_LEVEL_PRIORITY[b];
  if (pa < pb) return -1;
  if (pa > pb) return 1;
  return 0;
}

export function shouldLog(level: EngineLogLevel, minLevel: EngineLogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel];
}

// =============================================================================
// Default Log Formatter
// =============================================================================

const COLORS = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
  magenta: "\x1b[35m",
  blue: "\x1b[34m",
};

const LEVEL_COLORS: Record<EngineLogLevel, string> = {
  trace: COLORS.dim,
  debug: COLORS.cyan,
  info: COLORS.green,
  warn: COLORS.yellow,
  error: COLORS.red,
  fatal: COLORS.magenta,
};

/**
 * Default line formatter:
 * `<iso-time> <LEVEL> [<subsystem>] <message> (resource=… action=… task=…) {meta}`
 */
export function createDefaultFormatter(options?: {
  colors?: boolean;
  timestamps?: boolean;
  includeMetadata?: boolean;
}): LogFormatter {
  const {
    colors = process.stdout.isTTY ?? false,
    timestamps = true,
    includeMetadata = true,
  } = options ?? {};

  const paint = (color: string, text: string) => (colors ? `${color}${text}${COLORS.reset}` : text);

  return (entry: EngineLogEntry): string => {
    const parts: string[] = [];

    if (timestamps) {
      parts.push(paint(COLORS.dim, entry.timestamp.toISOString()));
    }

    parts.push(paint(LEVEL_COLORS[entry.level], entry.level.toUpperCase().padEnd(5)));
    parts.push(paint(COLORS.blue, `[${entry.subsystem}]`));
    parts.push(entry.message);

    const contextParts: string[] = [];
    if (entry.resourceName) contextParts.push(`resource=${entry.resourceName}`);
    if (entry.action) contextParts.push(`action=${entry.action}`);
    if (entry.taskId) contextParts.push(`task=${entry.taskId}`);
    if (contextParts.length > 0) {
      parts.push(paint(COLORS.dim, `(${contextParts.join(" ")})`));
    }

    if (includeMetadata && entry.metadata && Object.keys(entry.metadata).length > 0) {
      parts.push(paint(COLORS.dim, JSON.stringify(entry.metadata)));
    }

    return parts.join(" ");
  };
}

// =============================================================================
// Transports
// =============================================================================

export class ConsoleTransport implements LogTransport {
  name = "console";
  private formatter: LogFormatter;
  private minLevel: EngineLogLevel;

  constructor(options?: { formatter?: LogFormatter; minLevel?: EngineLogLevel }) {
    this.formatter = options?.formatter ?? createDefaultFormatter();
    this.minLevel = options?.minLevel ?? "info";
  }

  write(entry: EngineLogEntry): void {
    if (!shouldLog(entry.level, this.minLevel)) return;

    const formatted = this.formatter(entry);
    if (entry.level === "error" || entry.level === "fatal") {
      console.error(formatted);
    } else if (entry.level === "warn") {
      console.warn(formatted);
    } else {
      console.log(formatted);
    }
  }
}

/**
 * Buffered append-only file transport
 */
export class FileTransport implements LogTransport {
  name = "file";
  private formatter: LogFormatter;
  private minLevel: EngineLogLevel;
  private buffer: string[] = [];
  private bufferSize: number;
  private filePath: string;
  private stream: WriteStream | null = null;

  constructor(options: {
    filePath: string;
    formatter?: LogFormatter;
    minLevel?: EngineLogLevel;
    bufferSize?: number;
  }) {
    this.filePath = options.filePath;
    this.formatter =
      options.formatter ?? createDefaultFormatter({ colors: false, timestamps: true });
    this.minLevel = options.minLevel ?? "info";
    this.bufferSize = options.bufferSize ?? 100;
  }

  write(entry: EngineLogEntry): void {
    if (!shouldLog(entry.level, this.minLevel)) return;

    this.buffer.push(this.formatter(entry));
    if (this.buffer.length >= this.bufferSize) {
      this.flush();
    }
  }

  flush(): void {
    if (this.buffer.length === 0) return;
    if (!this.stream) {
      this.stream = createWriteStream(this.filePath, { flags: "a" });
      this.stream.on("error", (error) => {
        console.error(`Log file ${this.filePath} is not writable: ${error.message}`);
      });
    }

    const content = this.buffer.join("\n") + "\n";
    this.buffer = [];
    this.stream.write(content);
  }

  close(): Promise<void> {
    this.flush();
    const stream = this.stream;
    this.stream = null;
    if (!stream || stream.destroyed) return Promise.resolve();
    return new Promise((resolve) => {
      stream.once("close", () => resolve());
      stream.end();
    });
  }
}

/**
 * Keeps entries in memory; used by tests and by callers that surface
 * engine logs elsewhere.
 */
export class MemoryTransport implements LogTransport {
  name = "memory";
  readonly entries: EngineLogEntry[] = [];

  write(entry: EngineLogEntry): void {
    this.entries.push(entry);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

// =============================================================================
// Engine Logger Implementation
// =============================================================================

export class EngineLoggerImpl implements EngineLogger {
  readonly subsystem: string;
  private level: EngineLogLevel;
  private transports: LogTransport[];
  private context: LogContext;
  private redactPatterns: RegExp[];

  constructor(options: {
    subsystem: string;
    level?: EngineLogLevel;
    transports?: LogTransport[];
    context?: LogContext;
    redactPatterns?: string[];
  }) {
    this.subsystem = options.subsystem;
    this.level = options.level ?? "info";
    this.transports = options.transports ?? [new ConsoleTransport()];
    this.context = options.context ?? {};
    this.redactPatterns = (options.redactPatterns ?? []).map((p) => new RegExp(p, "gi"));
  }

  trace(message: string, meta?: Record<string, unknown>): void {
    this.log("trace", message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log("error", message, meta);
  }

  fatal(message: string, meta?: Record<string, unknown>): void {
    this.log("fatal", message, meta);
  }

  child(name: string): EngineLogger {
    return new EngineLoggerImpl({
      subsystem: `${this.subsystem}/${name}`,
      level: this.level,
      transports: this.transports,
      context: this.context,
      redactPatterns: this.redactPatterns.map((r) => r.source),
    });
  }

  withContext(context: LogContext): EngineLogger {
    return new EngineLoggerImpl({
      subsystem: this.subsystem,
      level: this.level,
      transports: this.transports,
      context: { ...this.context, ...context },
      redactPatterns: this.redactPatterns.map((r) => r.source),
    });
  }

  setLevel(level: EngineLogLevel): void {
    this.level = level;
  }

  getLevel(): EngineLogLevel {
    return this.level;
  }

  isLevelEnabled(level: EngineLogLevel): boolean {
    return shouldLog(level, this.level);
  }

  async close(): Promise<void> {
    for (const transport of this.transports) {
      try {
        await transport.flush?.();
        await transport.close?.();
      } catch (error) {
        console.error(`Log transport ${transport.name} failed to close: ${String(error)}`);
      }
    }
  }

  private log(level: EngineLogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!shouldLog(level, this.level)) return;

    const entry: EngineLogEntry = {
      timestamp: new Date(),
      level,
      subsystem: this.subsystem,
      message: this.redact(message),
      metadata: meta ? this.redactObject(meta) : undefined,
      resourceName: this.context.resourceName,
      action: this.context.action,
      taskId: this.context.taskId,
    };

    for (const transport of this.transports) {
      try {
        void transport.write(entry);
      } catch (error) {
        // Transport failures never reach the caller.
        console.error(`Log transport ${transport.name} failed: ${String(error)}`);
      }
    }
  }

  private redact(value: string): string {
    let result = value;
    for (const pattern of this.redactPatterns) {
      result = result.replace(pattern, "[REDACTED]");
    }
    return result;
  }

  private redactObject(obj: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (typeof value === "string") {
        result[key] = this.redact(value);
      } else if (isPlainRecord(value)) {
        result[key] = this.redactObject(value);
      } else {
        result[key] = value;
      }
    }
    return result;
  }
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// =============================================================================
// Logger Factory
// =============================================================================

/**
 * Create an engine logger from configuration
 */
export function createEngineLogger(
  subsystem: string,
  config?: Partial<LoggingConfig>,
  extraTransports: LogTransport[] = [],
): EngineLogger {
  const transports: LogTransport[] = [];

  for (const dest of config?.destinations ?? []) {
    transports.push(createTransportFromConfig(dest, config));
  }
  transports.push(...extraTransports);

  if (transports.length === 0) {
    transports.push(new ConsoleTransport({ minLevel: config?.level ?? "info" }));
  }

  return new EngineLoggerImpl({
    subsystem: `engine/${subsystem}`,
    level: config?.level ?? "info",
    transports,
    redactPatterns: config?.redactPatterns,
  });
}

function createTransportFromConfig(
  dest: LogDestination,
  config?: Partial<LoggingConfig>,
): LogTransport {
  const formatter = createDefaultFormatter({
    colors: dest.type === "console" ? undefined : false,
    timestamps: config?.includeTimestamps ?? true,
    includeMetadata: config?.includeMetadata ?? true,
  });
  const minLevel = dest.filter?.minLevel ?? config?.level ?? "info";

  switch (dest.type) {
    case "console":
      return new ConsoleTransport({ formatter, minLevel });
    case "file": {
      const path = dest.config.path;
      return new FileTransport({
        filePath: typeof path === "string" ? path : "engine.log",
        formatter,
        minLevel,
      });
    }
  }
}
