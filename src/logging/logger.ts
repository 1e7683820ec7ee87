/**
 * VPC Atlas — Logging
 *
 * Structured logging with levels, subsystems, context and redaction.
 * Every transport writes to stderr or a file so diagrams emitted on
 * stdout stay clean.
 */

import { createWriteStream, type WriteStream } from "node:fs";
import type { LoggingConfig } from "../config/schema.js";

// =============================================================================
// Logger Types
// =============================================================================

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export type LogEntry = {
  timestamp: Date;
  level: LogLevel;
  subsystem: string;
  message: string;
  metadata?: Record<string, unknown>;
  region?: string;
  stage?: string;
  duration?: number;
};

export type LogFormatter = (entry: LogEntry) => string;

export interface LogTransport {
  name: string;
  write(entry: LogEntry): void;
  close?(): Promise<void>;
}

/**
 * Context attached to every entry of a contextual logger
 */
export type LogContext = {
  region?: string;
  stage?: string;
  [key: string]: unknown;
};

export interface Logger {
  readonly subsystem: string;

  trace(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  fatal(message: string, meta?: Record<string, unknown>): void;

  child(name: string): Logger;
  withContext(context: LogContext): Logger;
  setLevel(level: LogLevel): void;
  getLevel(): LogLevel;
  isLevelEnabled(level: LogLevel): boolean;
  /** Flush and close every transport. */
  close(): Promise<void>;
}

// =============================================================================
// Log Level Utilities
// =============================================================================

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
};

export function compareLogLevels(a: LogLevel, b: LogLevel): -1 | 0 | 1 {
  const pa = LOG_LEVEL_PRIORITY[a];
  const pb = LOG_LEVEL_PRIORITY[b];
  if (pa < pb) return -1;
  if (pa > pb) return 1;
  return 0;
}

/**
 * Check if a level should be logged given a minimum level
 */
export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
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

const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: COLORS.dim,
  debug: COLORS.cyan,
  info: COLORS.green,
  warn: COLORS.yellow,
  error: COLORS.red,
  fatal: COLORS.magenta,
};

/**
 * Default log formatter with color support
 */
export function createDefaultFormatter(options?: {
  colors?: boolean;
  timestamps?: boolean;
  includeMetadata?: boolean;
}): LogFormatter {
  const {
    colors = process.stderr.isTTY ?? false,
    timestamps = true,
    includeMetadata = true,
  } = options ?? {};

  const paint = (color: string, text: string) => (colors ? `${color}${text}${COLORS.reset}` : text);

  return (entry) => {
    const parts: string[] = [];

    if (timestamps) parts.push(paint(COLORS.dim, entry.timestamp.toISOString()));
    parts.push(paint(LEVEL_COLORS[entry.level], entry.level.toUpperCase().padEnd(5)));
    parts.push(paint(COLORS.blue, `[${entry.subsystem}]`));
    parts.push(entry.message);

    const contextParts: string[] = [];
    if (entry.region) contextParts.push(`region=${entry.region}`);
    if (entry.stage) contextParts.push(`stage=${entry.stage}`);
    if (entry.duration !== undefined) contextParts.push(`duration=${entry.duration}ms`);
    if (contextParts.length > 0) parts.push(paint(COLORS.dim, `(${contextParts.join(" ")})`));

    if (includeMetadata && entry.metadata && Object.keys(entry.metadata).length > 0) {
      parts.push(paint(COLORS.dim, JSON.stringify(entry.metadata)));
    }

    return parts.join(" ");
  };
}

// =============================================================================
// Stream Transport
// =============================================================================

/** Anything with a string write method (process.stderr, test buffers). */
export type LineSink = { write(chunk: string): unknown };

/**
 * Writes formatted entries to stderr (or another sink).
 */
export class StderrTransport implements LogTransport {
  name = "stderr";
  private formatter: LogFormatter;
  private minLevel: LogLevel;
  private sink: LineSink;

  constructor(options?: { formatter?: LogFormatter; minLevel?: LogLevel; sink?: LineSink }) {
    this.formatter = options?.formatter ?? createDefaultFormatter();
    this.minLevel = options?.minLevel ?? "trace";
    this.sink = options?.sink ?? process.stderr;
  }

  write(entry: LogEntry): void {
    if (!shouldLog(entry.level, this.minLevel)) return;
    this.sink.write(`${this.formatter(entry)}\n`);
  }
}

// =============================================================================
// File Transport
// =============================================================================

/**
 * Buffered, append-only file transport
 */
export class FileTransport implements LogTransport {
  name = "file";
  private formatter: LogFormatter;
  private minLevel: LogLevel;
  private buffer: string[] = [];
  private bufferSize: number;
  private filePath: string;
  private writeStream: WriteStream | null = null;
  private failure: Error | null = null;

  constructor(options: {
    filePath: string;
    formatter?: LogFormatter;
    minLevel?: LogLevel;
    bufferSize?: number;
  }) {
    this.filePath = options.filePath;
    this.formatter =
      options.formatter ??
      createDefaultFormatter({ colors: false, timestamps: true, includeMetadata: true });
    this.minLevel = options.minLevel ?? "trace";
    this.bufferSize = options.bufferSize ?? 100;
  }

  write(entry: LogEntry): void {
    if (!shouldLog(entry.level, this.minLevel)) return;

    this.buffer.push(this.formatter(entry));
    if (this.buffer.length >= this.bufferSize) this.flush();
  }

  flush(): void {
    if (this.buffer.length === 0) return;
    if (this.failure) {
      this.buffer = [];
      return;
    }
    const stream = this.writeStream ?? this.open();

    stream.write(this.buffer.join("\n") + "\n");
    this.buffer = [];
  }

  /**
   * Flush and close the file. Rejects with the first stream error, such as
   * a log path that could not be opened.
   */
  async close(): Promise<void> {
    this.flush();
    const stream = this.writeStream;
    this.writeStream = null;
    if (stream && !this.failure) {
      await new Promise<void>((resolve, reject) => {
        stream.once("error", reject);
        stream.once("finish", resolve);
        stream.end();
      });
    }
    if (this.failure) throw this.failure;
  }

  private open(): WriteStream {
    const stream = createWriteStream(this.filePath, { flags: "a" });
    // Open and write errors arrive asynchronously; later entries are dropped.
    stream.on("error", (err) => {
      if (!this.failure) this.failure = err;
    });
    this.writeStream = stream;
    return stream;
  }
}

// =============================================================================
// Logger Implementation
// =============================================================================

export class AtlasLogger implements Logger {
  readonly subsystem: string;
  private level: LogLevel;
  private transports: LogTransport[];
  private context: LogContext;
  private redactPatterns: RegExp[];

  constructor(options: {
    subsystem: string;
    level?: LogLevel;
    transports?: LogTransport[];
    context?: LogContext;
    redactPatterns?: string[];
  }) {
    this.subsystem = options.subsystem;
    this.level = options.level ?? "info";
    this.transports = options.transports ?? [new StderrTransport()];
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

  child(name: string): Logger {
    return new AtlasLogger({
      subsystem: `${this.subsystem}/${name}`,
      level: this.level,
      transports: this.transports,
      context: this.context,
      redactPatterns: this.redactPatterns.map((r) => r.source),
    });
  }

  withContext(context: LogContext): Logger {
    return new AtlasLogger({
      subsystem: this.subsystem,
      level: this.level,
      transports: this.transports,
      context: { ...this.context, ...context },
      redactPatterns: this.redactPatterns.map((r) => r.source),
    });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return shouldLog(level, this.level);
  }

  async close(): Promise<void> {
    await Promise.all(this.transports.map((t) => t.close?.()));
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!shouldLog(level, this.level)) return;

    const { region, stage, ...rest } = this.context;
    const metadata = meta || Object.keys(rest).length > 0 ? this.redactObject({ ...rest, ...meta }) : undefined;

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      subsystem: this.subsystem,
      message: this.redact(message),
      metadata,
      region,
      stage,
    };

    for (const transport of this.transports) {
      try {
        transport.write(entry);
      } catch (err) {
        process.stderr.write(`log transport "${transport.name}" failed: ${String(err)}\n`);
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
 * Create the root logger from configuration. Adds a file transport when
 * a log file is configured.
 */
export function createLogger(subsystem: string, config?: Partial<LoggingConfig>): Logger {
  const level = config?.level ?? "warn";
  const transports: LogTransport[] = [new StderrTransport({ minLevel: level })];
  if (config?.file) {
    transports.push(new FileTransport({ filePath: config.file, minLevel: level }));
  }

  return new AtlasLogger({
    subsystem: `vpc-atlas/${subsystem}`,
    level,
    transports,
    redactPatterns: config?.redactPatterns,
  });
}

/** Logger that drops every entry. */
export function createSilentLogger(subsystem = "silent"): Logger {
  return new AtlasLogger({ subsystem, level: "fatal", transports: [] });
}
