import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import type { LogEntry, LogTransport } from "./logger.js";
import {
  AtlasLogger,
  compareLogLevels,
  createDefaultFormatter,
  createLogger,
  createSilentLogger,
  FileTransport,
  shouldLog,
  StderrTransport,
} from "./logger.js";

class MemoryTransport implements LogTransport {
  name = "memory";
  entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }
}

function entry(overrides: Partial<LogEntry> = {}): LogEntry {
  return {
    timestamp: new Date("2024-05-01T12:00:00.000Z"),
    level: "info",
    subsystem: "vpc-atlas/cli",
    message: "Discovered region",
    ...overrides,
  };
}

describe("log levels", () => {
  it("orders levels by severity", () => {
    expect(compareLogLevels("debug", "warn")).toBe(-1);
    expect(compareLogLevels("error", "error")).toBe(0);
    expect(shouldLog("warn", "info")).toBe(true);
    expect(shouldLog("debug", "info")).toBe(false);
  });
});

describe("createDefaultFormatter", () => {
  it("formats level, subsystem, context and metadata", () => {
    const format = createDefaultFormatter({ colors: false });
    expect(format(entry({ region: "eu-west-1", stage: "ec2", metadata: { resources: 3 } }))).toBe(
      '2024-05-01T12:00:00.000Z INFO  [vpc-atlas/cli] Discovered region (region=eu-west-1 stage=ec2) {"resources":3}',
    );
  });

  it("can omit timestamps and metadata", () => {
    const format = createDefaultFormatter({ colors: false, timestamps: false, includeMetadata: false });
    expect(format(entry({ level: "warn", metadata: { a: 1 } }))).toBe("WARN  [vpc-atlas/cli] Discovered region");
  });
});

describe("AtlasLogger", () => {
  it("drops entries below its level", () => {
    const transport = new MemoryTransport();
    const logger = new AtlasLogger({ subsystem: "test", level: "warn", transports: [transport] });

    logger.info("hidden");
    logger.warn("shown");
    logger.setLevel("debug");
    logger.debug("now shown");

    expect(transport.entries.map((e) => e.message)).toEqual(["shown", "now shown"]);
    expect(logger.isLevelEnabled("trace")).toBe(false);
  });

  it("names child subsystems and carries context", () => {
    const transport = new MemoryTransport();
    const root = new AtlasLogger({ subsystem: "vpc-atlas", level: "trace", transports: [transport] });

    root.child("discovery").withContext({ region: "us-east-1", attempt: 2 }).info("Listing", { page: 1 });

    expect(transport.entries).toHaveLength(1);
    expect(transport.entries[0]).toMatchObject({
      subsystem: "vpc-atlas/discovery",
      region: "us-east-1",
      metadata: { attempt: 2, page: 1 },
    });
  });

  it("redacts configured patterns in messages and metadata", () => {
    const transport = new MemoryTransport();
    const logger = new AtlasLogger({
      subsystem: "test",
      transports: [transport],
      redactPatterns: ["test-secret"],
    });

    logger.info("token TEST-SECRET used", { nested: { token: "test-secret" }, count: 1 });

    expect(transport.entries[0].message).toBe("token [REDACTED] used");
    expect(transport.entries[0].metadata).toEqual({ nested: { token: "[REDACTED]" }, count: 1 });
  });

  it("keeps logging when a transport throws", () => {
    const transport = new MemoryTransport();
    const broken: LogTransport = {
      name: "broken",
      write: () => {
        throw new Error("disk full");
      },
    };
    const written: unknown[] = [];
    const stderr = vi.spyOn(process.stderr, "write").mockImplementation((chunk) => {
      written.push(chunk);
      return true;
    });
    try {
      new AtlasLogger({ subsystem: "test", transports: [broken, transport] }).error("boom");
    } finally {
      stderr.mockRestore();
    }

    expect(transport.entries.map((e) => e.message)).toEqual(["boom"]);
    expect(written).toEqual(['log transport "broken" failed: Error: disk full\n']);
  });

  it("only enables fatal entries when silent", () => {
    const logger = createSilentLogger();
    expect(logger.isLevelEnabled("error")).toBe(false);
    expect(logger.isLevelEnabled("fatal")).toBe(true);
  });
});

describe("StderrTransport", () => {
  it("writes one line per entry at or above its level", () => {
    const lines: string[] = [];
    const transport = new StderrTransport({
      minLevel: "info",
      formatter: (e) => `${e.level}:${e.message}`,
      sink: { write: (chunk: string) => lines.push(chunk) },
    });

    transport.write(entry({ level: "debug" }));
    transport.write(entry({ level: "error", message: "failed" }));

    expect(lines).toEqual(["error:failed\n"]);
  });
});

describe("FileTransport", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "vpc-atlas-log-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("appends buffered lines on close", async () => {
    const filePath = join(dir, "atlas.log");
    const transport = new FileTransport({ filePath, formatter: (e) => e.message });

    transport.write(entry({ message: "first" }));
    transport.write(entry({ message: "second" }));
    await transport.close();

    expect(await readFile(filePath, "utf8")).toBe("first\nsecond\n");
  });

  it("rejects on close when the log file cannot be opened", async () => {
    const written: unknown[] = [];
    const stderr = vi.spyOn(process.stderr, "write").mockImplementation((chunk) => {
      written.push(chunk);
      return true;
    });
    try {
      const logger = createLogger("cli", { level: "warn", file: join(dir, "missing", "atlas.log") });
      for (let i = 0; i < 100; i++) logger.warn(`entry ${i}`);
      await new Promise((resolve) => setTimeout(resolve, 20));
      logger.warn("after the failed open");

      await expect(logger.close()).rejects.toThrow("ENOENT");
    } finally {
      stderr.mockRestore();
    }

    expect(written).toHaveLength(101);
  });
});
