import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { PassThrough } from "node:stream";
import { describe, it, expect, vi } from "vitest";
import type { CatalogSlice } from "../catalog/catalog.js";
import type { TopologyConfig } from "../config/schema.js";
import type { RegionDiscoverer } from "../discovery/types.js";
import type { Logger } from "../logging/logger.js";
import { makeWebDbCatalog } from "../testing/fixtures.js";
import { VERSION } from "../version.js";
import type { CliDeps } from "./program.js";
import { collectRegions, runCli, toOverrides } from "./program.js";

const discoverer: RegionDiscoverer = {
  async discoverRegion(region: string): Promise<CatalogSlice> {
    if (region !== "us-east-1") throw new Error("AccessDenied");
    const catalog = makeWebDbCatalog();
    return {
      region,
      accountId: catalog.accountId,
      resources: [...catalog.resources],
      ruleSets: [...catalog.ruleSets],
    };
  },
};

function createHarness() {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const writeOutput = vi.fn(async (_path: string, _content: string) => {});
  const createDiscoverer = vi.fn((_config: TopologyConfig, _logger: Logger) => discoverer);
  const deps: CliDeps = {
    stdout: { write: (chunk: string) => stdout.push(chunk) },
    stderr: { write: (chunk: string) => stderr.push(chunk) },
    writeFile: writeOutput,
    createDiscoverer,
  };
  return { deps, stdout, stderr, writeOutput, createDiscoverer };
}

describe("collectRegions", () => {
  it("splits and accumulates values", () => {
    expect(collectRegions("us-east-1, eu-west-1", ["ap-south-1"])).toEqual(["ap-south-1", "us-east-1", "eu-west-1"]);
    expect(collectRegions(",,")).toEqual([]);
  });
});

describe("toOverrides", () => {
  it("maps verbosity flags to log levels", () => {
    expect(toOverrides({ verbose: true }).logLevel).toBe("debug");
    expect(toOverrides({ quiet: true }).logLevel).toBe("error");
    expect(toOverrides({}).logLevel).toBeUndefined();
  });
});

describe("runCli", () => {
  it("prints a Mermaid diagram", async () => {
    const h = createHarness();

    expect(await runCli(["mermaid"], h.deps)).toBe(0);
    const output = h.stdout.join("");
    expect(output.startsWith("graph TD\n")).toBe(true);
    expect(output.split("\n").at(-2)).toBe('    n0 -.->|"5432"| n1');
    expect(h.stderr).toEqual([]);
  });

  it("prints a DOT graph", async () => {
    const h = createHarness();

    expect(await runCli(["dot"], h.deps)).toBe(0);
    expect(h.stdout.join("").split("\n")[0]).toBe("digraph Topology {");
  });

  it("prints the discovered catalog as JSON", async () => {
    const h = createHarness();

    expect(await runCli(["discover"], h.deps)).toBe(0);
    const parsed: unknown = JSON.parse(h.stdout.join(""));
    expect(parsed).toMatchObject({
      accountId: "123456789012",
      regions: ["us-east-1"],
      report: [{ region: "us-east-1", ok: true, resources: 5, ruleSets: 2 }],
    });
  });

  it("applies global options to the configuration", async () => {
    const h = createHarness();

    await runCli(["--regions", "us-east-1", "--account", "210987654321", "--sg-preset", "clean", "mermaid"], h.deps);

    const config = h.createDiscoverer.mock.calls[0][0];
    expect(config).toMatchObject({ regions: ["us-east-1"], account: "210987654321", policy: { flows: "none" } });
    expect(h.stdout.join("")).not.toContain("-.->");
  });

  it("warns about failed regions and renders the rest", async () => {
    const h = createHarness();

    expect(await runCli(["--regions", "us-east-1,eu-west-1", "dot"], h.deps)).toBe(0);
    expect(h.stderr).toEqual(["warning: region eu-west-1 failed: AccessDenied\n"]);
    expect(h.stdout.join("")).toContain("digraph Topology {");
  });

  it("fails when every region fails", async () => {
    const h = createHarness();

    expect(await runCli(["--regions", "eu-west-1", "mermaid"], h.deps)).toBe(1);
    expect(h.stderr).toEqual(["error: Discovery failed in all 1 region(s)\n", "  - eu-west-1: AccessDenied\n"]);
    expect(h.stdout).toEqual([]);
  });

  it("wraps Mermaid files in Markdown unless they end in .mmd", async () => {
    const h = createHarness();

    await runCli(["mermaid", "-o", "topology.md"], h.deps);
    await runCli(["mermaid", "--output", "topology.mmd"], h.deps);

    const [markdown, raw] = h.writeOutput.mock.calls;
    expect(markdown[0]).toBe("topology.md");
    expect(markdown[1].startsWith("# Network Topology\n\n```mermaid\ngraph TD\n")).toBe(true);
    expect(raw[0]).toBe("topology.mmd");
    expect(raw[1].startsWith("graph TD\n")).toBe(true);
    expect(h.stdout).toEqual([]);
  });

  it("reports invalid policy values", async () => {
    const h = createHarness();

    expect(await runCli(["--sg-flows", "sideways", "mermaid"], h.deps)).toBe(1);
    expect(h.stderr[0]).toMatch(/^error: Invalid policy overrides: flows: /);
    expect(h.createDiscoverer).not.toHaveBeenCalled();
  });

  it("rejects a non-positive concurrency", async () => {
    const h = createHarness();

    expect(await runCli(["--concurrency", "0", "mermaid"], h.deps)).toBe(1);
    expect(h.stderr.join("")).toContain('expected a positive integer, got "0"');
  });

  it("prints the version", async () => {
    const h = createHarness();

    expect(await runCli(["--version"], h.deps)).toBe(0);
    expect(h.stdout).toEqual([`${VERSION}\n`]);
  });

  it("reads a configuration file", async () => {
    const dir = await mkdtemp(join(tmpdir(), "vpc-atlas-cli-"));
    try {
      const path = join(dir, "atlas.yaml");
      await writeFile(path, "regions:\n  - us-east-1\npolicy:\n  detail: protocols\n", "utf8");
      const h = createHarness();

      expect(await runCli(["-c", path, "mermaid"], h.deps)).toBe(0);
      expect(h.stdout.join("").split("\n").at(-2)).toBe('    n0 -.->|"postgres/tcp"| n1');
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("serves the diagram tools over stdio", async () => {
    const h = createHarness();
    const stdin = new PassThrough();
    stdin.end(
      [
        '{"jsonrpc":"2.0","id":1,"method":"tools/list"}',
        '{"jsonrpc":"2.0","id":2,"method":"tools/call","params":{"name":"generate_aws_diagram","arguments":{"preset":"clean"}}}',
      ].join("\n") + "\n",
    );

    expect(await runCli(["--regions", "us-east-1", "mcp"], { ...h.deps, stdin })).toBe(0);

    const [list, call]: unknown[] = h.stdout.map((line) => JSON.parse(line));
    expect(list).toMatchObject({
      id: 1,
      result: {
        tools: [
          { name: "generate_aws_diagram" },
          { name: "generate_aws_diagram_dot" },
          { name: "discover_aws_resources" },
          { name: "validate_mermaid_syntax" },
        ],
      },
    });
    expect(call).toMatchObject({ id: 2, result: { isError: false } });
    expect(h.createDiscoverer.mock.calls[0][0]).toMatchObject({ regions: ["us-east-1"], policy: { flows: "none" } });
  });
});
