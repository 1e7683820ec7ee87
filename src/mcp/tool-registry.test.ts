import { describe, it, expect, vi } from "vitest";
import type { CatalogSlice } from "../catalog/catalog.js";
import type { TopologyConfig } from "../config/schema.js";
import type { RegionDiscoverer } from "../discovery/types.js";
import { ConfigValidationError } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import { createSilentLogger } from "../logging/logger.js";
import { wrapMermaidMarkdown } from "../render/mermaid.js";
import { makeWebDbCatalog } from "../testing/fixtures.js";
import type { ToolDefinition } from "./tool-registry.js";
import { buildToolRegistry } from "./tool-registry.js";

// =============================================================================
// Helpers
// =============================================================================

const discoverer: RegionDiscoverer = {
  async discoverRegion(region: string): Promise<CatalogSlice> {
    const catalog = makeWebDbCatalog();
    return {
      region,
      accountId: catalog.accountId,
      resources: [...catalog.resources],
      ruleSets: [...catalog.ruleSets],
    };
  },
};

function createRegistry() {
  const writeFile = vi.fn(async (_path: string, _content: string) => {});
  const createDiscoverer = vi.fn((_config: TopologyConfig, _logger: Logger) => discoverer);
  const tools = buildToolRegistry({ createDiscoverer, writeFile, logger: createSilentLogger() });
  return { tools, writeFile, createDiscoverer };
}

function getTool(tools: ToolDefinition[], name: string): ToolDefinition {
  const tool = tools.find((t) => t.name === name);
  if (!tool) throw new Error(`tool ${name} is not registered`);
  return tool;
}

async function runTool(tools: ToolDefinition[], name: string, args: Record<string, unknown> = {}) {
  const result = await getTool(tools, name).execute(args);
  return { text: result.content[0].text, details: result.details };
}

// =============================================================================
// Tests
// =============================================================================

describe("buildToolRegistry", () => {
  it("registers the diagram, discovery and validation tools", () => {
    const { tools } = createRegistry();
    expect(tools.map((t) => t.name)).toEqual([
      "generate_aws_diagram",
      "generate_aws_diagram_dot",
      "discover_aws_resources",
      "validate_mermaid_syntax",
    ]);
    for (const tool of tools) {
      expect(tool.parameters).toMatchObject({ type: "object", additionalProperties: false });
    }
  });

  describe("generate_aws_diagram", () => {
    it("returns the Mermaid diagram with statistics", async () => {
      const { tools, writeFile } = createRegistry();

      const { text, details } = await runTool(tools, "generate_aws_diagram");

      expect(text.startsWith("graph TD\n")).toBe(true);
      expect(text.split("\n").at(-2)).toBe('    n0 -.->|"5432"| n1');
      expect(details).toMatchObject({
        outputPath: null,
        regions: [{ region: "us-east-1", ok: true }],
        statistics: {
          network: 1,
          subnet: 2,
          instance: 1,
          database: 1,
          ruleSets: 2,
          connections: 1,
          serviceLinks: 0,
        },
      });
      expect(writeFile).not.toHaveBeenCalled();
    });

    it("writes a Markdown document unless the file ends in .mmd", async () => {
      const { tools, writeFile } = createRegistry();

      const { text } = await runTool(tools, "generate_aws_diagram", { outputPath: "docs/atlas.md" });
      await runTool(tools, "generate_aws_diagram", { outputPath: "docs/atlas.mmd" });

      expect(writeFile.mock.calls).toEqual([
        ["docs/atlas.md", wrapMermaidMarkdown(text)],
        ["docs/atlas.mmd", text],
      ]);
    });

    it("layers regions, account and preset over the defaults", async () => {
      const { tools, createDiscoverer } = createRegistry();

      const { text } = await runTool(tools, "generate_aws_diagram", {
        regions: ["eu-west-1"],
        account: "prod",
        preset: "clean",
      });

      expect(createDiscoverer.mock.calls[0][0]).toMatchObject({
        regions: ["eu-west-1"],
        account: "prod",
        policy: { flows: "none" },
      });
      expect(text).not.toContain("-.->");
    });

    it("diagrams one VPC and rejects an unknown one", async () => {
      const { tools } = createRegistry();

      const { details } = await runTool(tools, "generate_aws_diagram", { vpcId: "vpc-1" });
      expect(details).toMatchObject({ statistics: { network: 1, connections: 1 } });

      await expect(runTool(tools, "generate_aws_diagram", { vpcId: "vpc-9" })).rejects.toThrow(
        "No VPC found with id vpc-9",
      );
    });

    it("rejects arguments that do not match the schema", async () => {
      const { tools } = createRegistry();

      await expect(runTool(tools, "generate_aws_diagram", { regions: "us-east-1" })).rejects.toThrow(
        ConfigValidationError,
      );
      await expect(runTool(tools, "generate_aws_diagram", { regions: "us-east-1" })).rejects.toThrow(
        /^Invalid arguments for generate_aws_diagram: \/regions/,
      );
      await expect(runTool(tools, "generate_aws_diagram", { preset: "loud" })).rejects.toThrow(ConfigValidationError);
      await expect(runTool(tools, "generate_aws_diagram", { vpc: "vpc-1" })).rejects.toThrow(ConfigValidationError);
    });
  });

  describe("generate_aws_diagram_dot", () => {
    it("returns a DOT graph", async () => {
      const { tools } = createRegistry();

      const { text } = await runTool(tools, "generate_aws_diagram_dot");
      expect(text.split("\n")[0]).toBe("digraph Topology {");
    });
  });

  describe("discover_aws_resources", () => {
    it("returns the catalog as JSON", async () => {
      const { tools } = createRegistry();

      const { text, details } = await runTool(tools, "discover_aws_resources");
      const parsed: unknown = JSON.parse(text);

      expect(parsed).toMatchObject({
        accountId: "123456789012",
        regions: ["us-east-1"],
        report: [{ region: "us-east-1", ok: true, resources: 5, ruleSets: 2 }],
      });
      expect(details).toEqual({
        statistics: { database: 1, instance: 1, network: 1, subnet: 2, ruleSets: 2 },
      });
    });

    it("keeps only the requested resource types", async () => {
      const { tools } = createRegistry();

      const { text } = await runTool(tools, "discover_aws_resources", { resourceTypes: ["database"] });
      const parsed: unknown = JSON.parse(text);

      expect(parsed).toMatchObject({ resources: [{ id: "db", kind: "database" }] });
    });
  });

  describe("validate_mermaid_syntax", () => {
    it("reports valid and invalid diagrams", async () => {
      const { tools } = createRegistry();

      const valid = await runTool(tools, "validate_mermaid_syntax", {
        diagram: 'graph TD\n    subgraph c0["vpc"]\n    end\n',
      });
      expect(valid.text).toBe("Diagram syntax appears valid (1 subgraph)");
      expect(valid.details).toEqual({ valid: true, subgraphs: 1 });

      const invalid = await runTool(tools, "validate_mermaid_syntax", { diagram: "graph TD\nend" });
      expect(invalid.text).toBe("Invalid diagram: Unmatched 'end' at line 2");
    });
  });
});
