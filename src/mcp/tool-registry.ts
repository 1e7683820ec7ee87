/**
 * VPC Atlas — MCP Tool Registry
 *
 * The diagram tools served over the Model Context Protocol. Every tool
 * runs the same discovery, topology and rendering path as the CLI.
 */

import { extname } from "node:path";
import { Type, type Static, type TLiteral, type TSchema } from "@sinclair/typebox";
import { Errors } from "@sinclair/typebox/errors";
import { Check } from "@sinclair/typebox/value";
import type { Catalog } from "../catalog/catalog.js";
import { restrictCatalog } from "../catalog/catalog.js";
import type { CliOverrides } from "../config/loader.js";
import { resolveConfig } from "../config/loader.js";
import type { ConfigFile, TopologyConfig } from "../config/schema.js";
import { PRESET_NAMES } from "../config/schema.js";
import { buildTopology } from "../core/pipeline.js";
import { catalogToJson, discoverRegions, type DiscoverResult } from "../discovery/runner.js";
import type { RegionDiscoverer } from "../discovery/types.js";
import { ConfigValidationError } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import { renderDot } from "../render/dot.js";
import { renderMermaid, validateMermaid, wrapMermaidMarkdown } from "../render/mermaid.js";
import { RESOURCE_KINDS, type ResourceKind } from "../types.js";

// =============================================================================
// Types
// =============================================================================

export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  details?: unknown;
};

export type ToolDefinition = {
  name: string;
  label: string;
  description: string;
  parameters: TSchema;
  execute: (params: Record<string, unknown>) => Promise<ToolResult>;
};

export type ToolRegistryDeps = {
  createDiscoverer: (config: TopologyConfig, logger: Logger) => RegionDiscoverer;
  writeFile: (path: string, content: string) => Promise<void>;
  logger: Logger;
  /** Configuration file the tool arguments are layered over. */
  configFile?: ConfigFile;
  /** Command-line values the tool arguments are layered over. */
  overrides?: CliOverrides;
};

function stringEnum<T extends string>(values: readonly T[], description: string) {
  return Type.Union(
    values.map((value): TLiteral<T> => Type.Literal(value)),
    { description },
  );
}

/**
 * Validate arguments against the tool's schema before running it.
 */
function defineTool<T extends TSchema>(tool: {
  name: string;
  label: string;
  description: string;
  parameters: T;
  run: (params: Static<T>) => Promise<ToolResult>;
}): ToolDefinition {
  const { run, ...definition } = tool;
  return {
    ...definition,
    async execute(params) {
      if (!Check(tool.parameters, params)) {
        const issues = [...Errors(tool.parameters, params)].map(
          (error) => `${error.path || "(root)"}: ${error.message}`,
        );
        throw new ConfigValidationError(`Invalid arguments for ${tool.name}: ${issues.join("; ")}`, issues);
      }
      return run(params);
    },
  };
}

// =============================================================================
// Parameters
// =============================================================================

const targetParameters = {
  regions: Type.Optional(
    Type.Array(Type.String({ minLength: 1 }), {
      minItems: 1,
      description: "Regions to discover (default: configuration, then us-east-1)",
    }),
  ),
  account: Type.Optional(Type.String({ description: "Account id or alias shown in the diagram" })),
  profile: Type.Optional(Type.String({ description: "AWS credentials profile" })),
};

const DiagramParameters = Type.Object(
  {
    ...targetParameters,
    vpcId: Type.Optional(Type.String({ description: "Only diagram this VPC (default: all VPCs)" })),
    preset: Type.Optional(stringEnum(PRESET_NAMES, "Filter preset: clean, network, security or debug")),
    includeRoute53: Type.Optional(Type.Boolean({ description: "Include Route 53 hosted zones (default: true)" })),
    includeAcm: Type.Optional(Type.Boolean({ description: "Include ACM certificates (default: true)" })),
    outputPath: Type.Optional(Type.String({ minLength: 1, description: "Also write the diagram to this file" })),
  },
  { additionalProperties: false },
);

type DiagramArgs = Static<typeof DiagramParameters>;

const DISCOVERABLE_TYPES: ReadonlyArray<ResourceKind | "all"> = [...RESOURCE_KINDS, "all"];

const DiscoverParameters = Type.Object(
  {
    ...targetParameters,
    resourceTypes: Type.Optional(
      Type.Array(stringEnum(DISCOVERABLE_TYPES, "Resource kind, or all"), {
        minItems: 1,
        description: "Kinds to include in the result (default: all)",
      }),
    ),
  },
  { additionalProperties: false },
);

const ValidateParameters = Type.Object(
  {
    diagram: Type.String({ description: "Mermaid flowchart text, or a Markdown document containing one" }),
  },
  { additionalProperties: false },
);

// =============================================================================
// Registry Builder
// =============================================================================

/**
 * Build the tool registry. Discovery goes through the injected discoverer
 * factory and files through the injected writer.
 */
export function buildToolRegistry(deps: ToolRegistryDeps): ToolDefinition[] {
  const { logger } = deps;

  const configFor = (args: { regions?: string[]; account?: string; profile?: string; preset?: string }) => {
    const base = deps.overrides ?? {};
    return resolveConfig(deps.configFile, {
      ...base,
      regions: args.regions ?? base.regions,
      account: args.account ?? base.account,
      profile: args.profile ?? base.profile,
      preset: args.preset ?? base.preset,
    });
  };

  const discover = (config: TopologyConfig): Promise<DiscoverResult> =>
    discoverRegions(deps.createDiscoverer(config, logger), config.regions, {
      accountId: config.account,
      concurrency: config.concurrency,
      logger: logger.child("discovery"),
    });

  const renderDiagram = async (args: DiagramArgs, format: "mermaid" | "dot"): Promise<ToolResult> => {
    const config = configFor(args);
    const { catalog, report } = await discover(config);

    const excludeKinds: ResourceKind[] = [];
    if (args.includeRoute53 === false) excludeKinds.push("zone");
    if (args.includeAcm === false) excludeKinds.push("certificate");
    const selected = restrictCatalog(catalog, { networkId: args.vpcId, excludeKinds });
    if (args.vpcId && !selected.resources.some((r) => r.kind === "network")) {
      throw new Error(`No VPC found with id ${args.vpcId}`);
    }

    const result = buildTopology(selected, {
      policy: config.policy,
      tierRules: config.tierRules,
      logger: logger.child("pipeline"),
    });
    const diagram =
      format === "mermaid" ? renderMermaid(result.topology, result.view) : renderDot(result.topology, result.view);

    if (args.outputPath) {
      const wrap = format === "mermaid" && extname(args.outputPath).toLowerCase() !== ".mmd";
      await deps.writeFile(args.outputPath, wrap ? wrapMermaidMarkdown(diagram) : diagram);
      logger.info(`Wrote ${args.outputPath}`);
    }

    return {
      content: [{ type: "text", text: diagram }],
      details: {
        outputPath: args.outputPath ?? null,
        regions: report.regions,
        statistics: {
          ...countByKind(selected),
          ruleSets: selected.ruleSets.length,
          connections: result.view.connections.length,
          serviceLinks: result.view.links.length,
        },
      },
    };
  };

  return [
    defineTool({
      name: "generate_aws_diagram",
      label: "Mermaid Network Diagram",
      description:
        "Discover AWS networks and render them as a Mermaid flowchart: regions, VPCs, " +
        "subnet tiers, instances, load balancers with their targets, databases and the " +
        "security group connections between them.",
      parameters: DiagramParameters,
      run: (args) => renderDiagram(args, "mermaid"),
    }),

    defineTool({
      name: "generate_aws_diagram_dot",
      label: "Graphviz Network Diagram",
      description:
        "Discover AWS networks and render them as a Graphviz DOT graph with one cluster " +
        "per region, VPC and subnet tier.",
      parameters: DiagramParameters,
      run: (args) => renderDiagram(args, "dot"),
    }),

    defineTool({
      name: "discover_aws_resources",
      label: "Discover Resources",
      description:
        "Discover AWS network resources and security groups without rendering a diagram. " +
        "Returns the merged catalog and the outcome of every region as JSON.",
      parameters: DiscoverParameters,
      async run(args) {
        const { catalog, report } = await discover(configFor(args));
        const wanted = args.resourceTypes;
        const selected =
          wanted && !wanted.includes("all")
            ? restrictCatalog(catalog, { excludeKinds: RESOURCE_KINDS.filter((k) => !wanted.includes(k)) })
            : catalog;

        return {
          content: [{ type: "text", text: JSON.stringify(catalogToJson(selected, report), null, 2) }],
          details: { statistics: { ...countByKind(selected), ruleSets: selected.ruleSets.length } },
        };
      },
    }),

    defineTool({
      name: "validate_mermaid_syntax",
      label: "Validate Mermaid",
      description:
        "Check that a Mermaid flowchart starts with a graph directive and that its " +
        "subgraph blocks are balanced. Does not render the diagram.",
      parameters: ValidateParameters,
      async run({ diagram }) {
        const result = validateMermaid(diagram);
        const text = result.valid
          ? `Diagram syntax appears valid (${result.subgraphs} subgraph${result.subgraphs === 1 ? "" : "s"})`
          : `Invalid diagram: ${result.error}`;
        return { content: [{ type: "text", text }], details: result };
      },
    }),
  ];
}

function countByKind(catalog: Catalog): Partial<Record<ResourceKind, number>> {
  const counts: Partial<Record<ResourceKind, number>> = {};
  for (const resource of catalog.resources) {
    counts[resource.kind] = (counts[resource.kind] ?? 0) + 1;
  }
  return counts;
}
