/**
 * VPC Atlas — Command-Line Interface
 *
 * `vpc-atlas [options] <discover|mermaid|dot>`: discovers the requested
 * regions, builds the topology and writes JSON, Mermaid or DOT to stdout
 * or a file. Logs go to stderr.
 */

import { writeFile as writeFileAsync } from "node:fs/promises";
import { extname } from "node:path";
import { Command, CommanderError, InvalidArgumentError } from "commander";
import { loadConfigFile, resolveConfig, type CliOverrides } from "../config/loader.js";
import type { ConfigFile, TopologyConfig } from "../config/schema.js";
import { buildTopology } from "../core/pipeline.js";
import { AwsRegionDiscoverer } from "../discovery/aws.js";
import { catalogToJson, discoverRegions } from "../discovery/runner.js";
import type { DiscoveryReport, RegionDiscoverer } from "../discovery/types.js";
import {
  ConfigValidationError,
  DiscoveryFailedError,
  TopologyBuildError,
  formatErrorMessage,
} from "../errors.js";
import type { Logger } from "../logging/logger.js";
import { createLogger } from "../logging/logger.js";
import { McpServer, serveStdio } from "../mcp/server.js";
import { buildToolRegistry } from "../mcp/tool-registry.js";
import { renderDot } from "../render/dot.js";
import { renderMermaid, wrapMermaidMarkdown } from "../render/mermaid.js";
import { VERSION } from "../version.js";

// =============================================================================
// Types
// =============================================================================

export type OutputSink = { write(chunk: string): unknown };

export type CliDeps = {
  /** Request stream of the `mcp` command (default: process.stdin). */
  stdin?: NodeJS.ReadableStream;
  stdout: OutputSink;
  stderr: OutputSink;
  writeFile: (path: string, content: string) => Promise<void>;
  createDiscoverer: (config: TopologyConfig, logger: Logger) => RegionDiscoverer;
};

type GlobalOptions = {
  regions?: string[];
  profile?: string;
  account?: string;
  config?: string;
  concurrency?: number;
  verbose?: boolean;
  quiet?: boolean;
  logFile?: string;
  sgFlows?: string;
  sgDirection?: string;
  sgDetail?: string;
  sgFilterInternal?: boolean;
  sgFilterEphemeral?: boolean;
  sgOnlyIngress?: boolean;
  sgPreset?: string;
  lbDisplay?: string;
  lbDetail?: string;
  lbFilterUnhealthy?: boolean;
};

type OutputFormat = "discover" | "mermaid" | "dot";

const defaultDeps: CliDeps = {
  stdout: process.stdout,
  stderr: process.stderr,
  writeFile: (path, content) => writeFileAsync(path, content, "utf8"),
  createDiscoverer: (config, logger) =>
    new AwsRegionDiscoverer({
      profile: config.profile,
      globalRegion: [...config.regions].sort()[0],
      logger: logger.child("aws"),
    }),
};

// =============================================================================
// Option Parsing
// =============================================================================

/** Collects repeated and comma-separated `--regions` values. */
export function collectRegions(value: string, previous: string[] = []): string[] {
  return [...previous, ...value.split(",").map((v) => v.trim()).filter(Boolean)];
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError(`expected a positive integer, got "${value}"`);
  }
  return parsed;
}

export function toOverrides(opts: GlobalOptions): CliOverrides {
  return {
    regions: opts.regions,
    account: opts.account,
    profile: opts.profile,
    preset: opts.sgPreset,
    concurrency: opts.concurrency,
    logLevel: opts.verbose ? "debug" : opts.quiet ? "error" : undefined,
    logFile: opts.logFile,
    policy: {
      flows: opts.sgFlows,
      direction: opts.sgDirection,
      detail: opts.sgDetail,
      filterInternal: opts.sgFilterInternal,
      filterEphemeral: opts.sgFilterEphemeral,
      onlyIngress: opts.sgOnlyIngress,
      lbDisplay: opts.lbDisplay,
      lbDetail: opts.lbDetail,
      filterUnhealthy: opts.lbFilterUnhealthy,
    },
  };
}

// =============================================================================
// Commands
// =============================================================================

async function execute(
  format: OutputFormat,
  opts: GlobalOptions,
  output: string | undefined,
  deps: CliDeps,
): Promise<void> {
  const file: ConfigFile = opts.config ? await loadConfigFile(opts.config) : {};
  const config = resolveConfig(file, toOverrides(opts));
  const logger = createLogger("cli", config.logging);

  try {
    const discoverer = deps.createDiscoverer(config, logger);
    const { catalog, report } = await discoverRegions(discoverer, config.regions, {
      accountId: config.account,
      concurrency: config.concurrency,
      logger: logger.child("discovery"),
    });
    reportFailures(report, deps.stderr);

    let content: string;
    if (format === "discover") {
      content = JSON.stringify(catalogToJson(catalog, report), null, 2) + "\n";
    } else {
      const result = buildTopology(catalog, {
        policy: config.policy,
        tierRules: config.tierRules,
        logger: logger.child("pipeline"),
      });
      content =
        format === "mermaid"
          ? renderMermaid(result.topology, result.view)
          : renderDot(result.topology, result.view);
      if (format === "mermaid" && output && extname(output).toLowerCase() !== ".mmd") {
        content = wrapMermaidMarkdown(content);
      }
    }

    if (output) {
      await deps.writeFile(output, content);
      logger.info(`Wrote ${output}`);
    } else {
      deps.stdout.write(content);
    }
  } finally {
    await logger.close();
  }
}

async function serveMcp(opts: GlobalOptions, deps: CliDeps): Promise<void> {
  const file: ConfigFile = opts.config ? await loadConfigFile(opts.config) : {};
  const overrides = toOverrides(opts);
  // Validates the command-line values before serving.
  const config = resolveConfig(file, overrides);
  const logger = createLogger("mcp", config.logging);

  try {
    const tools = buildToolRegistry({
      createDiscoverer: deps.createDiscoverer,
      writeFile: deps.writeFile,
      logger,
      configFile: file,
      overrides,
    });
    await serveStdio(new McpServer(tools), { input: deps.stdin, output: deps.stdout, logger });
  } finally {
    await logger.close();
  }
}

function reportFailures(report: DiscoveryReport, stderr: OutputSink): void {
  for (const outcome of report.regions) {
    if (!outcome.ok) stderr.write(`warning: region ${outcome.region} failed: ${outcome.error}\n`);
  }
}


// =============================================================================
// Program
// =============================================================================

export function createProgram(deps: CliDeps = defaultDeps): Command {
  const program = new Command("vpc-atlas")
    .description("Discover cloud networks and render their topology")
    .version(VERSION)
    .option("--regions <regions>", "regions to discover (comma separated, repeatable)", collectRegions)
    .option("--profile <name>", "AWS credentials profile")
    .option("--account <id>", "account id shown in the diagram")
    .option("-c, --config <path>", "configuration file (JSON or YAML)")
    .option("--concurrency <n>", "regions discovered in parallel", parsePositiveInt)
    .option("-v, --verbose", "debug logging")
    .option("-q, --quiet", "errors only")
    .option("--log-file <path>", "also write logs to a file")
    .option("--sg-flows <mode>", "none | inter-subnet | tier-crossing | external-only")
    .option("--sg-direction <mode>", "both | north-south | east-west")
    .option("--sg-detail <level>", "minimal | ports | protocols | full")
    .option("--sg-filter-internal", "hide flows within one subnet")
    .option("--sg-filter-ephemeral", "hide flows on ephemeral ports")
    .option("--sg-only-ingress", "only flows backed by ingress rules")
    .option("--sg-preset <name>", "clean | network | security | debug")
    .option("--lb-display <mode>", "all | connected-only | none")
    .option("--lb-detail <level>", "minimal | ports | full")
    .option("--lb-filter-unhealthy", "hide unhealthy load balancer targets")
    .configureOutput({
      writeOut: (str) => deps.stdout.write(str),
      writeErr: (str) => deps.stderr.write(str),
    })
    .exitOverride();

  const formats: Array<[OutputFormat, string]> = [
    ["discover", "Print the merged catalog and discovery report as JSON"],
    ["mermaid", "Render a Mermaid diagram"],
    ["dot", "Render a Graphviz DOT graph"],
  ];

  for (const [format, description] of formats) {
    program
      .command(format)
      .description(description)
      .option("-o, --output <path>", "write to a file instead of stdout")
      .action(async (cmdOpts: { output?: string }) => {
        await execute(format, program.opts<GlobalOptions>(), cmdOpts.output, deps);
      });
  }

  program
    .command("mcp")
    .description("Serve the diagram tools over the Model Context Protocol on stdio")
    .action(async () => {
      await serveMcp(program.opts<GlobalOptions>(), deps);
    });

  return program;
}

/**
 * Run the CLI and return the process exit code.
 */
export async function runCli(argv: readonly string[], deps: CliDeps = defaultDeps): Promise<number> {
  const program = createProgram(deps);
  try {
    await program.parseAsync([...argv], { from: "user" });
    return 0;
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;

    deps.stderr.write(`error: ${formatErrorMessage(err)}\n`);
    if (err instanceof ConfigValidationError && err.issues.length > 1) {
      for (const issue of err.issues) deps.stderr.write(`  - ${issue}\n`);
    }
    if (err instanceof DiscoveryFailedError) {
      for (const f of err.failures) deps.stderr.write(`  - ${f.region}: ${f.error}\n`);
    }
    if (err instanceof TopologyBuildError) {
      for (const d of err.details) deps.stderr.write(`  - ${d}\n`);
    }
    return 1;
  }
}
