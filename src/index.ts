/**
 * VPC Atlas — Public API
 */

export * from "./types.js";
export * from "./errors.js";

// Catalog
export { Catalog, restrictCatalog, mergeSlices, buildResourceKey, resourceKey, ruleSetKey } from "./catalog/catalog.js";
export type { CatalogSlice } from "./catalog/catalog.js";
export { parseCidr, parseIpv4, rangeContains } from "./catalog/address.js";
export type { ParsedCidr } from "./catalog/address.js";

// Core
export { resolve } from "./core/resolver.js";
export type { ResolveResult, ResolveDiagnostics, DanglingReference } from "./core/resolver.js";
export { deduplicate, connectionsToEdges, connectionKey } from "./core/dedup.js";
export { createTierClassifier, compileGlob, DEFAULT_TIER_RULES } from "./core/tiers.js";
export type { TierRule, TierClassifier } from "./core/tiers.js";
export { build, collectLeaves, verifyPlacement } from "./core/topology.js";
export { filter, FILTER_PREDICATES } from "./core/filters.js";
export type { FilterContext, FilterResult, RenderHint } from "./core/filters.js";
export { deriveServiceLinks, shapeServiceLinks } from "./core/service-links.js";
export { buildTopology } from "./core/pipeline.js";
export type { PipelineOptions, TopologyResult } from "./core/pipeline.js";

// Configuration
export { createPolicy, DEFAULT_POLICY, PRESETS } from "./config/policy.js";
export { loadConfigFile, parseConfigText, resolveConfig } from "./config/loader.js";
export { policySchema, tierRuleSchema, topologyConfigSchema } from "./config/schema.js";
export type { FilterPolicy, PresetName, TopologyConfig } from "./config/schema.js";

// Discovery
export { AwsRegionDiscoverer } from "./discovery/aws.js";
export type { AwsClientFactory, AwsDiscovererOptions } from "./discovery/aws.js";
export { catalogToJson, discoverRegions } from "./discovery/runner.js";
export { createAWSRetryRunner, retryAsync, withAWSRetry } from "./discovery/retry.js";
export type { RetryConfig } from "./discovery/retry.js";
export type { RegionDiscoverer, DiscoveryReport, RegionOutcome } from "./discovery/types.js";

// MCP
export { McpServer, serveStdio } from "./mcp/server.js";
export { buildToolRegistry } from "./mcp/tool-registry.js";
export type { ToolDefinition, ToolRegistryDeps, ToolResult } from "./mcp/tool-registry.js";

// Rendering
export { renderMermaid, validateMermaid, wrapMermaidMarkdown } from "./render/mermaid.js";
export type { MermaidValidation } from "./render/mermaid.js";
export { renderDot } from "./render/dot.js";
export { formatConnectionLabel } from "./render/labels.js";

// Logging
export { createLogger } from "./logging/logger.js";
export type { Logger, LogLevel } from "./logging/logger.js";
