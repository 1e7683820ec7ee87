/**
 * VPC Atlas — Topology Pipeline
 *
 * Runs resolution, deduplication, classification, building and filtering
 * over one frozen catalog. The result is either complete and consistent or
 * a TopologyBuildError is thrown.
 */

import type { Catalog } from "../catalog/catalog.js";
import type { FilterPolicy } from "../config/schema.js";
import { TopologyBuildError } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import { createSilentLogger } from "../logging/logger.js";
import type { Topology } from "../types.js";
import { deduplicate } from "./dedup.js";
import type { FilterResult } from "./filters.js";
import { filter } from "./filters.js";
import type { ResolveDiagnostics } from "./resolver.js";
import { resolve } from "./resolver.js";
import { deriveServiceLinks } from "./service-links.js";
import type { TierRule } from "./tiers.js";
import { createTierClassifier, DEFAULT_TIER_RULES } from "./tiers.js";
import { build, verifyPlacement } from "./topology.js";

export type PipelineOptions = {
  policy: FilterPolicy;
  tierRules?: readonly TierRule[];
  accountLabel?: string;
  logger?: Logger;
};

export type PipelineDiagnostics = ResolveDiagnostics & {
  edgesResolved: number;
  connections: number;
  connectionsKept: number;
  serviceLinks: number;
};

export type TopologyResult = {
  /** Hierarchy plus every deduplicated connection. */
  topology: Topology;
  /** The policy's view: surviving connections, shaped links, render hint. */
  view: FilterResult;
  externallyReachable: string[];
  diagnostics: PipelineDiagnostics;
};

export function buildTopology(catalog: Catalog, options: PipelineOptions): TopologyResult {
  const logger = options.logger ?? createSilentLogger();
  const classify = createTierClassifier(options.tierRules ?? DEFAULT_TIER_RULES);

  const resolved = resolve(catalog);
  logger.withContext({ stage: "resolve" }).debug("Resolved rule sets", {
    edges: resolved.edges.length,
    danglingReferences: resolved.diagnostics.danglingReferences,
    unmatchedCidrs: resolved.diagnostics.unmatchedCidrs,
  });
  for (const ref of resolved.diagnostics.dangling) {
    logger.trace("Dangling rule set reference", { ...ref });
  }

  const connections = deduplicate(resolved.edges);
  const topology = build(catalog, connections, classify, { accountLabel: options.accountLabel });

  const placement = verifyPlacement(topology, catalog);
  if (placement.length > 0) {
    throw new TopologyBuildError("Resources are not placed exactly once", placement);
  }

  const links = deriveServiceLinks(catalog);
  const view = filter(
    topology.connections,
    { catalog, classify, externallyReachable: resolved.externallyReachable, links },
    options.policy,
  );
  logger.withContext({ stage: "filter" }).debug("Filtered connections", {
    kept: view.connections.length,
    total: connections.length,
    dropped: view.dropped,
  });

  return {
    topology,
    view,
    externallyReachable: resolved.externallyReachable,
    diagnostics: {
      ...resolved.diagnostics,
      edgesResolved: resolved.edges.length,
      connections: connections.length,
      connectionsKept: view.connections.length,
      serviceLinks: view.links.length,
    },
  };
}
