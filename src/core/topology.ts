/**
 * VPC Atlas — Topology Builder
 *
 * Places every resource into the account → region → network → tier
 * hierarchy and attaches connections as a flat edge list over resource
 * keys. Edges are never embedded in tree nodes: their endpoints may live
 * in different tiers, networks or regions.
 */

import type { Catalog } from "../catalog/catalog.js";
import { buildResourceKey, resourceKey } from "../catalog/catalog.js";
import { TopologyBuildError } from "../errors.js";
import type { Connection, Resource, Tier, Topology, TopologyNode } from "../types.js";
import { TIERS } from "../types.js";
import type { TierClassifier } from "./tiers.js";

// =============================================================================
// Constants
// =============================================================================

/** Network key for resources that are not network-scoped. */
export const REGIONAL_NETWORK_KEY = "-";

/** Leaf key for resources without a subnet. */
export const UNGROUPED_KEY = "ungrouped";

const TIER_LABELS: Record<Tier, string> = {
  presentation: "Public Subnets",
  application: "Application Subnets",
  restricted: "Restricted Subnets",
  unclassified: "Unclassified Subnets",
};

// =============================================================================
// Tier Lookup
// =============================================================================

/** Tier of a resource, or null when it has no subnet. */
export type TierLookup = (resource: Resource) => Tier | null;

/** The subnet a resource is placed by; subnets are placed by their own id. */
export function subnetIdOf(resource: Resource): string | undefined {
  return resource.kind === "subnet" ? resource.id : resource.subnetId;
}

/**
 * Resolve resource tiers through their subnet. Subnets resolve to their
 * own classification; a subnet id missing from the catalog is classified
 * by the id alone.
 */
export function createTierLookup(catalog: Catalog, classify: TierClassifier): TierLookup {
  const cache = new Map<string, Tier>();

  return (resource) => {
    const subnetId = subnetIdOf(resource);
    if (!subnetId) return null;

    const cacheKey = `${resource.region}:${subnetId}`;
    const cached = cache.get(cacheKey);
    if (cached) return cached;

    const subnet = catalog.findSubnet(resource.region, subnetId) ?? {
      id: subnetId,
      name: subnetId,
      tags: {},
    };
    const tier = classify(subnet);
    cache.set(cacheKey, tier);
    return tier;
  };
}

// =============================================================================
// Builder
// =============================================================================

export type BuildOptions = {
  /** Root label; defaults to the catalog's account id. */
  accountLabel?: string;
};

/**
 * Build the topology tree and attach the connection list.
 *
 * Throws TopologyBuildError if a connection references a resource that is
 * not in the catalog.
 */
export function build(
  catalog: Catalog,
  connections: readonly Connection[],
  classify: TierClassifier,
  options: BuildOptions = {},
): Topology {
  const tierOf = createTierLookup(catalog, classify);
  const root: TopologyNode = {
    key: catalog.accountId,
    label: options.accountLabel ?? `Account: ${catalog.accountId}`,
    kind: "account",
    children: [],
    resources: [],
  };

  // Lazily created nodes, keyed by composite path.
  const nodes = new Map<string, TopologyNode>();

  const ensure = (parent: TopologyNode, key: string, make: () => TopologyNode): TopologyNode => {
    const existing = nodes.get(key);
    if (existing) return existing;
    const node = make();
    nodes.set(key, node);
    parent.children.push(node);
    return node;
  };

  for (const resource of catalog.resources) {
    const region = ensure(root, resource.region, () => ({
      key: resource.region,
      label: `Region: ${resource.region}`,
      kind: "region",
      children: [],
      resources: [],
    }));

    const networkId = resource.kind === "network" ? resource.id : resource.networkId;
    const networkKey = `${resource.region}/${networkId ?? REGIONAL_NETWORK_KEY}`;
    const network = ensure(region, networkKey, () => ({
      key: networkKey,
      label: networkLabel(catalog, resource.region, networkId),
      kind: "network",
      children: [],
      resources: [],
    }));

    const tier = tierOf(resource);
    const leafKey = `${networkKey}/${tier ?? UNGROUPED_KEY}`;
    const leaf = ensure(network, leafKey, () =>
      tier
        ? { key: leafKey, label: TIER_LABELS[tier], kind: "tier", tier, children: [], resources: [] }
        : { key: leafKey, label: "Ungrouped", kind: "ungrouped", children: [], resources: [] },
    );

    leaf.resources.push(resource);
  }

  sortTree(root);

  const missing = connections.flatMap((c) =>
    [c.sourceId, c.destId].filter((key) => !catalog.hasResource(key)),
  );
  if (missing.length > 0) {
    throw new TopologyBuildError("Connections reference unknown resources", [...new Set(missing)].sort());
  }

  return { root, connections: [...connections] };
}

function networkLabel(catalog: Catalog, region: string, networkId: string | null): string {
  if (networkId === null) return "Regional services";
  const network = catalog.getResource(buildResourceKey(region, "network", networkId));
  const cidr = network?.attributes.cidrBlock;
  const name = network?.name ?? networkId;
  return cidr ? `VPC: ${name} (${cidr})` : `VPC: ${name}`;
}

/** Regions and networks by key; tiers in stack order with ungrouped last. */
function sortTree(node: TopologyNode): void {
  node.children.sort((a, b) => {
    const ra = leafRank(a);
    const rb = leafRank(b);
    if (ra !== rb) return ra - rb;
    return a.key < b.key ? -1 : a.key > b.key ? 1 : 0;
  });
  node.resources.sort((a, b) => {
    const ka = resourceKey(a);
    const kb = resourceKey(b);
    return ka < kb ? -1 : ka > kb ? 1 : 0;
  });
  for (const child of node.children) sortTree(child);
}

function leafRank(node: TopologyNode): number {
  if (node.kind === "tier" && node.tier) return TIERS.indexOf(node.tier);
  if (node.kind === "ungrouped") return TIERS.length;
  return 0;
}

// =============================================================================
// Traversal
// =============================================================================

/** All leaf nodes (tier and ungrouped) in tree order. */
export function collectLeaves(node: TopologyNode): TopologyNode[] {
  if (node.kind === "tier" || node.kind === "ungrouped") return [node];
  return node.children.flatMap(collectLeaves);
}

/**
 * Check that every catalog resource sits in exactly one leaf.
 * Returns the list of violations (empty when consistent).
 */
export function verifyPlacement(topology: Topology, catalog: Catalog): string[] {
  const seen = new Map<string, number>();
  for (const leaf of collectLeaves(topology.root)) {
    for (const resource of leaf.resources) {
      const key = resourceKey(resource);
      seen.set(key, (seen.get(key) ?? 0) + 1);
    }
  }

  const problems: string[] = [];
  for (const resource of catalog.resources) {
    const key = resourceKey(resource);
    const count = seen.get(key) ?? 0;
    if (count !== 1) problems.push(`${key} placed ${count} times`);
  }
  return problems;
}
