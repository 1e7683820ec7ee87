/**
 * VPC Atlas — Filter Pipeline
 *
 * Applies a validated policy to the deduplicated connections. Each option
 * contributes one predicate; a connection survives only if every active
 * predicate keeps it. Options that only affect presentation are passed
 * through as a render hint.
 */

import type { Catalog } from "../catalog/catalog.js";
import type { DetailLevel, FilterPolicy, LbDetailLevel, LbDisplayMode } from "../config/schema.js";
import type { Connection, Resource, ServiceLink, Tier } from "../types.js";
import { shapeServiceLinks } from "./service-links.js";
import type { TierClassifier } from "./tiers.js";
import { tierRank } from "./tiers.js";
import { createTierLookup, subnetIdOf } from "./topology.js";

// =============================================================================
// Types
// =============================================================================

/** Lowest port of the ephemeral range. */
export const EPHEMERAL_PORT_START = 32768;

export const FILTER_PREDICATES = [
  "flows",
  "direction",
  "filterInternal",
  "filterEphemeral",
  "onlyIngress",
  "lbDisplay",
] as const;

export type FilterPredicateName = (typeof FILTER_PREDICATES)[number];

export type FilterContext = {
  catalog: Catalog;
  classify: TierClassifier;
  /** Resource keys reachable from addresses outside the catalog. */
  externallyReachable: readonly string[];
  /** Derived service links; shaped by the load balancer options. */
  links?: readonly ServiceLink[];
};

export type RenderHint = {
  detail: DetailLevel;
  lbDisplay: LbDisplayMode;
  lbDetail: LbDetailLevel;
};

export type FilterResult = {
  connections: Connection[];
  links: ServiceLink[];
  /** Resource keys renderers must omit (hidden load balancers). */
  hiddenResources: string[];
  renderHint: RenderHint;
  /** Removed connections, counted against the first predicate that failed. */
  dropped: Record<FilterPredicateName, number>;
};

type Endpoint = {
  resource: Resource;
  key: string;
  tier: Tier;
  subnet: string;
};

type Predicate = {
  name: FilterPredicateName;
  keep: (source: Endpoint, dest: Endpoint, connection: Connection) => boolean;
};

// =============================================================================
// Pipeline
// =============================================================================

/**
 * Filter connections under a policy. Connections whose endpoints are not
 * in the catalog are dropped by the first active predicate.
 */
export function filter(
  connections: readonly Connection[],
  context: FilterContext,
  policy: FilterPolicy,
): FilterResult {
  const { catalog } = context;
  const tierOf = createTierLookup(catalog, context.classify);
  const shaped = shapeServiceLinks(catalog, context.links ?? [], policy);
  const predicates = buildPredicates(
    policy,
    new Set(context.externallyReachable),
    new Set(shaped.hiddenResources),
  );

  const dropped: Record<FilterPredicateName, number> = {
    flows: 0,
    direction: 0,
    filterInternal: 0,
    filterEphemeral: 0,
    onlyIngress: 0,
    lbDisplay: 0,
  };

  const endpoint = (key: string): Endpoint | undefined => {
    const resource = catalog.getResource(key);
    if (!resource) return undefined;
    return {
      resource,
      key,
      tier: tierOf(resource) ?? "unclassified",
      subnet: `${resource.region}/${subnetIdOf(resource) ?? "-"}`,
    };
  };

  const kept: Connection[] = [];
  for (const connection of connections) {
    const source = endpoint(connection.sourceId);
    const dest = endpoint(connection.destId);
    const failed = predicates.find((p) => !source || !dest || !p.keep(source, dest, connection));
    if (failed) {
      dropped[failed.name]++;
      continue;
    }
    kept.push(connection);
  }

  return {
    connections: kept,
    links: shaped.links,
    hiddenResources: shaped.hiddenResources,
    renderHint: { detail: policy.detail, lbDisplay: policy.lbDisplay, lbDetail: policy.lbDetail },
    dropped,
  };
}

// =============================================================================
// Predicates
// =============================================================================

function buildPredicates(
  policy: FilterPolicy,
  external: ReadonlySet<string>,
  hidden: ReadonlySet<string>,
): Predicate[] {
  const predicates: Predicate[] = [];

  switch (policy.flows) {
    case "none":
      predicates.push({ name: "flows", keep: () => false });
      break;
    case "inter-subnet":
      predicates.push({ name: "flows", keep: (s, d) => s.subnet !== d.subnet });
      break;
    case "tier-crossing":
      predicates.push({ name: "flows", keep: (s, d) => s.tier !== d.tier });
      break;
    case "external-only":
      predicates.push({
        name: "flows",
        keep: (s, d) => isExternalFacing(s, external) || isExternalFacing(d, external),
      });
      break;
  }

  if (policy.direction !== "both") {
    const wantSame = policy.direction === "east-west";
    predicates.push({
      name: "direction",
      keep: (s, d) => {
        const rs = tierRank(s.tier);
        const rd = tierRank(d.tier);
        if (rs === null || rd === null) return false;
        return wantSame ? rs === rd : rs !== rd;
      },
    });
  }

  if (policy.filterInternal) {
    predicates.push({
      name: "filterInternal",
      keep: (s, d) => !(subnetIdOf(s.resource) && s.subnet === d.subnet),
    });
  }

  if (policy.filterEphemeral) {
    predicates.push({ name: "filterEphemeral", keep: (_s, _d, c) => c.portFrom < EPHEMERAL_PORT_START });
  }

  if (policy.onlyIngress) {
    predicates.push({ name: "onlyIngress", keep: (_s, _d, c) => c.directions.includes("ingress") });
  }

  if (hidden.size > 0) {
    predicates.push({ name: "lbDisplay", keep: (s, d) => !hidden.has(s.key) && !hidden.has(d.key) });
  }

  return predicates;
}

function isExternalFacing(endpoint: Endpoint, external: ReadonlySet<string>): boolean {
  return (
    endpoint.resource.kind === "load_balancer" ||
    endpoint.resource.internetFacing ||
    external.has(endpoint.key)
  );
}
