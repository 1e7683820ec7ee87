/**
 * VPC Atlas — Rule Resolver
 *
 * Turns every permission of every attached rule set into zero or more
 * endpoint pairs between concrete resources.
 *
 * Direction is fixed by the permission, not by which side matched:
 *   ingress on owner R from peer P  →  P → R
 *   egress  on owner R to   peer P  →  R → P
 */

import type { Catalog } from "../catalog/catalog.js";
import { anyAddressInRange, parseCidr } from "../catalog/address.js";
import type {
  Permission,
  PermissionDirection,
  ResolvedEdge,
  RuleSet,
} from "../types.js";

// =============================================================================
// Types
// =============================================================================

/** A rule set reference that could not be found in the catalog. */
export type DanglingReference = {
  fromRuleSetId: string;
  region: string;
  ruleSetId: string;
  direction: PermissionDirection;
};

export type ResolveDiagnostics = {
  rulesEvaluated: number;
  permissionsEvaluated: number;
  /** Rule set peers missing from the catalog (usually another region). */
  danglingReferences: number;
  dangling: DanglingReference[];
  /** CIDR peers that could not be matched at all (IPv6, malformed). */
  unmatchedCidrs: number;
  /** CIDR peers that matched no resource and were treated as external. */
  externalCidrs: number;
};

export type ResolveResult = {
  edges: ResolvedEdge[];
  /** Resource keys accepting ingress from addresses outside the catalog, sorted. */
  externallyReachable: string[];
  diagnostics: ResolveDiagnostics;
};

// =============================================================================
// Resolver
// =============================================================================

/**
 * Resolve all rule sets in the catalog into pre-deduplication edges.
 * Pure over the catalog; output order is deterministic.
 */
export function resolve(catalog: Catalog): ResolveResult {
  const state: ResolveState = {
    catalog,
    addressable: catalog.addressableResources(),
    edges: [],
    external: new Set<string>(),
    diagnostics: {
      rulesEvaluated: 0,
      permissionsEvaluated: 0,
      danglingReferences: 0,
      dangling: [],
      unmatchedCidrs: 0,
      externalCidrs: 0,
    },
  };

  for (const ruleSet of catalog.ruleSets) {
    const owners = catalog.attachedResources(ruleSet.region, ruleSet.id);
    if (owners.length === 0) continue;
    state.diagnostics.rulesEvaluated++;

    const byDirection: Array<[PermissionDirection, Permission[]]> = [
      ["ingress", ruleSet.ingress],
      ["egress", ruleSet.egress],
    ];

    for (const [direction, permissions] of byDirection) {
      for (const permission of permissions) {
        state.diagnostics.permissionsEvaluated++;
        const origin: PermissionOrigin = { ruleSet, owners, permission, direction };
        for (const peer of permission.peers) {
          if (peer.type === "cidr") {
            resolveCidrPeer(state, origin, peer.cidr);
          } else {
            resolveRuleSetPeer(state, origin, peer.region ?? ruleSet.region, peer.ruleSetId);
          }
        }
      }
    }
  }

  return {
    edges: state.edges,
    externallyReachable: [...state.external].sort(),
    diagnostics: state.diagnostics,
  };
}

// =============================================================================
// Peer Resolution
// =============================================================================

type ResolveState = {
  catalog: Catalog;
  addressable: string[];
  edges: ResolvedEdge[];
  external: Set<string>;
  diagnostics: ResolveDiagnostics;
};

type PermissionOrigin = {
  ruleSet: RuleSet;
  owners: readonly string[];
  permission: Permission;
  direction: PermissionDirection;
};

function resolveCidrPeer(state: ResolveState, origin: PermissionOrigin, cidr: string): void {
  const parsed = parseCidr(cidr);
  if (parsed.kind === "unsupported") state.diagnostics.unmatchedCidrs++;

  const matches =
    parsed.kind === "ipv4"
      ? state.addressable.filter((key) =>
          anyAddressInRange(parsed.range, state.catalog.ipv4Addresses(key)),
        )
      : [];

  // No known resource behind the range: internet or unmanaged traffic.
  // Only inbound exposure counts; every group carries a default 0.0.0.0/0 egress.
  if (matches.length === 0) {
    state.diagnostics.externalCidrs++;
    if (origin.direction === "ingress") {
      for (const owner of origin.owners) state.external.add(owner);
    }
    return;
  }

  for (const owner of origin.owners) {
    for (const peerKey of matches) pushEdge(state, origin, owner, peerKey);
  }
}

function resolveRuleSetPeer(
  state: ResolveState,
  origin: PermissionOrigin,
  region: string,
  peerRuleSetId: string,
): void {
  if (!state.catalog.getRuleSet(region, peerRuleSetId)) {
    state.diagnostics.danglingReferences++;
    state.diagnostics.dangling.push({
      fromRuleSetId: origin.ruleSet.id,
      region,
      ruleSetId: peerRuleSetId,
      direction: origin.direction,
    });
    return;
  }

  const peers = state.catalog.attachedResources(region, peerRuleSetId);
  for (const owner of origin.owners) {
    for (const peerKey of peers) pushEdge(state, origin, owner, peerKey);
  }
}

function pushEdge(state: ResolveState, origin: PermissionOrigin, owner: string, peerKey: string): void {
  if (owner === peerKey) return;
  const ingress = origin.direction === "ingress";
  state.edges.push(
    makeEdge(
      ingress ? peerKey : owner,
      ingress ? owner : peerKey,
      origin.permission,
      origin.direction,
      origin.ruleSet,
    ),
  );
}

function makeEdge(
  sourceId: string,
  destId: string,
  permission: Permission,
  direction: PermissionDirection,
  ruleSet: RuleSet,
): ResolvedEdge {
  return {
    sourceId,
    destId,
    protocol: permission.protocol,
    portFrom: permission.portFrom,
    portTo: permission.portTo,
    direction,
    originRuleSetId: ruleSet.id,
  };
}
