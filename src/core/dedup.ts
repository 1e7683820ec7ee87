/**
 * VPC Atlas — Connection Deduplicator
 *
 * Collapses resolved edges that describe the same logical flow into a
 * single connection. Ranges are never coalesced: 80-80 and 80-81 stay
 * separate connections.
 */

import type { Connection, PermissionDirection, ResolvedEdge } from "../types.js";

/** Grouping key: source, destination, protocol and port range. */
export function connectionKey(
  edge: Pick<ResolvedEdge, "sourceId" | "destId" | "protocol" | "portFrom" | "portTo">,
): string {
  return `${edge.sourceId}|${edge.destId}|${edge.protocol}|${edge.portFrom}|${edge.portTo}`;
}

/** Total order over connections used for every emitted list. */
export function compareConnections(a: Connection, b: Connection): number {
  return (
    compareStrings(a.sourceId, b.sourceId) ||
    compareStrings(a.destId, b.destId) ||
    compareStrings(a.protocol, b.protocol) ||
    a.portFrom - b.portFrom ||
    a.portTo - b.portTo
  );
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Merge edges sharing a grouping key. Provenance and directions accumulate
 * with set semantics; output is sorted.
 */
export function deduplicate(edges: readonly ResolvedEdge[]): Connection[] {
  const groups = new Map<
    string,
    { edge: ResolvedEdge; provenance: Set<string>; directions: Set<PermissionDirection> }
  >();

  for (const edge of edges) {
    const key = connectionKey(edge);
    const group = groups.get(key);
    if (group) {
      group.provenance.add(edge.originRuleSetId);
      group.directions.add(edge.direction);
    } else {
      groups.set(key, {
        edge,
        provenance: new Set([edge.originRuleSetId]),
        directions: new Set([edge.direction]),
      });
    }
  }

  return [...groups.values()]
    .map(({ edge, provenance, directions }) => ({
      sourceId: edge.sourceId,
      destId: edge.destId,
      protocol: edge.protocol,
      portFrom: edge.portFrom,
      portTo: edge.portTo,
      provenance: [...provenance].sort(),
      directions: [...directions].sort(),
    }))
    .sort(compareConnections);
}

/**
 * Expand connections back into one edge per (rule set, direction) pair.
 * deduplicate(connectionsToEdges(c)) returns c unchanged.
 */
export function connectionsToEdges(connections: readonly Connection[]): ResolvedEdge[] {
  return connections.flatMap((c) =>
    c.provenance.flatMap((originRuleSetId) =>
      c.directions.map((direction) => ({
        sourceId: c.sourceId,
        destId: c.destId,
        protocol: c.protocol,
        portFrom: c.portFrom,
        portTo: c.portTo,
        direction,
        originRuleSetId,
      })),
    ),
  );
}
