/**
 * VPC Atlas — Service Links
 *
 * Links that do not come from firewall rules: load balancer → target
 * (from target groups) and DNS zone → load balancer (from alias and
 * CNAME records).
 */

import type { Catalog } from "../catalog/catalog.js";
import { buildResourceKey, resourceKey } from "../catalog/catalog.js";
import type { FilterPolicy } from "../config/schema.js";
import type { Resource, ServiceLink } from "../types.js";

/** DNS links are drawn as resolver traffic. */
const DNS_PORT = 53;
const DNS_PROTOCOL = "tcp";

// =============================================================================
// Derivation
// =============================================================================

/**
 * Derive every service link from catalog attributes. Targets that do not
 * resolve to a catalog resource are skipped. Output is sorted.
 */
export function deriveServiceLinks(catalog: Catalog): ServiceLink[] {
  const loadBalancers = catalog.resources.filter((r) => r.kind === "load_balancer");
  const links = [
    ...loadBalancers.flatMap((lb) => targetLinks(catalog, lb)),
    ...catalog.resources
      .filter((r) => r.kind === "zone")
      .flatMap((zone) => aliasLinks(zone, loadBalancers)),
  ];
  return links.sort(compareLinks);
}

function targetLinks(catalog: Catalog, lb: Resource): ServiceLink[] {
  const sourceId = resourceKey(lb);
  const links: ServiceLink[] = [];
  const seen = new Set<string>();

  for (const group of lb.attributes.targetGroups ?? []) {
    for (const target of group.targets) {
      const destId = resolveTarget(catalog, lb.region, target.id);
      if (!destId) continue;

      const port = target.port ?? group.port;
      const protocol = (group.protocol ?? "tcp").toLowerCase();
      const dedupKey = `${destId}|${port ?? ""}|${protocol}`;
      if (seen.has(dedupKey)) continue;
      seen.add(dedupKey);

      links.push({ kind: "lb-target", sourceId, destId, port, protocol, health: target.health });
    }
  }
  return links;
}

/** Instance targets by id; IP targets by a matching instance address. */
function resolveTarget(catalog: Catalog, region: string, targetId: string): string | undefined {
  const byId = buildResourceKey(region, "instance", targetId);
  if (catalog.hasResource(byId)) return byId;

  const byAddress = catalog.resources.find(
    (r) => r.region === region && r.kind === "instance" && r.addresses.includes(targetId),
  );
  return byAddress ? resourceKey(byAddress) : undefined;
}

function aliasLinks(zone: Resource, loadBalancers: readonly Resource[]): ServiceLink[] {
  const values = (zone.attributes.records ?? []).flatMap((record) =>
    record.values.map(normalizeDnsName),
  );
  if (values.length === 0) return [];

  const sourceId = resourceKey(zone);
  return loadBalancers
    .filter((lb) => {
      const dnsName = lb.attributes.dnsName;
      if (!dnsName) return false;
      const target = normalizeDnsName(dnsName);
      return values.some((value) => value.includes(target));
    })
    .map((lb) => ({
      kind: "dns-alias" as const,
      sourceId,
      destId: resourceKey(lb),
      port: DNS_PORT,
      protocol: DNS_PROTOCOL,
    }));
}

function normalizeDnsName(name: string): string {
  return name.trim().toLowerCase().replace(/\.$/, "");
}

function compareLinks(a: ServiceLink, b: ServiceLink): number {
  return (
    compareStrings(a.kind, b.kind) ||
    compareStrings(a.sourceId, b.sourceId) ||
    compareStrings(a.destId, b.destId) ||
    (a.port ?? -1) - (b.port ?? -1) ||
    compareStrings(a.protocol, b.protocol)
  );
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

// =============================================================================
// Display Policy
// =============================================================================

export type ShapedLinks = {
  links: ServiceLink[];
  /** Load balancer keys the renderers must not draw, sorted. */
  hiddenResources: string[];
};

/**
 * Apply the load balancer display options to derived links.
 *
 * - filterUnhealthy drops targets reported "unhealthy"
 * - lbDisplay "none" drops every link and hides every load balancer
 * - lbDisplay "connected-only" hides load balancers left without a link
 */
export function shapeServiceLinks(
  catalog: Catalog,
  links: readonly ServiceLink[],
  policy: Pick<FilterPolicy, "lbDisplay" | "filterUnhealthy">,
): ShapedLinks {
  const loadBalancers = catalog.resources.filter((r) => r.kind === "load_balancer").map(resourceKey);

  if (policy.lbDisplay === "none") {
    return { links: [], hiddenResources: loadBalancers };
  }

  const kept = links.filter(
    (link) => !(policy.filterUnhealthy && link.kind === "lb-target" && link.health === "unhealthy"),
  );

  if (policy.lbDisplay === "all") {
    return { links: kept, hiddenResources: [] };
  }

  const linked = new Set(kept.flatMap((link) => [link.sourceId, link.destId]));
  return { links: kept, hiddenResources: loadBalancers.filter((key) => !linked.has(key)) };
}
