/**
 * VPC Atlas — Resource Catalog
 *
 * Immutable, merged view of every discovered resource and rule set.
 * Indexes are built once when the catalog is constructed and only read
 * afterwards.
 */

import type { IPv4 } from "ip-num";
import type { Resource, ResourceKind, RuleSet } from "../types.js";
import { TopologyBuildError } from "../errors.js";
import { parseIpv4 } from "./address.js";

// =============================================================================
// Keys
// =============================================================================

/**
 * Composite resource key. Ids are only unique within region + kind.
 * Format: <region>:<kind>:<id>
 */
export function buildResourceKey(region: string, kind: ResourceKind, id: string): string {
  return `${region}:${kind}:${id}`;
}

export function resourceKey(resource: Pick<Resource, "region" | "kind" | "id">): string {
  return buildResourceKey(resource.region, resource.kind, resource.id);
}

/** Composite rule set key. Format: <region>:<id> */
export function ruleSetKey(region: string, ruleSetId: string): string {
  return `${region}:${ruleSetId}`;
}

// =============================================================================
// Slices
// =============================================================================

/** The output of one region's discovery task. */
export type CatalogSlice = {
  region: string;
  accountId?: string;
  resources: Resource[];
  ruleSets: RuleSet[];
};

// =============================================================================
// Catalog
// =============================================================================

export class Catalog {
  readonly accountId: string;
  readonly regions: readonly string[];
  /** All resources, sorted by resource key. */
  readonly resources: readonly Resource[];
  /** All rule sets, sorted by rule set key. */
  readonly ruleSets: readonly RuleSet[];

  private readonly byKey: ReadonlyMap<string, Resource>;
  private readonly ruleSetsByKey: ReadonlyMap<string, RuleSet>;
  private readonly attachments: ReadonlyMap<string, readonly string[]>;
  private readonly ipv4ByKey: ReadonlyMap<string, readonly IPv4[]>;

  constructor(options: {
    accountId?: string;
    resources: Resource[];
    ruleSets: RuleSet[];
  }) {
    const errors: string[] = [];

    const byKey = new Map<string, Resource>();
    for (const resource of options.resources) {
      const key = resourceKey(resource);
      if (byKey.has(key)) {
        errors.push(`duplicate resource ${key}`);
        continue;
      }
      byKey.set(key, resource);
    }

    const ruleSetsByKey = new Map<string, RuleSet>();
    for (const ruleSet of options.ruleSets) {
      const key = ruleSetKey(ruleSet.region, ruleSet.id);
      if (ruleSetsByKey.has(key)) {
        errors.push(`duplicate rule set ${key}`);
        continue;
      }
      ruleSetsByKey.set(key, ruleSet);
    }

    if (errors.length > 0) {
      throw new TopologyBuildError("Catalog contains conflicting entries", errors);
    }

    const sortedKeys = [...byKey.keys()].sort();
    const attachments = new Map<string, string[]>();
    const ipv4ByKey = new Map<string, IPv4[]>();

    for (const key of sortedKeys) {
      const resource = byKey.get(key);
      if (!resource) continue;

      for (const id of new Set(resource.ruleSetIds)) {
        const rsKey = ruleSetKey(resource.region, id);
        const list = attachments.get(rsKey) ?? [];
        list.push(key);
        attachments.set(rsKey, list);
      }

      const parsed = resource.addresses
        .map((a) => parseIpv4(a))
        .filter((a): a is IPv4 => a !== null);
      if (parsed.length > 0) ipv4ByKey.set(key, parsed);
    }

    this.accountId = options.accountId ?? "unknown";
    this.byKey = byKey;
    this.ruleSetsByKey = ruleSetsByKey;
    this.attachments = attachments;
    this.ipv4ByKey = ipv4ByKey;
    this.resources = Object.freeze(sortedKeys.flatMap((k) => {
      const r = byKey.get(k);
      return r ? [r] : [];
    }));
    this.ruleSets = Object.freeze(
      [...ruleSetsByKey.entries()]
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([, rs]) => rs),
    );
    this.regions = Object.freeze(
      [...new Set([...this.resources.map((r) => r.region), ...this.ruleSets.map((r) => r.region)])].sort(),
    );
    Object.freeze(this);
  }

  /** Total resource count. */
  get size(): number {
    return this.resources.length;
  }

  getResource(key: string): Resource | undefined {
    return this.byKey.get(key);
  }

  hasResource(key: string): boolean {
    return this.byKey.has(key);
  }

  getRuleSet(region: string, ruleSetId: string): RuleSet | undefined {
    return this.ruleSetsByKey.get(ruleSetKey(region, ruleSetId));
  }

  /** Resource keys attached to a rule set, sorted. */
  attachedResources(region: string, ruleSetId: string): readonly string[] {
    return this.attachments.get(ruleSetKey(region, ruleSetId)) ?? [];
  }

  /** Parsed IPv4 addresses of a resource. */
  ipv4Addresses(key: string): readonly IPv4[] {
    return this.ipv4ByKey.get(key) ?? [];
  }

  /** Resource keys that carry at least one IPv4 address, sorted. */
  addressableResources(): string[] {
    return [...this.ipv4ByKey.keys()];
  }

  findSubnet(region: string, subnetId: string): Resource | undefined {
    return this.byKey.get(buildResourceKey(region, "subnet", subnetId));
  }
}

// =============================================================================
// Selection
// =============================================================================

export type CatalogSelection = {
  /** Keep one network. Resources outside any network (zones, certificates) stay. */
  networkId?: string;
  excludeKinds?: readonly ResourceKind[];
};

/**
 * Narrow a catalog to one network and drop excluded kinds. Rule sets are
 * kept whole so references into the dropped part stay resolvable.
 */
export function restrictCatalog(catalog: Catalog, selection: CatalogSelection): Catalog {
  const excluded = new Set(selection.excludeKinds ?? []);
  const { networkId } = selection;
  return new Catalog({
    accountId: catalog.accountId,
    resources: catalog.resources.filter(
      (r) =>
        !excluded.has(r.kind) &&
        (networkId === undefined || r.networkId === null || r.networkId === networkId),
    ),
    ruleSets: [...catalog.ruleSets],
  });
}

// =============================================================================
// Merge
// =============================================================================

/**
 * Merge per-region slices into one catalog. Order-independent: slices are
 * sorted by region first and every key is region-qualified.
 */
export function mergeSlices(slices: CatalogSlice[], accountId?: string): Catalog {
  const ordered = [...slices].sort((a, b) => (a.region < b.region ? -1 : a.region > b.region ? 1 : 0));
  return new Catalog({
    accountId: accountId ?? ordered.find((s) => s.accountId)?.accountId,
    resources: ordered.flatMap((s) => s.resources),
    ruleSets: ordered.flatMap((s) => s.ruleSets),
  });
}
