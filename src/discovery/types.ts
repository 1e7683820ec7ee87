/**
 * VPC Atlas — Discovery Types
 */

import type { CatalogSlice } from "../catalog/catalog.js";

/**
 * Produces the catalog slice of a single region. Implementations must be
 * read-only against the provider.
 */
export interface RegionDiscoverer {
  discoverRegion(region: string): Promise<CatalogSlice>;
}

/** Outcome of one region's discovery task. */
export type RegionOutcome =
  | { region: string; ok: true; resources: number; ruleSets: number; durationMs: number }
  | { region: string; ok: false; error: string; durationMs: number };

export type DiscoveryReport = {
  accountId: string;
  /** One entry per requested region, sorted by region. */
  regions: RegionOutcome[];
};
