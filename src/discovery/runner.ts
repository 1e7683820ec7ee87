/**
 * VPC Atlas — Multi-Region Discovery Runner
 *
 * Runs one discovery task per region in a bounded pool. A failed region is
 * reported and skipped; the run only fails when no region succeeds.
 */

import type { Catalog, CatalogSlice } from "../catalog/catalog.js";
import { mergeSlices } from "../catalog/catalog.js";
import { DiscoveryFailedError, formatErrorMessage } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import { createSilentLogger } from "../logging/logger.js";
import { processPooled } from "./pool.js";
import type { DiscoveryReport, RegionDiscoverer, RegionOutcome } from "./types.js";

export const DEFAULT_REGION_CONCURRENCY = 4;

export type DiscoverOptions = {
  /** Overrides the account id reported by the slices. */
  accountId?: string;
  concurrency?: number;
  logger?: Logger;
  signal?: AbortSignal;
};

export type DiscoverResult = {
  catalog: Catalog;
  report: DiscoveryReport;
};

/**
 * Discover every region and merge the successful slices into one frozen
 * catalog.
 *
 * Throws DiscoveryFailedError when every region fails.
 */
export async function discoverRegions(
  discoverer: RegionDiscoverer,
  regions: readonly string[],
  options: DiscoverOptions = {},
): Promise<DiscoverResult> {
  const logger = options.logger ?? createSilentLogger();
  const ordered = [...new Set(regions)].sort();

  const tasks = await processPooled(
    ordered,
    async (region): Promise<{ outcome: RegionOutcome; slice?: CatalogSlice }> => {
      const log = logger.withContext({ region });
      const startedAt = Date.now();
      log.debug("Discovering region");
      try {
        const slice = await discoverer.discoverRegion(region);
        const durationMs = Date.now() - startedAt;
        log.info("Region discovered", {
          resources: slice.resources.length,
          ruleSets: slice.ruleSets.length,
          durationMs,
        });
        return {
          outcome: {
            region,
            ok: true,
            resources: slice.resources.length,
            ruleSets: slice.ruleSets.length,
            durationMs,
          },
          slice,
        };
      } catch (err) {
        const error = formatErrorMessage(err);
        log.warn("Region discovery failed", { error });
        return { outcome: { region, ok: false, error, durationMs: Date.now() - startedAt } };
      }
    },
    options.concurrency ?? DEFAULT_REGION_CONCURRENCY,
    options.signal,
  );

  const slices = tasks.flatMap((t) => (t.slice ? [t.slice] : []));
  const outcomes = tasks.map((t) => t.outcome);

  if (slices.length === 0) {
    const failures = outcomes.flatMap((o) => (o.ok ? [] : [{ region: o.region, error: o.error }]));
    throw new DiscoveryFailedError(
      ordered.length === 0 ? "No regions to discover" : `Discovery failed in all ${ordered.length} region(s)`,
      failures,
    );
  }

  const catalog = mergeSlices(slices, options.accountId);
  return {
    catalog,
    report: { accountId: catalog.accountId, regions: outcomes },
  };
}

/** JSON document of a discovery run: the merged catalog and per-region outcomes. */
export function catalogToJson(catalog: Catalog, report: DiscoveryReport) {
  return {
    accountId: catalog.accountId,
    regions: catalog.regions,
    report: report.regions,
    resources: catalog.resources,
    ruleSets: catalog.ruleSets,
  };
}
