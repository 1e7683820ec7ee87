import { describe, it, expect, vi } from "vitest";
import type { CatalogSlice } from "../catalog/catalog.js";
import { DiscoveryFailedError } from "../errors.js";
import { makeResource, makeRuleSet } from "../testing/fixtures.js";
import { discoverRegions } from "./runner.js";
import type { RegionDiscoverer } from "./types.js";

function slice(region: string, accountId = "123456789012"): CatalogSlice {
  return {
    region,
    accountId,
    resources: [makeResource(`i-${region}`, { region })],
    ruleSets: [makeRuleSet(`sg-${region}`, { region })],
  };
}

function fakeDiscoverer(failing: string[] = []) {
  const discoverRegion = vi.fn(async (region: string): Promise<CatalogSlice> => {
    if (failing.includes(region)) throw new Error(`AccessDenied in ${region}`);
    return slice(region);
  });
  return { discoverRegion } satisfies RegionDiscoverer;
}

describe("discoverRegions", () => {
  it("merges every region into one catalog", async () => {
    const discoverer = fakeDiscoverer();
    const { catalog, report } = await discoverRegions(discoverer, ["us-west-2", "eu-west-1", "us-west-2"]);

    expect(discoverer.discoverRegion).toHaveBeenCalledTimes(2);
    expect(catalog.regions).toEqual(["eu-west-1", "us-west-2"]);
    expect(catalog.accountId).toBe("123456789012");
    expect(catalog.resources.map((r) => r.id)).toEqual(["i-eu-west-1", "i-us-west-2"]);
    expect(report.regions.map((o) => [o.region, o.ok])).toEqual([
      ["eu-west-1", true],
      ["us-west-2", true],
    ]);
  });

  it("reports a failed region and keeps the rest", async () => {
    const { catalog, report } = await discoverRegions(fakeDiscoverer(["us-west-2"]), ["us-east-1", "us-west-2"]);

    expect(catalog.regions).toEqual(["us-east-1"]);
    const failed = report.regions[1];
    expect(failed.region).toBe("us-west-2");
    expect(failed.ok).toBe(false);
    if (!failed.ok) expect(failed.error).toBe("AccessDenied in us-west-2");
  });

  it("fails when every region fails", async () => {
    const run = discoverRegions(fakeDiscoverer(["us-east-1", "eu-west-1"]), ["us-east-1", "eu-west-1"]);
    await expect(run).rejects.toBeInstanceOf(DiscoveryFailedError);
    await expect(run).rejects.toMatchObject({
      message: "Discovery failed in all 2 region(s)",
      failures: [
        { region: "eu-west-1", error: "AccessDenied in eu-west-1" },
        { region: "us-east-1", error: "AccessDenied in us-east-1" },
      ],
    });
  });

  it("fails without regions", async () => {
    await expect(discoverRegions(fakeDiscoverer(), [])).rejects.toThrow("No regions to discover");
  });

  it("lets the caller override the account id", async () => {
    const { report } = await discoverRegions(fakeDiscoverer(), ["us-east-1"], { accountId: "210987654321" });
    expect(report.accountId).toBe("210987654321");
  });

  it("produces the same catalog regardless of completion order", async () => {
    const slow: RegionDiscoverer = {
      discoverRegion: (region) =>
        new Promise((resolve) => setTimeout(() => resolve(slice(region)), region === "eu-west-1" ? 20 : 0)),
    };
    const a = await discoverRegions(slow, ["eu-west-1", "us-east-1"], { concurrency: 2 });
    const b = await discoverRegions(fakeDiscoverer(), ["us-east-1", "eu-west-1"], { concurrency: 1 });
    expect(a.catalog.resources).toEqual(b.catalog.resources);
    expect(a.catalog.ruleSets).toEqual(b.catalog.ruleSets);
  });
});
