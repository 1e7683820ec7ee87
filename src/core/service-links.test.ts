import { describe, it, expect } from "vitest";
import { DEFAULT_POLICY } from "../config/policy.js";
import { makeCatalog, makeResource, WEB } from "../testing/fixtures.js";
import type { ServiceLink } from "../types.js";
import { deriveServiceLinks, shapeServiceLinks } from "./service-links.js";

const APP = "us-east-1:instance:app";
const LB = "us-east-1:load_balancer:web-lb";
const IDLE_LB = "us-east-1:load_balancer:idle-lb";
const ZONE = "us-east-1:zone:Z1";

function makeLinkCatalog() {
  return makeCatalog([
    makeResource("web"),
    makeResource("app", { addresses: ["10.0.2.5"] }),
    makeResource("web-lb", {
      kind: "load_balancer",
      attributes: {
        dnsName: "web-lb-123.us-east-1.elb.amazonaws.com",
        targetGroups: [
          {
            name: "tg-web",
            port: 80,
            protocol: "HTTP",
            targets: [
              { id: "web", port: null, health: "healthy" },
              { id: "10.0.2.5", port: 8080, health: "unhealthy" },
              { id: "i-missing", port: null, health: "healthy" },
            ],
          },
          {
            name: "tg-web-copy",
            port: 80,
            protocol: "http",
            targets: [{ id: "web", port: null, health: "healthy" }],
          },
        ],
      },
    }),
    makeResource("idle-lb", {
      kind: "load_balancer",
      attributes: { dnsName: "idle-lb-456.us-east-1.elb.amazonaws.com" },
    }),
    makeResource("Z1", {
      kind: "zone",
      networkId: null,
      attributes: {
        records: [
          { name: "www.example.com.", type: "A", values: ["dualstack.Web-LB-123.us-east-1.elb.amazonaws.com."] },
          { name: "mail.example.com.", type: "A", values: ["192.0.2.10"] },
        ],
      },
    }),
  ]);
}

describe("deriveServiceLinks", () => {
  it("links load balancers to targets and zones to load balancers", () => {
    expect(deriveServiceLinks(makeLinkCatalog())).toEqual<ServiceLink[]>([
      { kind: "dns-alias", sourceId: ZONE, destId: LB, port: 53, protocol: "tcp" },
      { kind: "lb-target", sourceId: LB, destId: APP, port: 8080, protocol: "http", health: "unhealthy" },
      { kind: "lb-target", sourceId: LB, destId: WEB, port: 80, protocol: "http", health: "healthy" },
    ]);
  });

  it("returns nothing for a catalog without load balancers", () => {
    expect(deriveServiceLinks(makeCatalog([makeResource("web")]))).toEqual([]);
  });
});

describe("shapeServiceLinks", () => {
  const catalog = makeLinkCatalog();
  const links = deriveServiceLinks(catalog);

  it("keeps everything under the defaults", () => {
    expect(shapeServiceLinks(catalog, links, DEFAULT_POLICY)).toEqual({ links, hiddenResources: [] });
  });

  it("drops unhealthy targets", () => {
    const shaped = shapeServiceLinks(catalog, links, { lbDisplay: "all", filterUnhealthy: true });
    expect(shaped.links.map((l) => l.destId)).toEqual([LB, WEB]);
  });

  it("hides load balancers without links in connected-only mode", () => {
    const shaped = shapeServiceLinks(catalog, links, { lbDisplay: "connected-only", filterUnhealthy: false });
    expect(shaped.hiddenResources).toEqual([IDLE_LB]);
  });

  it("hides every load balancer in none mode", () => {
    expect(shapeServiceLinks(catalog, links, { lbDisplay: "none", filterUnhealthy: false })).toEqual({
      links: [],
      hiddenResources: [IDLE_LB, LB],
    });
  });
});
