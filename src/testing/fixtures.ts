/**
 * VPC Atlas — Test Fixtures
 */

import { Catalog } from "../catalog/catalog.js";
import type { PeerRef, Permission, Resource, RuleSet } from "../types.js";

export function makeResource(id: string, overrides?: Partial<Resource>): Resource {
  return {
    id,
    kind: "instance",
    region: "us-east-1",
    networkId: "vpc-1",
    name: id,
    tags: {},
    addresses: [],
    ruleSetIds: [],
    internetFacing: false,
    attributes: {},
    ...overrides,
  };
}

export function makeSubnet(id: string, overrides?: Partial<Resource>): Resource {
  return makeResource(id, { kind: "subnet", ...overrides });
}

export function makeNetwork(id: string, overrides?: Partial<Resource>): Resource {
  return makeResource(id, { kind: "network", networkId: id, ...overrides });
}

export function makeRuleSet(id: string, overrides?: Partial<RuleSet>): RuleSet {
  return {
    id,
    region: "us-east-1",
    networkId: "vpc-1",
    name: id,
    ingress: [],
    egress: [],
    ...overrides,
  };
}

export function cidr(value: string): PeerRef {
  return { type: "cidr", cidr: value };
}

export function ref(ruleSetId: string, region?: string): PeerRef {
  return region ? { type: "ruleset", ruleSetId, region } : { type: "ruleset", ruleSetId };
}

export function tcp(port: number, peers: PeerRef[], portTo = port): Permission {
  return { protocol: "tcp", portFrom: port, portTo, peers };
}

export function makeCatalog(resources: Resource[], ruleSets: RuleSet[] = [], accountId = "123456789012"): Catalog {
  return new Catalog({ accountId, resources, ruleSets });
}

/**
 * Two-tier catalog: a public web instance reachable from anywhere and a
 * database in a data subnet that only accepts the web tier.
 */
export function makeWebDbCatalog(): Catalog {
  return makeCatalog(
    [
      makeNetwork("vpc-1", { name: "main", attributes: { cidrBlock: "10.0.0.0/16" } }),
      makeSubnet("public-1", { attributes: { cidrBlock: "10.0.1.0/24" } }),
      makeSubnet("data-1", { attributes: { cidrBlock: "10.0.3.0/24" } }),
      makeResource("web", {
        subnetId: "public-1",
        name: "public-web",
        tags: { Name: "public-web" },
        addresses: ["10.0.1.10"],
        ruleSetIds: ["sg-web"],
      }),
      makeResource("db", {
        kind: "database",
        subnetId: "data-1",
        name: "data-db",
        ruleSetIds: ["sg-db"],
        attributes: { engine: "postgres" },
      }),
    ],
    [
      makeRuleSet("sg-web", { ingress: [tcp(443, [cidr("0.0.0.0/0")])] }),
      makeRuleSet("sg-db", { ingress: [tcp(5432, [ref("sg-web")])] }),
    ],
  );
}

export const WEB = "us-east-1:instance:web";
export const DB = "us-east-1:database:db";
