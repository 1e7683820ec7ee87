/**
 * VPC Atlas — Edge and Node Labels
 *
 * Text shared by the Mermaid and DOT emitters. Labels depend only on the
 * connection and the render hint, never on the output format.
 */

import type { DetailLevel, LbDetailLevel } from "../config/schema.js";
import type { Connection, Resource, ServiceLink } from "../types.js";

/** Service names shown at the "protocols" detail level. */
export const WELL_KNOWN_PORTS: Readonly<Record<number, string>> = {
  22: "ssh",
  25: "smtp",
  53: "dns",
  80: "http",
  443: "https",
  1433: "mssql",
  2049: "nfs",
  3306: "mysql",
  3389: "rdp",
  5432: "postgres",
  6379: "redis",
  8080: "http-alt",
  9200: "elasticsearch",
  11211: "memcached",
  27017: "mongodb",
};

/** "443", "8000-8100", or "all" for the full range. */
export function formatPortRange(portFrom: number, portTo: number): string {
  if (portFrom === 0 && portTo === 65535) return "all";
  return portFrom === portTo ? String(portFrom) : `${portFrom}-${portTo}`;
}

export function formatConnectionLabel(connection: Connection, detail: DetailLevel): string {
  if (detail === "minimal") return "";
  const { protocol, portFrom, portTo } = connection;
  if (protocol === "all") return detail === "full" ? withProvenance("all", connection) : "all";

  const ports = formatPortRange(portFrom, portTo);
  switch (detail) {
    case "ports":
      return ports;
    case "protocols": {
      const service = portFrom === portTo ? WELL_KNOWN_PORTS[portFrom] : undefined;
      return `${service ?? ports}/${protocol}`;
    }
    case "full":
      return withProvenance(`${ports}/${protocol}`, connection);
  }
}

/** Appends the rule sets behind the connection: `5432/tcp (sg-app, sg-db)`. */
function withProvenance(label: string, connection: Connection): string {
  return `${label} (${connection.provenance.join(", ")})`;
}

export function formatLinkLabel(link: ServiceLink, detail: LbDetailLevel): string {
  if (detail === "minimal") return "";
  if (link.kind === "dns-alias") return `${link.port ?? 53}/${link.protocol}`;

  const port = link.port === null ? "" : String(link.port);
  if (detail === "ports") return port;

  const base = port ? `${port}/${link.protocol}` : link.protocol;
  return link.health ? `${base} (${link.health})` : base;
}

const LB_TYPE_PREFIX: Record<string, string> = {
  application: "ALB",
  network: "NLB",
  gateway: "GWLB",
};

/**
 * Node title lines by resource kind. The first line names the service.
 */
export function resourceLabelLines(resource: Resource): string[] {
  const a = resource.attributes;
  switch (resource.kind) {
    case "instance": {
      const ip = resource.addresses[0];
      return ip ? [`EC2: ${resource.name}`, ip] : [`EC2: ${resource.name}`];
    }
    case "load_balancer":
      return [`${LB_TYPE_PREFIX[a.lbType ?? ""] ?? "ELB"}: ${resource.name}`];
    case "database":
      return [`RDS: ${resource.name}`, ...(a.engine ? [a.engine] : []), ...(a.endpoint ? [a.endpoint] : [])];
    case "zone":
      return [`Route53: ${resource.name}`];
    case "certificate":
      return [`ACM: ${resource.name}`];
    case "network":
      return [`VPC: ${resource.name}`];
    case "subnet":
      return [`Subnet: ${resource.name}`];
  }
}

/** Networks and subnets are drawn as containers, not nodes. */
export function isDrawnAsNode(resource: Resource): boolean {
  return resource.kind !== "network" && resource.kind !== "subnet";
}
