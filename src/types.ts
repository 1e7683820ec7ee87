/**
 * VPC Atlas — Core Type Definitions
 *
 * Resource, rule set and connection model shared by the catalog, the
 * topology engine, discovery and the renderers.
 */

// =============================================================================
// Resources
// =============================================================================

/** Resource kinds the catalog understands. */
export type ResourceKind =
  | "network"
  | "subnet"
  | "instance"
  | "load_balancer"
  | "database"
  | "zone"
  | "certificate";

export const RESOURCE_KINDS: readonly ResourceKind[] = [
  "network",
  "subnet",
  "instance",
  "load_balancer",
  "database",
  "zone",
  "certificate",
];

/** Load balancer target group as reported by discovery. */
export type TargetGroupInfo = {
  name: string;
  port: number | null;
  protocol: string | null;
  targets: Array<{ id: string; port: number | null; health: string }>;
};

/** DNS record as reported by discovery (A / AAAA / CNAME only). */
export type DnsRecordInfo = {
  name: string;
  type: string;
  values: string[];
};

/**
 * Kind-specific descriptive values. Used for labels and service links,
 * never for connection inference.
 */
export type ResourceAttributes = {
  cidrBlock?: string;
  instanceType?: string;
  engine?: string;
  engineVersion?: string;
  endpoint?: string;
  port?: number;
  dnsName?: string;
  lbType?: string;
  scheme?: string;
  availabilityZone?: string;
  domainName?: string;
  status?: string;
  privateZone?: boolean;
  targetGroups?: TargetGroupInfo[];
  records?: DnsRecordInfo[];
};

/** A normalized discovered resource. */
export type Resource = {
  /** Provider-assigned id, unique within region + kind. */
  id: string;
  kind: ResourceKind;
  region: string;
  /** Owning virtual network; null when the resource is not network-scoped. */
  networkId: string | null;
  subnetId?: string;
  /** Display name (Name tag, falling back to the id). */
  name: string;
  tags: Record<string, string>;
  /** IPv4/IPv6 addresses bound to the resource. */
  addresses: string[];
  /** Attached rule set ids (same region). */
  ruleSetIds: string[];
  /** Explicitly reachable from the internet. */
  internetFacing: boolean;
  attributes: ResourceAttributes;
};

// =============================================================================
// Rule Sets
// =============================================================================

export type PermissionDirection = "ingress" | "egress";

/** A permission counterparty: an address range or another rule set. */
export type PeerRef =
  | { type: "cidr"; cidr: string }
  | { type: "ruleset"; ruleSetId: string; region?: string };

/** One firewall rule. */
export type Permission = {
  protocol: string;
  portFrom: number;
  portTo: number;
  peers: PeerRef[];
};

/** A named collection of permissions attachable to many resources. */
export type RuleSet = {
  id: string;
  region: string;
  networkId: string | null;
  name: string;
  ingress: Permission[];
  egress: Permission[];
};

// =============================================================================
// Edges & Connections
// =============================================================================

/** One endpoint pair produced by a single permission peer (pre-dedup). */
export type ResolvedEdge = {
  /** Resource key of the sender. */
  sourceId: string;
  /** Resource key of the receiver. */
  destId: string;
  protocol: string;
  portFrom: number;
  portTo: number;
  direction: PermissionDirection;
  originRuleSetId: string;
};

/** A deduplicated, directed logical flow between two resources. */
export type Connection = {
  sourceId: string;
  destId: string;
  protocol: string;
  portFrom: number;
  portTo: number;
  /** Rule set ids that justified this connection (sorted, unique). */
  provenance: string[];
  /** Permission directions that produced this connection (sorted, unique). */
  directions: PermissionDirection[];
};

// =============================================================================
// Tiers & Topology
// =============================================================================

export type Tier = "presentation" | "application" | "restricted" | "unclassified";

export const TIERS: readonly Tier[] = ["presentation", "application", "restricted", "unclassified"];

export type TopologyNodeKind = "account" | "region" | "network" | "tier" | "ungrouped";

/** Recursive container: account → region → network → tier. */
export type TopologyNode = {
  key: string;
  label: string;
  kind: TopologyNodeKind;
  /** Tier of a tier node. */
  tier?: Tier;
  children: TopologyNode[];
  resources: Resource[];
};

/** The hierarchy plus the flat, hierarchy-agnostic edge list. */
export type Topology = {
  root: TopologyNode;
  connections: Connection[];
};

// =============================================================================
// Service Links
// =============================================================================

export type ServiceLinkKind = "lb-target" | "dns-alias";

/** A non-firewall link derived from load balancer targets or DNS records. */
export type ServiceLink = {
  kind: ServiceLinkKind;
  sourceId: string;
  destId: string;
  port: number | null;
  protocol: string;
  /** Target health for lb-target links. */
  health?: string;
};
