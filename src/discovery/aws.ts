/**
 * VPC Atlas — AWS Region Discoverer
 *
 * Read-only discovery of one AWS region through the SDK v3 clients:
 *   - VPCs, subnets, running instances and security groups (EC2)
 *   - load balancers, target groups and target health (ELBv2)
 *   - DB instances (RDS)
 *   - certificates (ACM)
 *   - hosted zones and their A / AAAA / CNAME records (Route 53, global,
 *     attached to one region only)
 */

import {
  DescribeInstancesCommand,
  DescribeSecurityGroupsCommand,
  DescribeSubnetsCommand,
  DescribeVpcsCommand,
  EC2Client,
  type Instance,
  type IpPermission,
  type SecurityGroup,
  type Subnet,
  type Tag,
  type Vpc,
} from "@aws-sdk/client-ec2";
import {
  DescribeLoadBalancersCommand,
  DescribeTargetGroupsCommand,
  DescribeTargetHealthCommand,
  ElasticLoadBalancingV2Client,
  type LoadBalancer,
} from "@aws-sdk/client-elastic-load-balancing-v2";
import { DescribeDBInstancesCommand, RDSClient, type DBInstance } from "@aws-sdk/client-rds";
import {
  ListHostedZonesCommand,
  ListResourceRecordSetsCommand,
  Route53Client,
  type HostedZone,
  type ResourceRecordSet,
  type RRType,
} from "@aws-sdk/client-route-53";
import { ACMClient, ListCertificatesCommand, type CertificateSummary } from "@aws-sdk/client-acm";
import { GetCallerIdentityCommand, STSClient } from "@aws-sdk/client-sts";
import { fromIni } from "@aws-sdk/credential-providers";

import type { CatalogSlice } from "../catalog/catalog.js";
import type { Logger } from "../logging/logger.js";
import { createSilentLogger } from "../logging/logger.js";
import type {
  DnsRecordInfo,
  PeerRef,
  Permission,
  Resource,
  RuleSet,
  TargetGroupInfo,
} from "../types.js";
import type { AWSRetryRunner, RetryConfig } from "./retry.js";
import { createAWSRetryRunner } from "./retry.js";
import type { RegionDiscoverer } from "./types.js";

// =============================================================================
// Clients
// =============================================================================

export type AwsServiceClients = {
  ec2: EC2Client;
  elbv2: ElasticLoadBalancingV2Client;
  rds: RDSClient;
  route53: Route53Client;
  acm: ACMClient;
  sts: STSClient;
};

/** Creates the SDK clients of one region. Replaced in tests. */
export type AwsClientFactory = (region: string) => AwsServiceClients;

export function createDefaultClientFactory(profile?: string): AwsClientFactory {
  return (region) => {
    const config = { region, ...(profile ? { credentials: fromIni({ profile }) } : {}) };
    return {
      ec2: new EC2Client(config),
      elbv2: new ElasticLoadBalancingV2Client(config),
      rds: new RDSClient(config),
      route53: new Route53Client(config),
      acm: new ACMClient(config),
      sts: new STSClient(config),
    };
  };
}

export type AwsDiscovererOptions = {
  profile?: string;
  clientFactory?: AwsClientFactory;
  /** Region that also receives the global (Route 53) resources. */
  globalRegion?: string;
  retry?: RetryConfig;
  /** Replaced in tests. */
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
};

// =============================================================================
// Normalization
// =============================================================================

const PROTOCOL_NAMES: Record<string, string> = {
  "-1": "all",
  "6": "tcp",
  "17": "udp",
  "1": "icmp",
};

/** Normalize an IpProtocol value: numbers and -1 map to names. */
export function normalizeProtocol(protocol: string | undefined): string {
  if (!protocol) return "all";
  const lower = protocol.toLowerCase();
  return PROTOCOL_NAMES[lower] ?? lower;
}

export function tagsToRecord(tags: readonly Tag[] | undefined): Record<string, string> {
  const record: Record<string, string> = {};
  for (const tag of tags ?? []) {
    if (tag.Key) record[tag.Key] = tag.Value ?? "";
  }
  return record;
}

function nameFrom(tags: Record<string, string>, fallback: string): string {
  return tags["Name"] || fallback;
}

/** First value in sorted order, so placement does not depend on API order. */
function firstSorted(values: Array<string | undefined>): string | undefined {
  return values.filter((v): v is string => Boolean(v)).sort()[0];
}

/**
 * Map one IpPermission. Missing or negative ports become the full range.
 */
export function mapPermission(permission: IpPermission): Permission {
  const protocol = normalizeProtocol(permission.IpProtocol);
  const fullRange = protocol === "all";
  const from = permission.FromPort;
  const to = permission.ToPort;

  const peers: PeerRef[] = [
    ...(permission.IpRanges ?? []).flatMap((r) => (r.CidrIp ? [{ type: "cidr" as const, cidr: r.CidrIp }] : [])),
    ...(permission.Ipv6Ranges ?? []).flatMap((r) =>
      r.CidrIpv6 ? [{ type: "cidr" as const, cidr: r.CidrIpv6 }] : [],
    ),
    ...(permission.UserIdGroupPairs ?? []).flatMap((p) =>
      p.GroupId ? [{ type: "ruleset" as const, ruleSetId: p.GroupId }] : [],
    ),
  ];

  return {
    protocol,
    portFrom: fullRange || from === undefined || from < 0 ? 0 : from,
    portTo: fullRange || to === undefined || to < 0 ? 65535 : to,
    peers,
  };
}

export function mapSecurityGroup(group: SecurityGroup, region: string): RuleSet | null {
  if (!group.GroupId) return null;
  return {
    id: group.GroupId,
    region,
    networkId: group.VpcId ?? null,
    name: group.GroupName ?? group.GroupId,
    ingress: (group.IpPermissions ?? []).map(mapPermission),
    egress: (group.IpPermissionsEgress ?? []).map(mapPermission),
  };
}

export function mapVpc(vpc: Vpc, region: string): Resource | null {
  if (!vpc.VpcId) return null;
  const tags = tagsToRecord(vpc.Tags);
  return {
    id: vpc.VpcId,
    kind: "network",
    region,
    networkId: vpc.VpcId,
    name: nameFrom(tags, vpc.VpcId),
    tags,
    addresses: [],
    ruleSetIds: [],
    internetFacing: false,
    attributes: { cidrBlock: vpc.CidrBlock },
  };
}

export function mapSubnet(subnet: Subnet, region: string): Resource | null {
  if (!subnet.SubnetId) return null;
  const tags = tagsToRecord(subnet.Tags);
  return {
    id: subnet.SubnetId,
    kind: "subnet",
    region,
    networkId: subnet.VpcId ?? null,
    name: nameFrom(tags, subnet.SubnetId),
    tags,
    addresses: [],
    ruleSetIds: [],
    internetFacing: false,
    attributes: { cidrBlock: subnet.CidrBlock, availabilityZone: subnet.AvailabilityZone },
  };
}

export function mapInstance(instance: Instance, region: string): Resource | null {
  if (!instance.InstanceId) return null;
  const tags = tagsToRecord(instance.Tags);
  const addresses = [instance.PrivateIpAddress, instance.PublicIpAddress].filter(
    (a): a is string => Boolean(a),
  );
  return {
    id: instance.InstanceId,
    kind: "instance",
    region,
    networkId: instance.VpcId ?? null,
    subnetId: instance.SubnetId,
    name: nameFrom(tags, instance.InstanceId),
    tags,
    addresses,
    ruleSetIds: (instance.SecurityGroups ?? []).flatMap((g) => (g.GroupId ? [g.GroupId] : [])),
    internetFacing: Boolean(instance.PublicIpAddress),
    attributes: {
      instanceType: instance.InstanceType,
      availabilityZone: instance.Placement?.AvailabilityZone,
      status: instance.State?.Name,
    },
  };
}

export function mapLoadBalancer(
  lb: LoadBalancer,
  region: string,
  targetGroups: TargetGroupInfo[],
): Resource | null {
  if (!lb.LoadBalancerName) return null;
  return {
    id: lb.LoadBalancerName,
    kind: "load_balancer",
    region,
    networkId: lb.VpcId ?? null,
    subnetId: firstSorted((lb.AvailabilityZones ?? []).map((az) => az.SubnetId)),
    name: lb.LoadBalancerName,
    tags: {},
    addresses: [],
    ruleSetIds: lb.SecurityGroups ?? [],
    internetFacing: lb.Scheme === "internet-facing",
    attributes: {
      dnsName: lb.DNSName,
      lbType: lb.Type,
      scheme: lb.Scheme,
      targetGroups,
    },
  };
}

export function mapDbInstance(db: DBInstance, region: string): Resource | null {
  if (!db.DBInstanceIdentifier) return null;
  return {
    id: db.DBInstanceIdentifier,
    kind: "database",
    region,
    networkId: db.DBSubnetGroup?.VpcId ?? null,
    subnetId: firstSorted((db.DBSubnetGroup?.Subnets ?? []).map((s) => s.SubnetIdentifier)),
    name: db.DBInstanceIdentifier,
    tags: tagsToRecord(db.TagList),
    addresses: [],
    ruleSetIds: (db.VpcSecurityGroups ?? []).flatMap((g) => (g.VpcSecurityGroupId ? [g.VpcSecurityGroupId] : [])),
    internetFacing: db.PubliclyAccessible ?? false,
    attributes: {
      engine: db.Engine,
      engineVersion: db.EngineVersion,
      endpoint: db.Endpoint?.Address,
      port: db.Endpoint?.Port,
      status: db.DBInstanceStatus,
    },
  };
}

export function mapCertificate(cert: CertificateSummary, region: string): Resource | null {
  if (!cert.CertificateArn) return null;
  const id = cert.CertificateArn.split("/").pop() ?? cert.CertificateArn;
  return {
    id,
    kind: "certificate",
    region,
    networkId: null,
    name: cert.DomainName ?? id,
    tags: {},
    addresses: [],
    ruleSetIds: [],
    internetFacing: false,
    attributes: { domainName: cert.DomainName, status: cert.Status },
  };
}

const DNS_RECORD_TYPES = new Set(["A", "AAAA", "CNAME"]);

export function mapRecord(record: ResourceRecordSet): DnsRecordInfo | null {
  if (!record.Name || !record.Type || !DNS_RECORD_TYPES.has(record.Type)) return null;
  const values = record.AliasTarget?.DNSName
    ? [record.AliasTarget.DNSName]
    : (record.ResourceRecords ?? []).flatMap((r) => (r.Value ? [r.Value] : []));
  return { name: record.Name, type: record.Type, values };
}

export function mapHostedZone(zone: HostedZone, region: string, records: DnsRecordInfo[]): Resource | null {
  if (!zone.Id) return null;
  const id = zone.Id.replace(/^\/hostedzone\//, "");
  return {
    id,
    kind: "zone",
    region,
    networkId: null,
    name: zone.Name ?? id,
    tags: {},
    addresses: [],
    ruleSetIds: [],
    internetFacing: false,
    attributes: {
      domainName: zone.Name,
      privateZone: zone.Config?.PrivateZone ?? false,
      records,
    },
  };
}

function compact<T>(values: Array<T | null>): T[] {
  return values.filter((v): v is T => v !== null);
}

// =============================================================================
// Discoverer
// =============================================================================

export class AwsRegionDiscoverer implements RegionDiscoverer {
  private readonly clientFactory: AwsClientFactory;
  private readonly retry: AWSRetryRunner;
  private readonly logger: Logger;
  private readonly globalRegion?: string;
  private accountId: Promise<string> | null = null;

  constructor(options: AwsDiscovererOptions = {}) {
    this.clientFactory = options.clientFactory ?? createDefaultClientFactory(options.profile);
    this.logger = options.logger ?? createSilentLogger();
    this.globalRegion = options.globalRegion;
    this.retry = createAWSRetryRunner({ retry: options.retry, logger: this.logger, sleep: options.sleep });
  }

  async discoverRegion(region: string): Promise<CatalogSlice> {
    const clients = this.clientFactory(region);
    const log = this.logger.withContext({ region });

    try {
      const accountId = await this.resolveAccountId(clients.sts);

      const [vpcs, subnets, instances, securityGroups, loadBalancers, databases, certificates] =
        await Promise.all([
          this.listVpcs(clients.ec2),
          this.listSubnets(clients.ec2),
          this.listInstances(clients.ec2),
          this.listSecurityGroups(clients.ec2),
          this.listLoadBalancers(clients.elbv2, region),
          this.listDbInstances(clients.rds),
          this.listCertificates(clients.acm),
        ]);

      const zones = region === this.globalRegion ? await this.listHostedZones(clients.route53, region) : [];

      const resources: Resource[] = [
        ...compact(vpcs.map((v) => mapVpc(v, region))),
        ...compact(subnets.map((s) => mapSubnet(s, region))),
        ...compact(instances.map((i) => mapInstance(i, region))),
        ...loadBalancers,
        ...compact(databases.map((d) => mapDbInstance(d, region))),
        ...compact(certificates.map((c) => mapCertificate(c, region))),
        ...zones,
      ];
      const ruleSets = compact(securityGroups.map((g) => mapSecurityGroup(g, region)));

      log.debug("Mapped region resources", { resources: resources.length, ruleSets: ruleSets.length });
      return { region, accountId, resources, ruleSets };
    } finally {
      for (const client of Object.values(clients)) client.destroy();
    }
  }

  private resolveAccountId(sts: STSClient): Promise<string> {
    if (!this.accountId) {
      const pending = this.retry(() => sts.send(new GetCallerIdentityCommand({})), "GetCallerIdentity").then(
        (identity) => identity.Account ?? "unknown",
      );
      this.accountId = pending;
      pending.catch(() => {
        // Let the next region try again.
        if (this.accountId === pending) this.accountId = null;
      });
    }
    return this.accountId;
  }

  // ---------------------------------------------------------------------------
  // EC2
  // ---------------------------------------------------------------------------

  private async listVpcs(ec2: EC2Client): Promise<Vpc[]> {
    const vpcs: Vpc[] = [];
    let nextToken: string | undefined;
    do {
      const command = new DescribeVpcsCommand({ NextToken: nextToken });
      const response = await this.retry(() => ec2.send(command), "DescribeVpcs");
      vpcs.push(...(response.Vpcs ?? []));
      nextToken = response.NextToken;
    } while (nextToken);
    return vpcs;
  }

  private async listSubnets(ec2: EC2Client): Promise<Subnet[]> {
    const subnets: Subnet[] = [];
    let nextToken: string | undefined;
    do {
      const command = new DescribeSubnetsCommand({ NextToken: nextToken });
      const response = await this.retry(() => ec2.send(command), "DescribeSubnets");
      subnets.push(...(response.Subnets ?? []));
      nextToken = response.NextToken;
    } while (nextToken);
    return subnets;
  }

  private async listInstances(ec2: EC2Client): Promise<Instance[]> {
    const instances: Instance[] = [];
    let nextToken: string | undefined;
    do {
      const command = new DescribeInstancesCommand({
        Filters: [{ Name: "instance-state-name", Values: ["running"] }],
        NextToken: nextToken,
      });
      const response = await this.retry(() => ec2.send(command), "DescribeInstances");
      for (const reservation of response.Reservations ?? []) {
        instances.push(...(reservation.Instances ?? []));
      }
      nextToken = response.NextToken;
    } while (nextToken);
    return instances;
  }

  private async listSecurityGroups(ec2: EC2Client): Promise<SecurityGroup[]> {
    const groups: SecurityGroup[] = [];
    let nextToken: string | undefined;
    do {
      const command = new DescribeSecurityGroupsCommand({ NextToken: nextToken });
      const response = await this.retry(() => ec2.send(command), "DescribeSecurityGroups");
      groups.push(...(response.SecurityGroups ?? []));
      nextToken = response.NextToken;
    } while (nextToken);
    return groups;
  }

  // ---------------------------------------------------------------------------
  // ELBv2
  // ---------------------------------------------------------------------------

  private async listLoadBalancers(elbv2: ElasticLoadBalancingV2Client, region: string): Promise<Resource[]> {
    const loadBalancers: LoadBalancer[] = [];
    let marker: string | undefined;
    do {
      const command = new DescribeLoadBalancersCommand({ Marker: marker });
      const response = await this.retry(() => elbv2.send(command), "DescribeLoadBalancers");
      loadBalancers.push(...(response.LoadBalancers ?? []));
      marker = response.NextMarker;
    } while (marker);

    const resources: Resource[] = [];
    for (const lb of loadBalancers) {
      const targetGroups = lb.LoadBalancerArn ? await this.listTargetGroups(elbv2, lb.LoadBalancerArn) : [];
      const resource = mapLoadBalancer(lb, region, targetGroups);
      if (resource) resources.push(resource);
    }
    return resources;
  }

  private async listTargetGroups(
    elbv2: ElasticLoadBalancingV2Client,
    loadBalancerArn: string,
  ): Promise<TargetGroupInfo[]> {
    const groups: TargetGroupInfo[] = [];
    let marker: string | undefined;
    do {
      const command = new DescribeTargetGroupsCommand({ LoadBalancerArn: loadBalancerArn, Marker: marker });
      const response = await this.retry(() => elbv2.send(command), "DescribeTargetGroups");

      for (const group of response.TargetGroups ?? []) {
        if (!group.TargetGroupArn) continue;
        const arn = group.TargetGroupArn;
        const health = await this.retry(
          () => elbv2.send(new DescribeTargetHealthCommand({ TargetGroupArn: arn })),
          "DescribeTargetHealth",
        );
        groups.push({
          name: group.TargetGroupName ?? arn,
          port: group.Port ?? null,
          protocol: group.Protocol ?? null,
          targets: (health.TargetHealthDescriptions ?? []).flatMap((d) =>
            d.Target?.Id
              ? [{ id: d.Target.Id, port: d.Target.Port ?? null, health: d.TargetHealth?.State ?? "unknown" }]
              : [],
          ),
        });
      }
      marker = response.NextMarker;
    } while (marker);
    return groups;
  }

  // ---------------------------------------------------------------------------
  // RDS & ACM
  // ---------------------------------------------------------------------------

  private async listDbInstances(rds: RDSClient): Promise<DBInstance[]> {
    const databases: DBInstance[] = [];
    let marker: string | undefined;
    do {
      const command = new DescribeDBInstancesCommand({ Marker: marker });
      const response = await this.retry(() => rds.send(command), "DescribeDBInstances");
      databases.push(...(response.DBInstances ?? []));
      marker = response.Marker;
    } while (marker);
    return databases;
  }

  private async listCertificates(acm: ACMClient): Promise<CertificateSummary[]> {
    const certificates: CertificateSummary[] = [];
    let nextToken: string | undefined;
    do {
      const command = new ListCertificatesCommand({ NextToken: nextToken });
      const response = await this.retry(() => acm.send(command), "ListCertificates");
      certificates.push(...(response.CertificateSummaryList ?? []));
      nextToken = response.NextToken;
    } while (nextToken);
    return certificates;
  }

  // ---------------------------------------------------------------------------
  // Route 53
  // ---------------------------------------------------------------------------

  private async listHostedZones(route53: Route53Client, region: string): Promise<Resource[]> {
    const zones: HostedZone[] = [];
    let marker: string | undefined;
    do {
      const command = new ListHostedZonesCommand({ Marker: marker });
      const response = await this.retry(() => route53.send(command), "ListHostedZones");
      zones.push(...(response.HostedZones ?? []));
      marker = response.IsTruncated ? response.NextMarker : undefined;
    } while (marker);

    const resources: Resource[] = [];
    for (const zone of zones) {
      const records = zone.Id ? await this.listRecords(route53, zone.Id) : [];
      const resource = mapHostedZone(zone, region, records);
      if (resource) resources.push(resource);
    }
    return resources;
  }

  private async listRecords(route53: Route53Client, zoneId: string): Promise<DnsRecordInfo[]> {
    const records: DnsRecordInfo[] = [];
    let start: { name?: string; type?: RRType; identifier?: string } | undefined = {};
    while (start) {
      const command: ListResourceRecordSetsCommand = new ListResourceRecordSetsCommand({
        HostedZoneId: zoneId,
        StartRecordName: start.name,
        StartRecordType: start.type,
        StartRecordIdentifier: start.identifier,
      });
      const response = await this.retry(() => route53.send(command), "ListResourceRecordSets");
      records.push(...compact((response.ResourceRecordSets ?? []).map(mapRecord)));
      start = response.IsTruncated
        ? {
            name: response.NextRecordName,
            type: response.NextRecordType,
            identifier: response.NextRecordIdentifier,
          }
        : undefined;
    }
    return records;
  }
}
