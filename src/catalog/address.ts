/**
 * VPC Atlas — Address Matching
 *
 * CIDR parsing and address-to-range containment for rule resolution.
 */

import { IPv4, IPv4CidrRange } from "ip-num";

/** Result of parsing a permission's CIDR peer. */
export type ParsedCidr =
  | { kind: "ipv4"; cidr: string; range: IPv4CidrRange }
  /** Prefix length 0: the whole internet, never matched against resources. */
  | { kind: "internet"; cidr: string }
  | { kind: "unsupported"; cidr: string; reason: string };

/**
 * Parse a CIDR literal.
 */
export function parseCidr(cidr: string): ParsedCidr {
  const trimmed = cidr.trim();
  const slash = trimmed.lastIndexOf("/");
  const prefix = slash >= 0 ? trimmed.slice(slash + 1) : "";

  if (prefix === "0") return { kind: "internet", cidr: trimmed };
  if (trimmed.includes(":")) {
    return { kind: "unsupported", cidr: trimmed, reason: "IPv6 ranges are not matched" };
  }
  if (slash < 0) {
    return { kind: "unsupported", cidr: trimmed, reason: "missing prefix length" };
  }

  try {
    return { kind: "ipv4", cidr: trimmed, range: IPv4CidrRange.fromCidr(trimmed) };
  } catch (err) {
    return {
      kind: "unsupported",
      cidr: trimmed,
      reason: err instanceof Error ? err.message : "invalid CIDR",
    };
  }
}

/**
 * Parse an IPv4 address, or null for IPv6 and malformed input.
 */
export function parseIpv4(address: string): IPv4 | null {
  if (address.includes(":")) return null;
  try {
    return IPv4.fromString(address.trim());
  } catch {
    return null;
  }
}

/**
 * Whether the address lies inside the range (bounds inclusive).
 */
export function rangeContains(range: IPv4CidrRange, address: IPv4): boolean {
  return (
    range.getFirst().isLessThanOrEquals(address) &&
    range.getLast().isGreaterThanOrEquals(address)
  );
}

/**
 * Whether any of the addresses lies inside the range.
 */
export function anyAddressInRange(range: IPv4CidrRange, addresses: readonly IPv4[]): boolean {
  return addresses.some((address) => rangeContains(range, address));
}
