const ICMP_PROTOCOLS = new Set(["icmp", "1", "icmpv6", "58"]);
const PORTED_PROTOCOLS = new Set(["tcp", "6", "udp", "17"]);

export const ALL_PROTOCOLS = "-1";

export function normalizeProtocol(protocol: string): string {
  const value = protocol.trim().toLowerCase();
  return value === "all" ? ALL_PROTOCOLS : value;
}

export function isIcmpProtocol(protocol: string): boolean {
  return ICMP_PROTOCOLS.has(normalizeProtocol(protocol));
}

/** TCP and UDP entries match on a port range. */
export function isPortedProtocol(protocol: string): boolean {
  return PORTED_PROTOCOLS.has(normalizeProtocol(protocol));
}
