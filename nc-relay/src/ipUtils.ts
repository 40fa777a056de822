import ipaddr from "ipaddr.js";

export function stripIpv6ZoneIndex(address: string): string {
  const idx = address.indexOf("%");
  if (idx === -1) return address;
  return address.slice(0, idx);
}

export function isIpv6Literal(host: string): boolean {
  return ipaddr.IPv6.isValid(stripIpv6ZoneIndex(host));
}

export function joinHostPort(host: string, port: number | string): string {
  if (isIpv6Literal(host)) return `[${host}]:${port}`;
  return `${host}:${port}`;
}

// Renders a peer address the way it is printed, folding IPv4-mapped IPv6 addresses
// (`::ffff:127.0.0.1` from a dual-stack socket) back to dotted IPv4.
export function formatPeerAddress(address: string | undefined, port: number | undefined): string {
  if (!address) return "unknown";
  let host = address;
  const bare = stripIpv6ZoneIndex(address);
  if (ipaddr.IPv6.isValid(bare)) {
    const parsed = ipaddr.IPv6.parse(bare);
    if (parsed.isIPv4MappedAddress()) host = parsed.toIPv4Address().toString();
  }
  return port === undefined ? host : joinHostPort(host, port);
}
