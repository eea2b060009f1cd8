import { BlockList, isIP } from 'node:net';

const BLOCKED_IPV4_SUBNETS = [
  { subnet: '0.0.0.0', prefix: 8 }, // "this network", includes unspecified
  { subnet: '10.0.0.0', prefix: 8 },
  { subnet: '127.0.0.0', prefix: 8 },
  { subnet: '169.254.0.0', prefix: 16 },
  { subnet: '172.16.0.0', prefix: 12 },
  { subnet: '192.168.0.0', prefix: 16 },
  { subnet: '224.0.0.0', prefix: 24 }, // link-local multicast
] as const;

const BLOCKED_IPV6_SUBNETS = [
  { subnet: '::', prefix: 128 },
  { subnet: '::1', prefix: 128 },
  { subnet: 'fc00::', prefix: 7 },
  { subnet: 'fe80::', prefix: 10 },
  { subnet: 'ff02::', prefix: 16 }, // link-local multicast
] as const;

const BLOCK_LIST = new BlockList();

for (const entry of BLOCKED_IPV4_SUBNETS) {
  BLOCK_LIST.addSubnet(entry.subnet, entry.prefix, 'ipv4');
}
for (const entry of BLOCKED_IPV6_SUBNETS) {
  BLOCK_LIST.addSubnet(entry.subnet, entry.prefix, 'ipv6');
}

const MAPPED_DOTTED = /^::ffff:(\d{1,3}(?:\.\d{1,3}){3})$/;
const MAPPED_HEX = /^::ffff:([0-9a-f]{1,4}):([0-9a-f]{1,4})$/;

/**
 * Returns the embedded IPv4 address of an IPv4-mapped IPv6 literal
 * (`::ffff:127.0.0.1` or `::ffff:7f00:1`), or null.
 */
export function unwrapMappedIpv4(ip: string): string | null {
  const dotted = MAPPED_DOTTED.exec(ip);
  if (dotted?.[1] && isIP(dotted[1]) === 4) return dotted[1];

  const hex = MAPPED_HEX.exec(ip);
  if (!hex?.[1] || !hex[2]) return null;
  const high = Number.parseInt(hex[1], 16);
  const low = Number.parseInt(hex[2], 16);
  return [high >> 8, high & 0xff, low >> 8, low & 0xff].join('.');
}

function stripZoneId(ip: string): string {
  const zoneIndex = ip.indexOf('%');
  return zoneIndex >= 0 ? ip.slice(0, zoneIndex) : ip;
}

/**
 * True for loopback, private (RFC1918 / ULA), link-local unicast and
 * multicast, and unspecified addresses. Anything that is not an IP literal
 * returns false.
 */
export function isForbiddenIp(candidate: string): boolean {
  const ip = stripZoneId(candidate.trim().toLowerCase()).replace(
    /^\[|\]$/g,
    ''
  );
  const family = isIP(ip);
  if (family === 4) return BLOCK_LIST.check(ip, 'ipv4');
  if (family !== 6) return false;

  const mapped = unwrapMappedIpv4(ip);
  if (mapped !== null) return BLOCK_LIST.check(mapped, 'ipv4');
  return BLOCK_LIST.check(ip, 'ipv6');
}

export type IpPolicy = (ip: string) => boolean;
