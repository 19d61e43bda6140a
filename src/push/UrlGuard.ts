import { lookup } from 'node:dns/promises';
import { isIP } from 'node:net';

/** Resolve a hostname to every address it maps to. */
export type HostResolver = (hostname: string) => Promise<string[]>;

export const dnsResolver: HostResolver = async (hostname) => {
  const addresses = await lookup(hostname, { all: true, verbatim: true });
  return addresses.map((entry) => entry.address);
};

export type UrlCheck = { ok: true; url: URL } | { ok: false; reason: string };

const BLOCKED_NAMES = new Set(['localhost', 'localhost.localdomain', 'ip6-localhost', 'ip6-loopback']);
const BLOCKED_SUFFIXES = ['.localhost', '.local', '.internal', '.home.arpa'];

/** [network, prefix length] pairs of IPv4 ranges that must never be called. */
const BLOCKED_V4: ReadonlyArray<readonly [string, number]> = [
  ['0.0.0.0', 8],
  ['10.0.0.0', 8],
  ['100.64.0.0', 10],
  ['127.0.0.0', 8],
  ['169.254.0.0', 16],
  ['172.16.0.0', 12],
  ['192.0.0.0', 24],
  ['192.0.2.0', 24],
  ['192.168.0.0', 16],
  ['198.18.0.0', 15],
  ['198.51.100.0', 24],
  ['203.0.113.0', 24],
  ['224.0.0.0', 4],
  ['240.0.0.0', 4],
];

function ipv4ToInt(ip: string): number {
  return ip.split('.').reduce((acc, octet) => acc * 256 + Number(octet), 0);
}

const BLOCKED_V4_RANGES = BLOCKED_V4.map(([network, bits]) => {
  const size = 2 ** (32 - bits);
  const start = ipv4ToInt(network);
  return { start, end: start + size - 1 };
});

function isBlockedV4(ip: string): boolean {
  const value = ipv4ToInt(ip);
  return BLOCKED_V4_RANGES.some((range) => value >= range.start && value <= range.end);
}

/** Expand an IPv6 address into eight 16-bit groups. */
function ipv6Groups(ip: string): number[] {
  let address = ip.toLowerCase();
  const zone = address.indexOf('%');
  if (zone !== -1) address = address.slice(0, zone);

  // Trailing dotted quad (e.g. ::ffff:10.0.0.1) becomes two groups.
  const lastColon = address.lastIndexOf(':');
  const tail = address.slice(lastColon + 1);
  if (tail.includes('.')) {
    const v4 = ipv4ToInt(tail);
    address = `${address.slice(0, lastColon + 1)}${(v4 >>> 16).toString(16)}:${(v4 & 0xffff).toString(16)}`;
  }

  const [head, rest] = address.split('::');
  const headGroups = head ? head.split(':') : [];
  const restGroups = rest !== undefined && rest !== '' ? rest.split(':') : [];
  const missing = 8 - headGroups.length - restGroups.length;
  const groups = rest === undefined ? headGroups : [...headGroups, ...Array<string>(missing).fill('0'), ...restGroups];
  return groups.map((group) => parseInt(group, 16));
}

function embeddedV4(groups: number[]): string {
  const high = groups[6] ?? 0;
  const low = groups[7] ?? 0;
  return [high >> 8, high & 0xff, low >> 8, low & 0xff].join('.');
}

function isBlockedV6(ip: string): boolean {
  const groups = ipv6Groups(ip);
  const first = groups[0] ?? 0;
  const allZeroPrefix = (count: number) => groups.slice(0, count).every((g) => g === 0);

  if (groups.every((g) => g === 0)) return true; // ::
  if (allZeroPrefix(7) && groups[7] === 1) return true; // ::1
  if (allZeroPrefix(5) && groups[5] === 0xffff) return isBlockedV4(embeddedV4(groups)); // ::ffff:0:0/96
  if (allZeroPrefix(6)) return isBlockedV4(embeddedV4(groups)); // ::a.b.c.d (deprecated compat)
  if (first === 0x64 && groups[1] === 0xff9b && groups.slice(2, 6).every((g) => g === 0)) {
    return isBlockedV4(embeddedV4(groups)); // 64:ff9b::/96 NAT64
  }
  if ((first & 0xfe00) === 0xfc00) return true; // fc00::/7 unique local
  if ((first & 0xffc0) === 0xfe80) return true; // fe80::/10 link local
  if ((first & 0xffc0) === 0xfec0) return true; // fec0::/10 site local
  if ((first & 0xff00) === 0xff00) return true; // ff00::/8 multicast
  if (first === 0x2001 && groups[1] === 0x0db8) return true; // documentation
  return false;
}

/** Whether an IP literal lies in a loopback, private, link-local or reserved range. */
export function isBlockedAddress(ip: string): boolean {
  const family = isIP(ip);
  if (family === 4) return isBlockedV4(ip);
  if (family === 6) return isBlockedV6(ip);
  return true;
}

/** Hostname without IPv6 brackets. */
function bareHost(url: URL): string {
  const host = url.hostname.toLowerCase();
  return host.startsWith('[') && host.endsWith(']') ? host.slice(1, -1) : host;
}

/**
 * Static webhook URL check: scheme, credentials, and literal addresses or
 * well-known local names. Hostnames are resolved later by `checkResolvedUrl`.
 */
export function checkWebhookUrl(raw: string): UrlCheck {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    return { ok: false, reason: 'URL is not valid' };
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return { ok: false, reason: `Scheme ${url.protocol} is not allowed` };
  }
  if (url.username !== '' || url.password !== '') {
    return { ok: false, reason: 'URL must not embed credentials' };
  }

  const host = bareHost(url).replace(/\.+$/, '');
  if (BLOCKED_NAMES.has(host) || BLOCKED_SUFFIXES.some((suffix) => host.endsWith(suffix))) {
    return { ok: false, reason: `Host ${host} is a local name` };
  }
  if (isIP(host) !== 0 && isBlockedAddress(host)) {
    return { ok: false, reason: `Address ${host} is in a blocked range` };
  }
  return { ok: true, url };
}

/** Static check, then every resolved address must be public. */
export async function checkResolvedUrl(raw: string, resolve: HostResolver): Promise<UrlCheck> {
  const check = checkWebhookUrl(raw);
  if (!check.ok) return check;

  const host = bareHost(check.url);
  if (isIP(host) !== 0) return check;

  let addresses: string[];
  try {
    addresses = await resolve(host);
  } catch (err) {
    return { ok: false, reason: `Host ${host} did not resolve: ${err instanceof Error ? err.message : String(err)}` };
  }
  if (addresses.length === 0) {
    return { ok: false, reason: `Host ${host} did not resolve` };
  }
  const blocked = addresses.find((address) => isBlockedAddress(address));
  if (blocked !== undefined) {
    return { ok: false, reason: `Host ${host} resolves to blocked address ${blocked}` };
  }
  return check;
}
