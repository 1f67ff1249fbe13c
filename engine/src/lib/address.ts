import { isIPv4, isIPv6 } from "node:net";

export type HostClass = "loopback" | "private" | "link_local" | "public";

/**
 * Classify a URL host by its literal form. Names other than `localhost` are
 * public: nothing here resolves DNS.
 */
export function classifyHost(hostname: string): HostClass {
  const host = hostname.toLowerCase().replace(/^\[(.*)\]$/, "$1");

  if (host === "localhost" || host.endsWith(".localhost")) return "loopback";
  if (isIPv4(host)) return classifyIPv4(host);
  if (isIPv6(host)) return classifyIPv6(host);
  return "public";
}

/** Which host classes are off limits. */
export interface HostPolicy {
  excludeLoopback: boolean;
  excludePrivateIps: boolean;
  excludeLinkLocal: boolean;
}

/** The host's class when the policy excludes it, otherwise undefined. */
export function excludedHostClass(
  hostname: string,
  policy: HostPolicy
): HostClass | undefined {
  const hostClass = classifyHost(hostname);
  const excluded =
    (hostClass === "loopback" && policy.excludeLoopback) ||
    (hostClass === "private" && policy.excludePrivateIps) ||
    (hostClass === "link_local" && policy.excludeLinkLocal);
  return excluded ? hostClass : undefined;
}

function classifyIPv4(ip: string): HostClass {
  const [a, b] = ip.split(".").map(Number);

  if (a === 127 || ip === "0.0.0.0") return "loopback";
  if (a === 10) return "private";
  if (a === 172 && b >= 16 && b <= 31) return "private";
  if (a === 192 && b === 168) return "private";
  if (a === 169 && b === 254) return "link_local";
  return "public";
}

function classifyIPv6(ip: string): HostClass {
  if (ip === "::1" || ip === "::") return "loopback";

  // IPv4-mapped, as the URL parser prints it: ::ffff:7f00:1
  const mapped = ip.match(/^::ffff:([0-9a-f]{1,4}):([0-9a-f]{1,4})$/);
  if (mapped) {
    const high = parseInt(mapped[1], 16);
    const low = parseInt(mapped[2], 16);
    return classifyIPv4(
      [high >> 8, high & 0xff, low >> 8, low & 0xff].join(".")
    );
  }
  const dotted = ip.match(/^::ffff:(\d+\.\d+\.\d+\.\d+)$/);
  if (dotted) return classifyIPv4(dotted[1]);

  const first = parseInt(ip.split(":")[0] || "0", 16);
  if ((first & 0xfe00) === 0xfc00) return "private";
  if ((first & 0xffc0) === 0xfe80) return "link_local";
  return "public";
}
