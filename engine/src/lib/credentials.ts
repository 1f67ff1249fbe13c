import type { HostCredential } from "./types.js";

/** Hosts that receive the GitHub token. */
export const GITHUB_HOSTS = [
  "github.com",
  "api.github.com",
  "raw.githubusercontent.com",
  "gist.github.com",
];

export function matchesDomain(hostname: string, domain: string): boolean {
  const host = hostname.toLowerCase();
  const d = domain.toLowerCase();
  return host === d || host.endsWith("." + d);
}

/**
 * Build the host → Authorization table. Explicit entries come first so they
 * win over the GitHub token for the same host.
 */
export function buildCredentialTable(
  githubToken: string | undefined,
  explicit: readonly HostCredential[]
): HostCredential[] {
  const table = explicit.map((c) => ({ host: c.host.toLowerCase(), authorization: c.authorization }));

  if (githubToken) {
    for (const host of GITHUB_HOSTS) {
      table.push({ host, authorization: `Bearer ${githubToken}` });
    }
  }

  return table;
}

/**
 * Authorization value for `hostname`. An exact host entry beats a parent
 * domain entry.
 */
export function credentialFor(
  hostname: string,
  table: readonly HostCredential[]
): string | undefined {
  const host = hostname.toLowerCase();
  const exact = table.find((c) => c.host === host);
  if (exact) return exact.authorization;
  return table.find((c) => matchesDomain(host, c.host))?.authorization;
}
