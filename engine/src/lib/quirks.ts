import { matchesDomain } from "./credentials.js";

export interface QuirkRequest {
  url: string;
  headers: Record<string, string>;
}

interface Quirk {
  name: string;
  matches: (url: URL) => boolean;
  rewrite: (request: QuirkRequest, url: URL) => QuirkRequest;
}

/**
 * Sites that answer automated checks misleadingly unless asked in a
 * particular way.
 */
const QUIRKS: Quirk[] = [
  {
    // The watch page is 200 even for unknown ids; the thumbnail is not.
    name: "youtube",
    matches: (url) =>
      matchesDomain(url.hostname, "youtube.com") &&
      url.pathname === "/watch" &&
      url.searchParams.has("v"),
    rewrite: (request, url) => ({
      ...request,
      url: `https://img.youtube.com/vi/${encodeURIComponent(url.searchParams.get("v") ?? "")}/0.jpg`,
    }),
  },
  {
    // crates.io answers 404 to clients that do not ask for HTML.
    name: "crates",
    matches: (url) => matchesDomain(url.hostname, "crates.io"),
    rewrite: (request) => ({
      ...request,
      headers: { ...request.headers, Accept: "text/html" },
    }),
  },
];

export function applyQuirks(request: QuirkRequest): QuirkRequest {
  let url: URL;
  try {
    url = new URL(request.url);
  } catch {
    return request;
  }

  const quirk = QUIRKS.find((q) => q.matches(url));
  return quirk ? quirk.rewrite(request, url) : request;
}
