/*
Game Sage - URL/domain utilities
GPL-2.0-only
*/

const MULTI_PART_SUFFIXES = new Set([
  "co.uk",
  "ac.uk",
  "gov.uk",
  "org.uk",
  "co.jp",
  "com.au",
  "net.au",
  "org.au",
  "com.br",
  "co.nz",
]);

/**
 * Registered domain of a host name: the last two labels, or three for the
 * common multi-part suffixes above. Used to key per-site rate limits, so
 * `en.wikipedia.org` and `de.wikipedia.org` share a budget.
 */
export function getRegisteredDomain(hostname: string): string {
  const lowered = hostname.toLowerCase();
  const parts = lowered.split(".");
  if (parts.length <= 2) return lowered;
  const lastThree = parts.slice(-3).join(".");
  if (MULTI_PART_SUFFIXES.has(parts.slice(-2).join("."))) {
    return lastThree;
  }
  return parts.slice(-2).join(".");
}

export function parseHttpUrl(input: string): URL | null {
  let parsed: URL;
  try {
    parsed = new URL(input.trim());
  } catch {
    return null;
  }
  return parsed.protocol === "http:" || parsed.protocol === "https:" ? parsed : null;
}

export function rateLimitKeyFor(url: string): string {
  const parsed = parseHttpUrl(url);
  return parsed ? getRegisteredDomain(parsed.hostname) : "unknown";
}
