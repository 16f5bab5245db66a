/**
 * Source classification: denylist, trusted publishers, priority ordering
 */

/**
 * Parse an http(s) URL; null for anything else
 */
export function parseHttpUrl(raw: string): URL | null {
  let url: URL;
  try {
    url = new URL(raw.trim());
  } catch {
    return null;
  }
  return url.protocol === "http:" || url.protocol === "https:" ? url : null;
}

/**
 * Match a `host[/path]` entry: hostname contains the host part and the
 * pathname starts with the path part, when there is one
 */
export function matchesDomainEntry(url: URL, entry: string): boolean {
  const normalized = entry.trim().toLowerCase();
  if (!normalized) return false;

  const slash = normalized.indexOf("/");
  const host = slash >= 0 ? normalized.slice(0, slash) : normalized;
  const pathPrefix = slash >= 0 ? normalized.slice(slash) : "";

  if (!host || !url.hostname.toLowerCase().includes(host)) {
    return false;
  }

  return !pathPrefix || url.pathname.toLowerCase().startsWith(pathPrefix);
}

export function isTrustedSource(source: string, trustedDomains: readonly string[]): boolean {
  const url = parseHttpUrl(source);
  if (!url) return false;
  return trustedDomains.some((entry) => matchesDomainEntry(url, entry));
}

export function isExcludedUrl(url: URL, excludedDomains: readonly string[]): boolean {
  const hostname = url.hostname.toLowerCase();
  return excludedDomains.some((domain) => hostname.includes(domain.toLowerCase()));
}

export interface PrioritizeOptions {
  trustedDomains: readonly string[];
  excludedDomains: readonly string[];
  maxSources: number;
}

/**
 * Drop denylisted and non-http entries, put trusted URLs first (each group in
 * discovery order), dedupe by first occurrence, cap
 */
export function prioritizeUrls(urls: readonly string[], options: PrioritizeOptions): string[] {
  const trusted: string[] = [];
  const other: string[] = [];

  for (const raw of urls) {
    const candidate = raw.trim();
    const url = parseHttpUrl(candidate);
    if (!url || isExcludedUrl(url, options.excludedDomains)) continue;

    if (options.trustedDomains.some((entry) => matchesDomainEntry(url, entry))) {
      trusted.push(candidate);
    } else {
      other.push(candidate);
    }
  }

  const unique = Array.from(new Set([...trusted, ...other]));
  return unique.slice(0, Math.max(0, options.maxSources));
}
