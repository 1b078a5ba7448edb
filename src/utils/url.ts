/**
 * URL helpers shared by the scope gate and the fetcher
 */

/**
 * Drop the fragment; returns null when the URL does not parse
 */
export function normalizeUrl(url: string): string | null {
  if (!URL.canParse(url)) {
    return null;
  }
  const parsed = new URL(url);
  parsed.hash = '';
  return parsed.href;
}

export function hostOf(url: string): string | null {
  return URL.canParse(url) ? new URL(url).hostname.toLowerCase() : null;
}

/**
 * Exact, case-insensitive host match. Subdomains must be listed explicitly.
 */
export function isAllowedHost(url: string, allowedDomains: readonly string[]): boolean {
  const host = hostOf(url);
  if (!host) {
    return false;
  }
  return allowedDomains.some((domain) => domain.toLowerCase() === host);
}
