/**
 * URL normalization and selection of follow-up pages to investigate.
 *
 * @module
 */

/** Pages most likely to confirm or refute a site's claims, in priority order. */
export const PRIORITY_PATHS: readonly string[] = [
  '/about',
  '/contact',
  '/terms',
  '/privacy',
  '/refund',
  '/returns',
  '/shipping',
  '/pricing',
  '/checkout',
  '/cart',
  '/team',
  '/legal',
  '/imprint',
  '/faq',
];

/**
 * Lowercase host, no fragment, no trailing slash except for the root.
 * Returns null for anything that is not an http(s) URL.
 */
export function normalizeUrl(raw: string, base?: string): string | null {
  let url: URL;
  try {
    url = new URL(raw, base);
  } catch {
    return null;
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') return null;
  url.hash = '';
  if (url.pathname.length > 1 && url.pathname.endsWith('/')) {
    url.pathname = url.pathname.replace(/\/+$/, '');
  }
  return url.toString();
}

function priorityRank(pathname: string, priorityPaths: readonly string[]): number {
  const path = pathname.toLowerCase();
  return priorityPaths.findIndex((prefix) => path === prefix || path.startsWith(`${prefix}/`) || path.startsWith(`${prefix}-`));
}

/**
 * Same-host links matching a priority path that have not been investigated,
 * best first, at most `limit`.
 */
export function selectPriorityPages(
  siteUrl: string,
  links: readonly string[],
  investigated: readonly string[],
  limit: number,
  priorityPaths: readonly string[] = PRIORITY_PATHS,
): string[] {
  const site = normalizeUrl(siteUrl);
  if (site === null || limit <= 0) return [];
  const host = new URL(site).host;
  const seen = new Set(investigated);
  const ranked: Array<{ url: string; rank: number }> = [];

  for (const link of links) {
    const normalized = normalizeUrl(link, site);
    if (normalized === null || seen.has(normalized)) continue;
    const parsed = new URL(normalized);
    if (parsed.host !== host) continue;
    const rank = priorityRank(parsed.pathname, priorityPaths);
    if (rank === -1) continue;
    seen.add(normalized);
    ranked.push({ url: normalized, rank });
  }

  return ranked
    .sort((a, b) => a.rank - b.rank)
    .slice(0, limit)
    .map((entry) => entry.url);
}
