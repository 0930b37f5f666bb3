/**
 * URL normalization and validation for scan targets and discovered links
 */

export type NormalizeResult =
  | { ok: true; url: string }
  | { ok: false; reason: string; input: string };

const NON_NAVIGABLE_SCHEMES = ['mailto:', 'tel:', 'javascript:', 'data:', 'blob:'];

/**
 * Normalize and validate the scan target
 *
 * Rules:
 * - Surrounding whitespace is trimmed
 * - Only http: and https: are accepted
 * - Fragment is dropped, query string is kept
 */
export function normalizeTargetUrl(input: string): NormalizeResult {
  const trimmed = input.trim();
  if (trimmed === '') {
    return { ok: false, reason: 'URL is empty', input };
  }

  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    return { ok: false, reason: 'URL could not be parsed', input };
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return { ok: false, reason: `Unsupported protocol: ${url.protocol}`, input };
  }

  url.hash = '';
  return { ok: true, url: url.toString() };
}

/**
 * Resolve an href against the page it appeared on.
 * Returns null for non-navigable schemes and unparseable values.
 */
export function resolveLink(href: string, baseUrl: string): string | null {
  const trimmed = href.trim();
  if (!trimmed) return null;

  const lower = trimmed.toLowerCase();
  if (NON_NAVIGABLE_SCHEMES.some((scheme) => lower.startsWith(scheme))) {
    return null;
  }

  try {
    const url = new URL(trimmed, baseUrl);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') return null;
    url.hash = '';
    return url.toString();
  } catch {
    return null;
  }
}

/**
 * Key under which a URL is tracked as visited
 */
export function visitKey(url: string): string {
  return url.split('#')[0];
}

/**
 * True when both URLs share host and port (the crawl never leaves a host)
 */
export function isSameHost(a: string, b: string): boolean {
  try {
    return new URL(a).host === new URL(b).host;
  } catch {
    return false;
  }
}
