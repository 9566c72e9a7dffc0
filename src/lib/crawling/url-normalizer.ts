/**
 * URL Normalization Utilities
 * Canonical origin/path/query forms used for comparison and fingerprinting
 */

import { NormalizedOrigin } from './crawling.types';
import { invalidUrl } from './crawling.errors';

const DEFAULT_PORTS: Record<string, number> = {
  http: 80,
  https: 443,
};

/**
 * Parse a URL (optionally relative to baseUrl) and canonicalize its
 * scheme, host, port and path. The query string is left untouched.
 *
 * @throws DedupError (INVALID_URL) when the input cannot be parsed or has no scheme/host
 */
export function normalizeOrigin(url: string | URL, baseUrl?: string | URL): NormalizedOrigin {
  const raw = typeof url === 'string' ? url : url.href;

  let urlObj: URL;
  try {
    urlObj = baseUrl !== undefined ? new URL(raw, baseUrl) : new URL(raw);
  } catch {
    throw invalidUrl(raw, 'cannot be parsed');
  }

  const scheme = urlObj.protocol.replace(/:$/, '').toLowerCase();
  const host = urlObj.hostname.toLowerCase();

  if (!scheme) {
    throw invalidUrl(raw, 'missing scheme');
  }
  if (!host) {
    throw invalidUrl(raw, 'missing host');
  }

  let port: number | undefined;
  if (urlObj.port !== '') {
    const parsedPort = parseInt(urlObj.port, 10);
    if (DEFAULT_PORTS[scheme] !== parsedPort) {
      port = parsedPort;
    }
  }

  const origin = port === undefined ? `${scheme}://${host}` : `${scheme}://${host}:${port}`;

  // Remove a single trailing slash (except for root)
  let path = urlObj.pathname || '/';
  if (path.length > 1 && path.endsWith('/')) {
    path = path.slice(0, -1);
  }

  const query = urlObj.search.replace(/^\?/, '');

  return {
    scheme,
    host,
    port,
    origin,
    path,
    query,
    href: query ? `${origin}${path}?${query}` : `${origin}${path}`,
  };
}

/**
 * Resolve "." and ".." segments and ensure a leading slash.
 * ".." never climbs above the root. A single trailing slash beyond the root is
 * removed, as in normalizeOrigin, so "/a/b/." and "/a/b/" both become "/a/b".
 */
export function normalizePath(path: string): string {
  const segments: string[] = [];
  const parts = path.split('/');

  for (let i = 0; i < parts.length; i++) {
    const part = parts[i];

    if (part === '..') {
      segments.pop();
      continue;
    }
    if (part === '.') {
      continue;
    }

    // Leading empty segment comes from the leading slash
    if (i === 0 && part === '') {
      continue;
    }

    segments.push(part);
  }

  const normalized = `/${segments.join('/')}`;
  return normalized.length > 1 && normalized.endsWith('/') ? normalized.slice(0, -1) : normalized;
}

/**
 * Sort query parameters by key, then value, so parameter order does not matter.
 * Empty pairs ("a=1&&b=2") are dropped; each pair keeps its original encoding.
 */
export function normalizeQuery(query: string): string {
  const stripped = query.startsWith('?') ? query.slice(1) : query;

  const pairs = stripped
    .split('&')
    .filter((pair) => pair.length > 0)
    .map((pair) => {
      const eq = pair.indexOf('=');
      return {
        raw: pair,
        key: eq === -1 ? pair : pair.slice(0, eq),
        value: eq === -1 ? '' : pair.slice(eq + 1),
      };
    });

  pairs.sort((a, b) => compareStrings(a.key, b.key) || compareStrings(a.value, b.value));

  return pairs.map((pair) => pair.raw).join('&');
}

/**
 * Full canonical form: normalized origin, dot-free path and sorted query
 */
export function normalizeUrl(url: string | URL, baseUrl?: string | URL): string {
  const normalized = normalizeOrigin(url, baseUrl);
  const path = normalizePath(normalized.path);
  const query = normalizeQuery(normalized.query);
  return query ? `${normalized.origin}${path}?${query}` : `${normalized.origin}${path}`;
}

/**
 * Check if two URLs share scheme, host and port after normalization
 */
export function isSameOrigin(url1: string | URL, url2: string | URL): boolean {
  try {
    return normalizeOrigin(url1).origin === normalizeOrigin(url2).origin;
  } catch {
    return false;
  }
}

/**
 * Validate that a URL normalizes without error
 */
export function isValidUrl(url: string | URL): boolean {
  try {
    normalizeOrigin(url);
    return true;
  } catch {
    return false;
  }
}

// Code-unit order, independent of the process locale
function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
