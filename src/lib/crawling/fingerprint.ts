/**
 * Request Fingerprinting
 * Deterministic 128-bit keys for canonicalized crawl requests
 */

import { createHash } from 'crypto';
import {
  CanonicalRequestKey,
  CrawlRequest,
  Fingerprint,
  FingerprintOptions,
  JsonValue,
  RequestBody,
} from './crawling.types';
import { invalidRequest } from './crawling.errors';
import { normalizeOrigin, normalizePath, normalizeQuery } from './url-normalizer';

export const FINGERPRINT_BYTES = 16;

// Cannot appear in a parsed URL or in an HTTP method token
const FIELD_SEPARATOR = '\u001f';

const METHOD_TOKEN = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;

/**
 * Build the canonical key for a request.
 *
 * @throws DedupError (INVALID_REQUEST) for an empty or malformed method
 * @throws DedupError (INVALID_URL) when the URL does not normalize
 */
export function canonicalRequestKey(
  method: string,
  url: string | URL,
  body?: RequestBody,
  options: FingerprintOptions = {}
): CanonicalRequestKey {
  const trimmedMethod = method.trim();
  if (!trimmedMethod) {
    throw invalidRequest('Request method is empty');
  }
  if (!METHOD_TOKEN.test(trimmedMethod)) {
    throw invalidRequest(`Invalid request method "${method}"`, { method });
  }

  const normalized = normalizeOrigin(url);

  const key: CanonicalRequestKey = {
    method: trimmedMethod.toUpperCase(),
    origin: normalized.origin,
    path: normalizePath(normalized.path),
    query: normalizeQuery(normalized.query),
    contentDigest: body === undefined ? undefined : digestBody(body),
    headerDigest: options.headerDigest,
  };

  return Object.freeze(key);
}

/**
 * Serialize a canonical key to the exact string that gets hashed
 */
export function encodeCanonicalKey(key: CanonicalRequestKey): string {
  const fields = [key.method, key.origin, key.path, key.query];
  if (key.contentDigest !== undefined) {
    fields.push(`body:${key.contentDigest}`);
  }
  if (key.headerDigest !== undefined) {
    fields.push(`headers:${key.headerDigest}`);
  }
  return fields.join(FIELD_SEPARATOR);
}

/**
 * Compute the fingerprint of a request.
 * Identical logical input gives identical bytes in every process.
 */
export function fingerprint(
  method: string,
  url: string | URL,
  body?: RequestBody,
  options: FingerprintOptions = {}
): Fingerprint {
  const key = canonicalRequestKey(method, url, body, options);
  return createHash('sha256')
    .update(encodeCanonicalKey(key), 'utf8')
    .digest()
    .subarray(0, FINGERPRINT_BYTES);
}

/**
 * Fingerprint a crawler request, defaulting the method to GET.
 * Only headers named in options.relevantHeaders contribute.
 */
export function fingerprintRequest(request: CrawlRequest, options: FingerprintOptions = {}): Fingerprint {
  let headerDigest = options.headerDigest;
  if (headerDigest === undefined && request.headers && options.relevantHeaders?.length) {
    headerDigest = digestHeaders(request.headers, options.relevantHeaders);
  }

  return fingerprint(request.method ?? 'GET', request.url, request.body, { headerDigest });
}

export function fingerprintHex(value: Fingerprint): string {
  return value.toString('hex');
}

/**
 * Hex SHA-256 of the selected headers (names compared case-insensitively).
 * Values of names that differ only in case are joined into one header, in
 * record order. Returns undefined when none of the named headers is present.
 */
export function digestHeaders(
  headers: Record<string, string | string[] | undefined>,
  names: string[]
): string | undefined {
  const wanted = new Set(names.map((name) => name.toLowerCase()));

  const merged = new Map<string, string[]>();
  for (const [name, value] of Object.entries(headers)) {
    const lowerName = name.toLowerCase();
    if (!wanted.has(lowerName) || value === undefined) {
      continue;
    }
    const values = merged.get(lowerName) ?? [];
    values.push(...(Array.isArray(value) ? value : [value]).map((item) => item.trim()));
    merged.set(lowerName, values);
  }

  if (merged.size === 0) {
    return undefined;
  }

  const lines = Array.from(merged, ([name, values]) => `${name}:${values.join(', ')}`);
  lines.sort();
  return createHash('sha256').update(lines.join('\n'), 'utf8').digest('hex');
}

/**
 * Hex SHA-256 of the request body as it would go over the wire.
 * JSON object keys and form fields are sorted first.
 */
export function digestBody(body: RequestBody): string {
  return createHash('sha256').update(encodeBody(body)).digest('hex');
}

function encodeBody(body: RequestBody): string | Uint8Array {
  if (typeof body === 'string' || body instanceof Uint8Array) {
    return body;
  }

  switch (body.type) {
    case 'json':
      return stableStringify(body.value);
    case 'form': {
      const entries = Array.isArray(body.fields) ? [...body.fields] : Object.entries(body.fields);
      entries.sort(([keyA, valueA], [keyB, valueB]) => {
        if (keyA !== keyB) return keyA < keyB ? -1 : 1;
        if (valueA !== valueB) return valueA < valueB ? -1 : 1;
        return 0;
      });
      return new URLSearchParams(entries).toString();
    }
    case 'bytes':
      return body.data;
  }
}

/**
 * JSON.stringify with object keys sorted at every level
 */
export function stableStringify(value: JsonValue): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const keys = Object.keys(value).sort();
    const members = keys.map((key) => `${JSON.stringify(key)}:${stableStringify(value[key])}`);
    return `{${members.join(',')}}`;
  }
  return JSON.stringify(value);
}
