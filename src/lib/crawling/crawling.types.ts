/**
 * Crawling Types
 * Type definitions for request fingerprinting and duplicate detection
 */

import type { BloomFilter } from './bloom-filter';
import type { DedupError } from './crawling.errors';

/**
 * URL after origin normalization
 */
export interface NormalizedOrigin {
  /**
   * Lower-cased scheme without the trailing colon
   */
  scheme: string;

  /**
   * Lower-cased host
   */
  host: string;

  /**
   * Explicit port, absent when it is the scheme default
   */
  port?: number;

  /**
   * scheme://host[:port]
   */
  origin: string;

  /**
   * Path with an empty path collapsed to "/" and one trailing slash removed
   */
  path: string;

  /**
   * Raw query string without the leading "?", untouched
   */
  query: string;

  /**
   * origin + path (+ "?" + query)
   */
  href: string;
}

/**
 * JSON-compatible value, used for JSON request bodies
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Request body variants a crawler can send
 */
export type RequestBody =
  | string
  | Uint8Array
  | { type: 'json'; value: JsonValue }
  | { type: 'form'; fields: Record<string, string> | Array<[string, string]> }
  | { type: 'bytes'; data: Uint8Array };

/**
 * The slice of a crawler request the fingerprint pipeline reads
 */
export interface CrawlRequest {
  url: string | URL;

  /**
   * Defaults to GET
   */
  method?: string;

  body?: RequestBody;

  headers?: Record<string, string | string[] | undefined>;
}

/**
 * Intermediate representation hashed into a fingerprint
 */
export interface CanonicalRequestKey {
  readonly method: string;
  readonly origin: string;
  readonly path: string;
  readonly query: string;
  readonly contentDigest?: string;
  readonly headerDigest?: string;
}

/**
 * 16-byte request fingerprint
 */
export type Fingerprint = Buffer;

export interface FingerprintOptions {
  /**
   * Hex digest of whatever extra request state should distinguish requests,
   * typically from digestHeaders()
   */
  headerDigest?: string;

  /**
   * Header names to fold into the fingerprint when fingerprinting a CrawlRequest
   */
  relevantHeaders?: string[];
}

/**
 * How the detector treats a request it cannot fingerprint
 */
export type InvalidRequestPolicy = 'process' | 'skip' | 'throw';

export interface DuplicateDetectorConfig {
  /**
   * Number of distinct requests the crawl is expected to see
   */
  expectedItems: number;

  /**
   * Target false positive rate at expectedItems (0-1, exclusive)
   */
  falsePositiveRate: number;

  onInvalid: InvalidRequestPolicy;

  /**
   * Headers that contribute to the fingerprint (none by default)
   */
  relevantHeaders: string[];

  /**
   * Use an existing filter instead of building one from expectedItems/falsePositiveRate
   */
  filter?: BloomFilter;
}

export type DuplicateDecision = 'new' | 'duplicate' | 'invalid';

export interface DuplicateCheckResult {
  decision: DuplicateDecision;

  /**
   * Whether the crawler should go ahead with the request
   */
  shouldProcess: boolean;

  /**
   * Hex fingerprint, absent for invalid requests
   */
  fingerprint?: string;

  error?: DedupError;
}

export interface DuplicateDetectorStats {
  checked: number;
  unique: number;
  duplicates: number;
  invalid: number;
  setBits: number;
  estimatedFalsePositiveRate: number;
}
