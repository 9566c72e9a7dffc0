/**
 * Duplicate Detector
 * Crawl-session duplicate detection over request fingerprints and a Bloom filter
 */

import { env } from '../../config/env';
import { BloomFilter } from './bloom-filter';
import { configurationError, isDedupError } from './crawling.errors';
import {
  CrawlRequest,
  DuplicateCheckResult,
  DuplicateDetectorConfig,
  DuplicateDetectorStats,
  InvalidRequestPolicy,
} from './crawling.types';
import { fingerprintHex, fingerprintRequest } from './fingerprint';

const INVALID_POLICIES: readonly InvalidRequestPolicy[] = ['process', 'skip', 'throw'];

export function parseInvalidRequestPolicy(value: string): InvalidRequestPolicy {
  const policy = INVALID_POLICIES.find((candidate) => candidate === value);
  if (!policy) {
    throw configurationError(`Unknown invalid-request policy "${value}"`, { value });
  }
  return policy;
}

export class DuplicateDetector {
  private readonly filter: BloomFilter;
  private readonly onInvalid: InvalidRequestPolicy;
  private readonly relevantHeaders: string[];

  private checkedCount: number = 0;
  private uniqueCount: number = 0;
  private duplicatesCount: number = 0;
  private invalidCount: number = 0;

  /**
   * @throws DedupError (CONFIGURATION_ERROR) for invalid sizing or policy
   */
  constructor(config: Partial<DuplicateDetectorConfig> = {}) {
    this.onInvalid = config.onInvalid ?? parseInvalidRequestPolicy(env.DEDUP_ON_INVALID);
    this.relevantHeaders = config.relevantHeaders ?? [];
    this.filter =
      config.filter ??
      new BloomFilter(
        config.expectedItems ?? env.DEDUP_EXPECTED_ITEMS,
        config.falsePositiveRate ?? env.DEDUP_FALSE_POSITIVE_RATE
      );
  }

  /**
   * Fingerprint a request and mark it seen.
   * A plain string is treated as a GET of that URL.
   */
  check(request: CrawlRequest | string): DuplicateCheckResult {
    const crawlRequest = toCrawlRequest(request);
    this.checkedCount++;

    let key: Buffer;
    try {
      key = fingerprintRequest(crawlRequest, { relevantHeaders: this.relevantHeaders });
    } catch (error) {
      if (!isDedupError(error)) {
        throw error;
      }
      this.invalidCount++;
      if (this.onInvalid === 'throw') {
        throw error;
      }
      console.warn(
        `[DuplicateDetector] Cannot fingerprint ${String(crawlRequest.url)}: ${error.message} (policy: ${this.onInvalid})`
      );
      return {
        decision: 'invalid',
        shouldProcess: this.onInvalid === 'process',
        error,
      };
    }

    const seen = this.filter.checkAndMark(key);
    if (seen) {
      this.duplicatesCount++;
    } else {
      this.uniqueCount++;
    }

    return {
      decision: seen ? 'duplicate' : 'new',
      shouldProcess: !seen,
      fingerprint: fingerprintHex(key),
    };
  }

  /**
   * Mark the request seen and return true if it was a duplicate
   */
  isDuplicate(request: CrawlRequest | string): boolean {
    return this.check(request).decision === 'duplicate';
  }

  /**
   * Check if a request has (probably) been seen, without marking it
   * @throws DedupError (INVALID_URL, INVALID_REQUEST) for a request that cannot be
   * fingerprinted, whatever the onInvalid policy
   */
  hasSeen(request: CrawlRequest | string): boolean {
    const key = fingerprintRequest(toCrawlRequest(request), { relevantHeaders: this.relevantHeaders });
    return this.filter.contains(key);
  }

  /**
   * Get the hex fingerprint a request maps to
   * @throws DedupError (INVALID_URL, INVALID_REQUEST) whatever the onInvalid policy
   */
  getFingerprint(request: CrawlRequest | string): string {
    return fingerprintHex(fingerprintRequest(toCrawlRequest(request), { relevantHeaders: this.relevantHeaders }));
  }

  getFilter(): BloomFilter {
    return this.filter;
  }

  getStats(): DuplicateDetectorStats {
    return {
      checked: this.checkedCount,
      unique: this.uniqueCount,
      duplicates: this.duplicatesCount,
      invalid: this.invalidCount,
      setBits: this.filter.setBitCount(),
      estimatedFalsePositiveRate: this.filter.estimatedFalsePositiveRate(),
    };
  }
}

function toCrawlRequest(request: CrawlRequest | string): CrawlRequest {
  return typeof request === 'string' ? { url: request } : request;
}
