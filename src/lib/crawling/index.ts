/**
 * Crawl Dedup
 * Main export file for request fingerprinting and duplicate detection
 */

export * from './crawling.types';
export * from './crawling.errors';
export * from './url-normalizer';
export * from './fingerprint';
export * from './bloom-filter';
export * from './bloom-filter.codec';
export * from './duplicate-detector';
