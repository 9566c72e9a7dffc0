/**
 * crawl-dedup
 * Request fingerprinting and Bloom filter duplicate detection for crawlers
 */

export * from './lib/crawling';
export { env } from './config/env';
