import dotenv from 'dotenv';

dotenv.config();

export const env = {
  NODE_ENV: process.env.NODE_ENV || 'development',

  // Bloom filter sizing
  DEDUP_EXPECTED_ITEMS: parseInt(process.env.DEDUP_EXPECTED_ITEMS || '1000000', 10),
  DEDUP_FALSE_POSITIVE_RATE: parseFloat(process.env.DEDUP_FALSE_POSITIVE_RATE || '0.01'),

  // What to do with a request that cannot be fingerprinted: process | skip | throw
  DEDUP_ON_INVALID: process.env.DEDUP_ON_INVALID || 'process',

  // Where saveBloomFilter/loadBloomFilter keep the filter between crawl sessions
  DEDUP_SNAPSHOT_PATH: process.env.DEDUP_SNAPSHOT_PATH || 'storage/dedup/bloom.bin',
} as const;

export default env;
