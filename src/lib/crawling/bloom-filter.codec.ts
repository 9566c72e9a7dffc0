/**
 * Bloom Filter Snapshots
 * Binary snapshot of a filter's parameters and bits, plus file persistence
 *
 * Layout:
 *   0  magic "BLMF"
 *   4  version (u8)
 *   5  bit count m (u32 BE)
 *   9  hash count k (u32 BE)
 *   13 expected items n (f64 BE)
 *   21 false positive rate p (f64 BE)
 *   29 bit words (i32 LE), ceil(m / 32) of them
 *
 * m and k are restored as stored, never recomputed from n and p.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { env } from '../../config/env';
import { BloomFilter, sharedBufferSize } from './bloom-filter';
import { corruptSnapshot, isDedupError, DedupErrorType } from './crawling.errors';

const MAGIC = 'BLMF';
const VERSION = 1;
const HEADER_BYTES = 29;

export function serializeBloomFilter(filter: BloomFilter): Buffer {
  const words = filter.exportWords();
  const snapshot = Buffer.alloc(HEADER_BYTES + words.length * 4);

  snapshot.write(MAGIC, 0, 'ascii');
  snapshot.writeUInt8(VERSION, 4);
  snapshot.writeUInt32BE(filter.bitCount, 5);
  snapshot.writeUInt32BE(filter.hashCount, 9);
  snapshot.writeDoubleBE(filter.expectedItems, 13);
  snapshot.writeDoubleBE(filter.falsePositiveRate, 21);

  for (let i = 0; i < words.length; i++) {
    snapshot.writeInt32LE(words[i], HEADER_BYTES + i * 4);
  }

  return snapshot;
}

/**
 * @throws DedupError (CORRUPT_SNAPSHOT) when the bytes are not a valid snapshot
 */
export function deserializeBloomFilter(snapshot: Uint8Array): BloomFilter {
  const data = Buffer.from(snapshot.buffer, snapshot.byteOffset, snapshot.byteLength);

  if (data.length < HEADER_BYTES) {
    throw corruptSnapshot(`Snapshot is ${data.length} bytes, shorter than its header`);
  }
  if (data.toString('ascii', 0, 4) !== MAGIC) {
    throw corruptSnapshot('Snapshot does not start with the bloom filter magic');
  }

  const version = data.readUInt8(4);
  if (version !== VERSION) {
    throw corruptSnapshot(`Unsupported snapshot version ${version}`, { version });
  }

  const bitCount = data.readUInt32BE(5);
  const hashCount = data.readUInt32BE(9);
  const expectedItems = data.readDoubleBE(13);
  const falsePositiveRate = data.readDoubleBE(21);

  const wordCount = Math.ceil(bitCount / 32);
  if (data.length !== HEADER_BYTES + wordCount * 4) {
    throw corruptSnapshot(`Snapshot holds ${data.length - HEADER_BYTES} bytes of bits, expected ${wordCount * 4}`, {
      bitCount,
    });
  }

  const buffer = new SharedArrayBuffer(sharedBufferSize(bitCount));
  const words = new Int32Array(buffer);
  for (let i = 0; i < wordCount; i++) {
    // word 0 of the shared buffer is the lock
    words[i + 1] = data.readInt32LE(HEADER_BYTES + i * 4);
  }

  try {
    return BloomFilter.fromSharedState({ buffer, bitCount, hashCount, expectedItems, falsePositiveRate });
  } catch (error) {
    if (isDedupError(error, DedupErrorType.CONFIGURATION_ERROR)) {
      throw corruptSnapshot(`Snapshot parameters are invalid: ${error.message}`, { bitCount, hashCount });
    }
    throw error;
  }
}

/**
 * Write a snapshot to disk, creating the parent directory if needed
 */
export async function saveBloomFilter(
  filter: BloomFilter,
  filePath: string = env.DEDUP_SNAPSHOT_PATH
): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, serializeBloomFilter(filter));
  console.log(`[BloomFilter] Saved snapshot (${filter.bitCount} bits, k=${filter.hashCount}) to ${filePath}`);
}

export async function loadBloomFilter(filePath: string = env.DEDUP_SNAPSHOT_PATH): Promise<BloomFilter> {
  const snapshot = await fs.readFile(filePath);
  const filter = deserializeBloomFilter(snapshot);
  console.log(`[BloomFilter] Loaded snapshot (${filter.bitCount} bits, k=${filter.hashCount}) from ${filePath}`);
  return filter;
}
