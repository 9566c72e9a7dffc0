/**
 * Bloom Filter
 * Fixed-capacity probabilistic set over request fingerprints.
 *
 * Bits live in an Int32Array over a SharedArrayBuffer: word 0 is a lock word,
 * the bit words follow. Filters attached through fromSharedState() in
 * worker_threads see the same memory and the same lock, and every operation
 * holds that lock across all k positions.
 *
 * Bits are never cleared. Past expectedItems the false positive rate rises.
 */

import { createHash } from 'crypto';
import { configurationError } from './crawling.errors';

export type BloomKey = Uint8Array | string;

export interface BloomFilterSharedState {
  buffer: SharedArrayBuffer;
  bitCount: number;
  hashCount: number;
  expectedItems: number;
  falsePositiveRate: number;
}

// Largest bit array the snapshot format can describe
export const MAX_BIT_COUNT = 0xffffffff;

const LOCK_INDEX = 0;
const WORDS_OFFSET = 1;
const UNLOCKED = 0;
const LOCKED = 1;

const SEED_1 = Buffer.from('9e3779b97f4a7c15', 'hex');
const SEED_2 = Buffer.from('c2b2ae3d27d4eb4f', 'hex');

/**
 * m = ceil(-(n * ln p) / (ln 2)^2)
 */
export function optimalBitCount(expectedItems: number, falsePositiveRate: number): number {
  return Math.ceil(-(expectedItems * Math.log(falsePositiveRate)) / (Math.LN2 * Math.LN2));
}

/**
 * k = round((m / n) * ln 2), at least 1
 */
export function optimalHashCount(bitCount: number, expectedItems: number): number {
  return Math.max(1, Math.round((bitCount / expectedItems) * Math.LN2));
}

/**
 * Bytes of shared memory needed for a filter of bitCount bits, lock word included
 */
export function sharedBufferSize(bitCount: number): number {
  return (WORDS_OFFSET + Math.ceil(bitCount / 32)) * Int32Array.BYTES_PER_ELEMENT;
}

export class BloomFilter {
  readonly bitCount: number;
  readonly hashCount: number;
  readonly expectedItems: number;
  readonly falsePositiveRate: number;

  private readonly buffer: SharedArrayBuffer;
  private readonly words: Int32Array;
  private readonly bitCountBig: bigint;

  /**
   * @param expectedItems - capacity n, a positive integer
   * @param falsePositiveRate - target p at capacity, strictly between 0 and 1
   * @throws DedupError (CONFIGURATION_ERROR) for any other n or p
   */
  constructor(expectedItems: number, falsePositiveRate: number);
  /**
   * Attach to memory produced by another filter's toSharedState()
   */
  constructor(state: BloomFilterSharedState);
  constructor(expectedItemsOrState: number | BloomFilterSharedState, falsePositiveRate?: number) {
    if (typeof expectedItemsOrState === 'number') {
      const n = expectedItemsOrState;
      const p = falsePositiveRate ?? NaN;
      validateCapacity(n, p);

      const m = optimalBitCount(n, p);
      if (m > MAX_BIT_COUNT) {
        throw configurationError(`Bloom filter would need ${m} bits, more than ${MAX_BIT_COUNT}`, {
          expectedItems: n,
          falsePositiveRate: p,
        });
      }

      this.expectedItems = n;
      this.falsePositiveRate = p;
      this.bitCount = m;
      this.hashCount = optimalHashCount(m, n);
      this.buffer = new SharedArrayBuffer(sharedBufferSize(m));
    } else {
      const state = expectedItemsOrState;
      validateCapacity(state.expectedItems, state.falsePositiveRate);
      if (!Number.isInteger(state.bitCount) || state.bitCount < 1 || state.bitCount > MAX_BIT_COUNT) {
        throw configurationError(`Invalid bit count ${state.bitCount}`, { bitCount: state.bitCount });
      }
      if (!Number.isInteger(state.hashCount) || state.hashCount < 1) {
        throw configurationError(`Invalid hash count ${state.hashCount}`, { hashCount: state.hashCount });
      }
      if (state.buffer.byteLength !== sharedBufferSize(state.bitCount)) {
        throw configurationError(
          `Shared buffer holds ${state.buffer.byteLength} bytes, expected ${sharedBufferSize(state.bitCount)}`
        );
      }

      this.expectedItems = state.expectedItems;
      this.falsePositiveRate = state.falsePositiveRate;
      this.bitCount = state.bitCount;
      this.hashCount = state.hashCount;
      this.buffer = state.buffer;
    }

    this.words = new Int32Array(this.buffer);
    this.bitCountBig = BigInt(this.bitCount);
  }

  static fromSharedState(state: BloomFilterSharedState): BloomFilter {
    return new BloomFilter(state);
  }

  /**
   * Set all k bit positions of key. Idempotent.
   */
  insert(key: BloomKey): void {
    const positions = this.positions(key);
    this.withLock(() => {
      for (const position of positions) {
        this.setBit(position);
      }
    });
  }

  /**
   * True iff all k bit positions of key are set. Never false for an inserted key.
   */
  contains(key: BloomKey): boolean {
    const positions = this.positions(key);
    return this.withLock(() => positions.every((position) => this.testBit(position)));
  }

  /**
   * Test and insert as one step.
   * Returns true if the key was already present before this call.
   */
  checkAndMark(key: BloomKey): boolean {
    const positions = this.positions(key);
    return this.withLock(() => {
      let present = true;
      for (const position of positions) {
        if (!this.setBit(position)) {
          present = false;
        }
      }
      return present;
    });
  }

  /**
   * Number of bits currently set
   */
  setBitCount(): number {
    let count = 0;
    for (let i = WORDS_OFFSET; i < this.words.length; i++) {
      count += popcount(Atomics.load(this.words, i));
    }
    return count;
  }

  /**
   * False positive probability given the bits set so far: (X / m)^k
   */
  estimatedFalsePositiveRate(): number {
    return Math.pow(this.setBitCount() / this.bitCount, this.hashCount);
  }

  /**
   * Estimated number of distinct keys inserted: -(m / k) * ln(1 - X / m)
   */
  approximateItemCount(): number {
    const setBits = this.setBitCount();
    if (setBits >= this.bitCount) {
      return Infinity;
    }
    return Math.round((this.bitCount / this.hashCount) * Math.log(this.bitCount / (this.bitCount - setBits)));
  }

  /**
   * Memory and parameters for another thread to attach with fromSharedState()
   */
  toSharedState(): BloomFilterSharedState {
    return {
      buffer: this.buffer,
      bitCount: this.bitCount,
      hashCount: this.hashCount,
      expectedItems: this.expectedItems,
      falsePositiveRate: this.falsePositiveRate,
    };
  }

  /**
   * Copy of the bit words, without the lock word
   */
  exportWords(): Int32Array {
    return this.withLock(() => this.words.slice(WORDS_OFFSET));
  }

  /**
   * OR previously exported words into this filter
   */
  importWords(words: Int32Array): void {
    const expected = this.words.length - WORDS_OFFSET;
    if (words.length !== expected) {
      throw configurationError(`Expected ${expected} bit words, got ${words.length}`);
    }
    this.withLock(() => {
      for (let i = 0; i < words.length; i++) {
        Atomics.or(this.words, WORDS_OFFSET + i, words[i]);
      }
    });
  }

  /**
   * Double hashing: position i = (h1 + i * h2) mod 2^64 mod m
   */
  private positions(key: BloomKey): number[] {
    const h1 = seededHash(SEED_1, key);
    const h2 = seededHash(SEED_2, key);

    const positions: number[] = [];
    for (let i = 0; i < this.hashCount; i++) {
      const combined = BigInt.asUintN(64, h1 + BigInt(i) * h2);
      positions.push(Number(combined % this.bitCountBig));
    }
    return positions;
  }

  /**
   * Set a bit, returning whether it was already set
   */
  private setBit(position: number): boolean {
    const index = WORDS_OFFSET + (position >>> 5);
    const mask = 1 << (position & 31);
    const previous = Atomics.or(this.words, index, mask);
    return (previous & mask) !== 0;
  }

  private testBit(position: number): boolean {
    const index = WORDS_OFFSET + (position >>> 5);
    const mask = 1 << (position & 31);
    return (Atomics.load(this.words, index) & mask) !== 0;
  }

  private withLock<T>(fn: () => T): T {
    while (Atomics.compareExchange(this.words, LOCK_INDEX, UNLOCKED, LOCKED) !== UNLOCKED) {
      Atomics.wait(this.words, LOCK_INDEX, LOCKED);
    }
    try {
      return fn();
    } finally {
      Atomics.store(this.words, LOCK_INDEX, UNLOCKED);
      Atomics.notify(this.words, LOCK_INDEX, 1);
    }
  }
}

function validateCapacity(expectedItems: number, falsePositiveRate: number): void {
  if (!Number.isInteger(expectedItems) || expectedItems <= 0) {
    throw configurationError(`Expected item count must be a positive integer, got ${expectedItems}`, {
      expectedItems,
    });
  }
  if (!Number.isFinite(falsePositiveRate) || falsePositiveRate <= 0 || falsePositiveRate >= 1) {
    throw configurationError(`False positive rate must be between 0 and 1 (exclusive), got ${falsePositiveRate}`, {
      falsePositiveRate,
    });
  }
}

function seededHash(seed: Buffer, key: BloomKey): bigint {
  return createHash('sha256').update(seed).update(key).digest().readBigUInt64BE(0);
}

function popcount(word: number): number {
  let v = word >>> 0;
  let count = 0;
  while (v !== 0) {
    v = (v & (v - 1)) >>> 0;
    count++;
  }
  return count;
}
