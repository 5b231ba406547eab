import { bytesEqual } from "./bytes.js";
import { sha256HexFromBytes } from "./hash.js";

export const DEFAULT_DIGEST_THRESHOLD = 1024;

export interface ContentDeduplicatorOptions {
  /** Blocks of at least this many bytes are compared by SHA-256 digest instead of byte by byte. */
  digestThreshold?: number;
}

export interface ContentDeduplicator {
  /** Index of the first identical block already pooled, or the index of the newly appended one. */
  intern(bytes: Uint8Array, tag?: string): number;
  find(bytes: Uint8Array, tag?: string): number | undefined;
  size(): number;
  entries(): Uint8Array[];
}

interface PoolEntry {
  index: number;
  bytes: Uint8Array;
}

function bucketKey(bytes: Uint8Array, tag: string, digestThreshold: number): string {
  if (bytes.byteLength >= digestThreshold) {
    return `${tag}|sha256:${sha256HexFromBytes(bytes)}`;
  }
  // Small blocks share a bucket per length and are compared directly.
  return `${tag}|len:${bytes.byteLength}`;
}

export function createContentDeduplicator(options: ContentDeduplicatorOptions = {}): ContentDeduplicator {
  const digestThreshold = options.digestThreshold ?? DEFAULT_DIGEST_THRESHOLD;
  const buckets = new Map<string, PoolEntry[]>();
  const pool: Uint8Array[] = [];

  const lookup = (bytes: Uint8Array, key: string): number | undefined => {
    const bucket = buckets.get(key);
    if (!bucket) return undefined;
    if (bytes.byteLength >= digestThreshold) {
      return bucket[0]?.index;
    }
    return bucket.find((entry) => bytesEqual(entry.bytes, bytes))?.index;
  };

  return {
    intern(bytes, tag = "") {
      const key = bucketKey(bytes, tag, digestThreshold);
      const existing = lookup(bytes, key);
      if (existing !== undefined) return existing;

      const index = pool.length;
      const copy = bytes.slice();
      pool.push(copy);
      const bucket = buckets.get(key);
      if (bucket) {
        bucket.push({ index, bytes: copy });
      } else {
        buckets.set(key, [{ index, bytes: copy }]);
      }
      return index;
    },
    find(bytes, tag = "") {
      return lookup(bytes, bucketKey(bytes, tag, digestThreshold));
    },
    size() {
      return pool.length;
    },
    entries() {
      return [...pool];
    },
  };
}
