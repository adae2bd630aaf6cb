/**
 * URL Token Store
 * Maps short content-derived keys to full URLs. Chat callback payloads are size-limited
 * (64 bytes on Telegram), so buttons carry "quality|key" instead of the link itself.
 */

import { createHash } from "crypto";

export const DEFAULT_TOKEN_CAPACITY = 100;
const KEY_LENGTH = 10;

/** First 10 hex chars of the URL's MD5: the same link always gets the same key. */
export function tokenKey(url: string): string {
  return createHash("md5").update(url).digest("hex").slice(0, KEY_LENGTH);
}

export class UrlTokenStore {
  /** Map iteration order is insertion order, which drives eviction. */
  private readonly entries = new Map<string, string>();

  constructor(private readonly capacity: number = DEFAULT_TOKEN_CAPACITY) {
    if (capacity < 2) {
      throw new Error(`Token store capacity must be at least 2, got ${capacity}`);
    }
  }

  /**
   * Stores a URL and returns its key. A URL already present keeps its position.
   * When full, the oldest half is dropped before inserting.
   */
  put(url: string): string {
    const key = tokenKey(url);
    if (this.entries.has(key)) {
      // Map.set on an existing key keeps its insertion position
      this.entries.set(key, url);
      return key;
    }

    if (this.entries.size >= this.capacity) {
      const evictCount = Math.floor(this.entries.size / 2);
      const oldest = Array.from(this.entries.keys()).slice(0, evictCount);
      for (const k of oldest) {
        this.entries.delete(k);
      }
      console.log(`[tokens] evicted ${evictCount} oldest links`);
    }

    this.entries.set(key, url);
    return key;
  }

  /** Undefined means unknown or evicted: the link has expired. */
  get(key: string): string | undefined {
    return this.entries.get(key);
  }

  get size(): number {
    return this.entries.size;
  }
}
