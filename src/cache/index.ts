/**
 * Response cache with conditional-GET revalidation
 *
 * Entries are keyed by the raw request-line target and live for the
 * lifetime of the store: no TTL, no eviction, no size bound. Every
 * successful non-304 fetch replaces the entry as a whole.
 *
 * @module cache
 */

import { forwardRequest, HTTP_PORT, type ForwardFn } from '../proxy/forwarding-client.js';
import { buildConditionalRequest, extractStatusCode } from '../proxy/http-message.js';
import { DEFAULT_BUFFER_SIZE } from '../proxy/socket-io.js';

// =============================================================================
// Types
// =============================================================================

export interface CacheEntry {
  /** Response bytes exactly as received from the origin */
  rawResponse: Buffer;
  /** Last-Modified value replayed in If-Modified-Since */
  lastModified: Buffer;
  /** Wall-clock time (ms) the fetch that produced this entry took */
  fetchLatency: number;
}

export type RevalidationResult =
  | { status: 'not-modified'; entry: CacheEntry }
  | { status: 'fresh' };

export interface CacheStoreOptions {
  /** Transport for conditional probes (defaults to the forwarding client) */
  forward?: ForwardFn;
  /** Origin port for conditional probes */
  httpPort?: number;
  /** Size of the single read a probe performs */
  bufferSize?: number;
}

export interface CacheStats {
  entries: number;
  totalBytes: number;
}

const NOT_MODIFIED = Buffer.from('304', 'latin1');

// =============================================================================
// Store
// =============================================================================

export class CacheStore {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly forward: ForwardFn;
  private readonly httpPort: number;
  private readonly bufferSize: number;

  constructor(options: CacheStoreOptions = {}) {
    this.forward = options.forward ?? forwardRequest;
    this.httpPort = options.httpPort ?? HTTP_PORT;
    this.bufferSize = options.bufferSize ?? DEFAULT_BUFFER_SIZE;
  }

  lookup(target: string): CacheEntry | undefined {
    return this.entries.get(target);
  }

  has(target: string): boolean {
    return this.entries.has(target);
  }

  /**
   * Store a response, replacing whatever was cached for the target
   */
  put(target: string, rawResponse: Buffer, lastModified: Buffer, fetchLatency: number): void {
    this.entries.set(target, { rawResponse, lastModified, fetchLatency });
  }

  delete(target: string): boolean {
    return this.entries.delete(target);
  }

  clear(): void {
    this.entries.clear();
  }

  targets(): string[] {
    return [...this.entries.keys()];
  }

  /**
   * Ask the origin whether the cached copy of `target` is still current.
   *
   * The probe is a conditional GET read with a single bounded read: a 304
   * carries no body, so reading to end-of-stream could wait forever on a
   * keep-alive origin. Only an exact `304` status counts as not-modified;
   * anything else means the caller must fetch the full resource again. The
   * probe bytes themselves are never served because they may be truncated.
   *
   * @throws ConnectionError when the origin cannot be reached
   */
  async revalidate(target: string, host: string): Promise<RevalidationResult> {
    const entry = this.entries.get(target);
    if (!entry) {
      return { status: 'fresh' };
    }

    const probe = buildConditionalRequest(target, host, entry.lastModified);
    const response = await this.forward(probe, host, {
      port: this.httpPort,
      fullRead: false,
      bufferSize: this.bufferSize,
    });

    if (extractStatusCode(response).equals(NOT_MODIFIED)) {
      return { status: 'not-modified', entry };
    }
    return { status: 'fresh' };
  }

  /**
   * Time (ms) a cache hit saved compared to the fetch that filled the entry.
   * Negative when serving from cache was slower.
   */
  timeSaved(entry: CacheEntry, elapsed: number): number {
    return entry.fetchLatency - elapsed;
  }

  getStats(): CacheStats {
    let totalBytes = 0;
    for (const entry of this.entries.values()) {
      totalBytes += entry.rawResponse.length;
    }
    return {
      entries: this.entries.size,
      totalBytes,
    };
  }
}
