/**
 * Block List
 *
 * Set of request-line targets the proxy refuses to fetch or tunnel.
 * Matching is exact: the stored string must equal the target as it
 * appears on the request line.
 *
 * @module proxy/block-list
 */

export class BlockList {
  private readonly urls = new Set<string>();

  constructor(initial: Iterable<string> = []) {
    for (const url of initial) {
      this.add(url);
    }
  }

  /**
   * @returns false when the value is empty or already blocked
   */
  add(url: string): boolean {
    const value = url.trim();
    if (value === '' || this.urls.has(value)) {
      return false;
    }
    this.urls.add(value);
    return true;
  }

  /**
   * @returns false when the value was not blocked
   */
  remove(url: string): boolean {
    return this.urls.delete(url.trim());
  }

  has(target: string): boolean {
    return this.urls.has(target);
  }

  /** Blocked targets in insertion order */
  list(): string[] {
    return [...this.urls];
  }

  get size(): number {
    return this.urls.size;
  }
}
