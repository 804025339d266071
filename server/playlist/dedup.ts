/**
 * Locators already emitted in one pass. Keys are exact strings: `http://a/1` and
 * `http://a/1?x` are different streams.
 */
export class LocatorDeduplicator {
  private readonly seen = new Set<string>();

  has(locator: string): boolean {
    return this.seen.has(locator);
  }

  /** True the first time `locator` is offered, false afterwards. */
  admit(locator: string): boolean {
    if (this.seen.has(locator)) {
      return false;
    }
    this.seen.add(locator);
    return true;
  }

  get size(): number {
    return this.seen.size;
  }
}
