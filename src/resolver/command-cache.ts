/**
 * Phrase → action cache. Entries live for the process lifetime: no
 * eviction, no expiry. Writes for an existing key replace the value.
 */
export class CommandCache {
  private entries = new Map<string, string>();

  get(key: string): string | undefined {
    return this.entries.get(key);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  set(key: string, action: string): void {
    this.entries.set(key, action);
  }

  get size(): number {
    return this.entries.size;
  }

  toObject(): Record<string, string> {
    return Object.fromEntries(this.entries);
  }

  clear(): void {
    this.entries.clear();
  }
}
