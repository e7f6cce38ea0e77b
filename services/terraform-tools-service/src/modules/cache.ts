import type { FileSnapshot } from './types';

/**
 * Bounded LRU of fetched snapshots, keyed by canonical reference. Only
 * immutable references (pinned versions, URLs) are ever stored.
 */
export class ModuleCache {
  private entries = new Map<string, FileSnapshot>();

  constructor(readonly maxEntries: number) {}

  get(key: string): FileSnapshot | undefined {
    const snapshot = this.entries.get(key);
    if (snapshot) {
      // Re-insert to mark as most recently used
      this.entries.delete(key);
      this.entries.set(key, snapshot);
    }
    return snapshot;
  }

  set(key: string, snapshot: FileSnapshot): void {
    if (this.maxEntries <= 0) return;
    this.entries.delete(key);
    this.entries.set(key, snapshot);
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
