import type { KeyValueStore } from './keyValueStore';

/**
 * In-process key-value store backed by a plain Map.
 *
 * Data lives only for the lifetime of the process.
 */
export class InMemoryStore implements KeyValueStore {
  private readonly store = new Map<string, string>();

  get(key: string): string | null {
    return this.store.get(key) ?? null;
  }

  set(key: string, value: string): void {
    this.store.set(key, value);
  }

  delete(key: string): boolean {
    return this.store.delete(key);
  }

  keys(): string[] {
    return Array.from(this.store.keys());
  }
}
