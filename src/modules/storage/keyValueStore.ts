/**
 * String key-value store underneath `KeyValueStorage`.
 *
 * Supports both synchronous and asynchronous implementations. Use InMemoryStore for
 * ephemeral/test scenarios, or supply your own implementation backed by Redis, SQLite, etc.
 */
export interface KeyValueStore {
  get(key: string): string | null | Promise<string | null>;
  set(key: string, value: string): void | Promise<void>;
  delete(key: string): boolean | Promise<boolean>;
  keys(): string[] | Promise<string[]>;
}
