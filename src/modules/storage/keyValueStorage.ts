import { z } from 'zod';
import { InMemoryStore } from './inMemoryStore';
import { DefaultKeyBuilder, type KeyBuilder } from './keyBuilder';
import type { KeyValueStore } from './keyValueStore';
import type { DialogStorage, StorageData, StorageKey } from './storage';

export interface KeyValueStorageConfig {
  /** Defaults to a fresh InMemoryStore. */
  store?: KeyValueStore;
  keyBuilder?: KeyBuilder;
}

const storedDataSchema = z.record(z.unknown());

/**
 * `DialogStorage` over a string key-value store. Records are JSON-encoded;
 * writing an empty record deletes the key.
 */
export class KeyValueStorage implements DialogStorage {
  private readonly store: KeyValueStore;
  private readonly keyBuilder: KeyBuilder;

  constructor(config: KeyValueStorageConfig = {}) {
    this.store = config.store ?? new InMemoryStore();
    this.keyBuilder = config.keyBuilder ?? new DefaultKeyBuilder();
  }

  async getData(key: StorageKey): Promise<StorageData> {
    const raw = await this.store.get(this.keyBuilder.build(key));
    if (raw === null) return {};
    return storedDataSchema.parse(JSON.parse(raw));
  }

  async setData(key: StorageKey, data: StorageData): Promise<void> {
    const rendered = this.keyBuilder.build(key);
    if (Object.keys(data).length === 0) {
      await this.store.delete(rendered);
      return;
    }
    await this.store.set(rendered, JSON.stringify(data));
  }
}
