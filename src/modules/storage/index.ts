export { InMemoryStore } from './inMemoryStore';
export { DefaultKeyBuilder, type KeyBuilder, type KeyBuilderOptions } from './keyBuilder';
export type { KeyValueStore } from './keyValueStore';
export { KeyValueStorage, type KeyValueStorageConfig } from './keyValueStorage';
export type { DialogStorage, StorageData, StorageKey } from './storage';
