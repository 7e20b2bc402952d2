/**
 * Composite key scoping every record of a conversation.
 * `destiny` tells record kinds apart, e.g. "dialogs:context:<intent id>".
 */
export interface StorageKey {
  botId: number;
  chatId: number;
  userId: number;
  threadId?: number | null;
  destiny: string;
}

/** Flat record as handed to and returned by the store. `{}` means "no record". */
export type StorageData = Record<string, unknown>;

/**
 * Store contract consumed by the storage proxy.
 *
 * Supports both synchronous and asynchronous implementations. The store only has to
 * persist data verbatim and return `{}` for keys it holds nothing for.
 */
export interface DialogStorage {
  getData(key: StorageKey): StorageData | Promise<StorageData>;
  setData(key: StorageKey, data: StorageData): void | Promise<void>;
}
