import { describe, expect, it, vi } from 'vitest';
import { InMemoryStore } from './inMemoryStore';
import { KeyValueStorage } from './keyValueStorage';

const key = { botId: 1, chatId: 2, userId: 3, destiny: 'dialogs:context:abc' };

describe('KeyValueStorage', () => {
  it('returns an empty record for unknown keys', async () => {
    const storage = new KeyValueStorage();
    expect(await storage.getData(key)).toEqual({});
  });

  it('stores records as JSON under the built key', async () => {
    const store = new InMemoryStore();
    const storage = new KeyValueStorage({ store });

    await storage.setData(key, { id: 'abc', nested: { a: [1, 2] } });

    expect(store.get('dialogs:1:2:3:dialogs:context:abc')).toBe('{"id":"abc","nested":{"a":[1,2]}}');
    expect(await storage.getData(key)).toEqual({ id: 'abc', nested: { a: [1, 2] } });
  });

  it('deletes the key when an empty record is written', async () => {
    const store = new InMemoryStore();
    const storage = new KeyValueStorage({ store });
    await storage.setData(key, { id: 'abc' });

    await storage.setData(key, {});

    expect(store.keys()).toEqual([]);
    expect(await storage.getData(key)).toEqual({});
  });

  it('awaits asynchronous stores', async () => {
    const values = new Map<string, string>();
    const store = {
      get: vi.fn(async (k: string) => values.get(k) ?? null),
      set: vi.fn(async (k: string, v: string) => {
        values.set(k, v);
      }),
      delete: vi.fn(async (k: string) => values.delete(k)),
      keys: vi.fn(async () => [...values.keys()]),
    };
    const storage = new KeyValueStorage({ store });

    await storage.setData(key, { a: 1 });
    expect(await storage.getData(key)).toEqual({ a: 1 });
    expect(store.set).toHaveBeenCalledTimes(1);
  });

  it('propagates store failures', async () => {
    const store = new InMemoryStore();
    vi.spyOn(store, 'get').mockImplementation(() => {
      throw new Error('connection lost');
    });
    const storage = new KeyValueStorage({ store });

    await expect(storage.getData(key)).rejects.toThrow('connection lost');
  });
});
