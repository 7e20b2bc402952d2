import type { StorageKey } from './storage';

export interface KeyBuilder {
  build(key: StorageKey): string;
}

export interface KeyBuilderOptions {
  /** Leading namespace of every key. Defaults to "dialogs". */
  prefix?: string;
  separator?: string;
  /** Include the bot id, so several bots can share one store. Defaults to true. */
  withBotId?: boolean;
}

/**
 * Renders keys as `prefix[:botId]:chatId[:threadId]:userId:destiny`.
 */
export class DefaultKeyBuilder implements KeyBuilder {
  private readonly prefix: string;
  private readonly separator: string;
  private readonly withBotId: boolean;

  constructor(options: KeyBuilderOptions = {}) {
    this.prefix = options.prefix ?? 'dialogs';
    this.separator = options.separator ?? ':';
    this.withBotId = options.withBotId ?? true;
  }

  build(key: StorageKey): string {
    const parts: Array<string | number> = [this.prefix];
    if (this.withBotId) parts.push(key.botId);
    parts.push(key.chatId);
    if (key.threadId !== undefined && key.threadId !== null) parts.push(key.threadId);
    parts.push(key.userId, key.destiny);
    return parts.join(this.separator);
  }
}
