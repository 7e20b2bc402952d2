import type { Logger } from 'winston';
import { UnknownIntentError, UnknownStateError } from '../../errors';
import { type Context, DEFAULT_STACK_ID, Stack, type State } from '../../types';
import defaultLogger from '../../utils/logger';
import { contextFromRecord, contextToRecord, stackFromRecord, stackToRecord } from '../records';
import { resolveState, type StateRegistry } from '../state';
import type { DialogStorage, StorageData, StorageKey } from '../storage';

/** Namespace of every record this proxy writes. */
export const DESTINY_PREFIX = 'dialogs';

/** Identity of the bot the records belong to. */
export interface BotIdentity {
  readonly id: number;
}

export interface StorageProxyConfig {
  storage: DialogStorage;
  userId: number;
  chatId: number;
  chatType: string;
  threadId?: number | null;
  bot: BotIdentity;
  /** Registered state groups used to resolve persisted state text. */
  stateGroups: StateRegistry;
  /** Defaults to the shared winston logger. */
  logger?: Logger;
}

/**
 * Gateway between dialog entities and the key-value store for one conversation
 * (bot, chat, user and optional thread).
 *
 * Every load is a single read and every save or removal a single write. Nothing is
 * cached, retried or locked; concurrent writes to the same key are the caller's concern.
 */
export class StorageProxy {
  readonly storage: DialogStorage;
  readonly userId: number;
  readonly chatId: number;
  readonly chatType: string;
  readonly threadId: number | null;
  readonly bot: BotIdentity;
  readonly stateGroups: StateRegistry;
  private readonly logger: Logger;

  constructor(config: StorageProxyConfig) {
    this.storage = config.storage;
    this.userId = config.userId;
    this.chatId = config.chatId;
    this.chatType = config.chatType;
    this.threadId = config.threadId ?? null;
    this.bot = config.bot;
    this.stateGroups = config.stateGroups;
    this.logger = config.logger ?? defaultLogger;
  }

  /**
   * Loads a context by intent id.
   * Throws UnknownIntentError when nothing is stored, UnknownStateError when its state
   * is no longer registered.
   */
  public async loadContext(intentId: string): Promise<Context> {
    const key = this._contextKey(intentId);
    const data = await this.storage.getData(key);
    this.logger.debug(`[storageProxy] read ${key.destiny}`);
    if (isEmpty(data)) {
      throw new UnknownIntentError(`Context not found for intent id: ${intentId}`);
    }
    return contextFromRecord(data, (state) => this._state(state));
  }

  /**
   * Loads a stack. A missing stack is a normal starting point and comes back empty.
   */
  public async loadStack(stackId: string = DEFAULT_STACK_ID): Promise<Stack> {
    const key = this._stackKey(stackId);
    const data = await this.storage.getData(key);
    this.logger.debug(`[storageProxy] read ${key.destiny}`);
    if (isEmpty(data)) {
      return new Stack({ id: stackId });
    }
    return stackFromRecord(data);
  }

  public async saveContext(context: Context | null | undefined): Promise<void> {
    if (!context) return;
    await this._write(this._contextKey(context.id), contextToRecord(context));
  }

  public async removeContext(intentId: string): Promise<void> {
    await this._write(this._contextKey(intentId), {});
  }

  /**
   * Saves a stack. One with no intents and no last message id is stored as a
   * tombstone, whatever access settings it carries.
   */
  public async saveStack(stack: Stack | null | undefined): Promise<void> {
    if (!stack) return;
    const key = this._stackKey(stack.id);
    if (stack.empty() && !stack.lastMessageId) {
      await this._write(key, {});
      return;
    }
    await this._write(key, stackToRecord(stack));
  }

  public async removeStack(stackId: string): Promise<void> {
    await this._write(this._stackKey(stackId), {});
  }

  // ─── Private helpers ────────────────────────────────────────────────────

  private async _write(key: StorageKey, data: StorageData): Promise<void> {
    await this.storage.setData(key, data);
    this.logger.debug(`[storageProxy] ${isEmpty(data) ? 'tombstoned' : 'wrote'} ${key.destiny}`);
  }

  private _contextKey(intentId: string): StorageKey {
    return this._key(`${DESTINY_PREFIX}:context:${intentId}`);
  }

  private _stackKey(stackId: string): StorageKey {
    return this._key(`${DESTINY_PREFIX}:stack:${stackId}`);
  }

  private _key(destiny: string): StorageKey {
    return {
      botId: this.bot.id,
      chatId: this.chatId,
      userId: this.userId,
      threadId: this.threadId,
      destiny,
    };
  }

  private _state(text: string): State {
    try {
      return resolveState(this.stateGroups, text);
    } catch (err) {
      if (err instanceof UnknownStateError) {
        this.logger.warn(`[storageProxy] chat=${this.chatId} user=${this.userId}: ${err.message}`);
      }
      throw err;
    }
  }
}

function isEmpty(data: StorageData | null | undefined): boolean {
  return !data || Object.keys(data).length === 0;
}
