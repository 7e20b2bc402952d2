/**
 * Core entities persisted by the dialog storage layer.
 */
import { DialogStackEmptyError, DialogStackOverflowError } from '../errors';
import { newId } from '../utils/ids';

/** Id of the primary stack of a conversation. */
export const DEFAULT_STACK_ID = '';

export const MAX_STACK_DEPTH = 100;

export const CHAT_MEMBER_STATUSES = [
  'creator',
  'administrator',
  'member',
  'restricted',
  'left',
  'kicked',
] as const;

export type ChatMemberStatus = (typeof CHAT_MEMBER_STATUSES)[number];

/**
 * A statically registered dialog state.
 * `state` is the canonical text form: `"<group>:<name>"`, or `"<group>"` when `name` is null.
 */
export interface State {
  readonly group: string;
  readonly name: string | null;
  readonly state: string;
}

/**
 * Who may interact with a stack.
 * An empty `userIds` list means no explicit allow-list.
 */
export interface AccessSettings {
  userIds: number[];
  memberStatus: ChatMemberStatus | null;
  /** Caller-defined data, stored and returned without interpretation. */
  custom: unknown;
}

/**
 * One active dialog instance. `id` doubles as the intent id kept in the stack history.
 */
export interface Context {
  id: string;
  stackId: string;
  state: State;
  startData: unknown;
  dialogData: Record<string, unknown>;
  widgetData: Record<string, unknown>;
}

export interface StackInit {
  id?: string;
  intents?: string[];
  lastMessageId?: number | null;
  lastReplyKeyboard?: boolean;
  lastMediaId?: string | null;
  lastMediaUniqueId?: string | null;
  lastIncomeMediaGroupId?: string | null;
  accessSettings?: AccessSettings | null;
}

/**
 * Ordered history of intents for one conversation.
 * A stack built without an id gets a freshly generated one.
 */
export class Stack {
  id: string;
  intents: string[];
  lastMessageId: number | null;
  lastReplyKeyboard: boolean;
  lastMediaId: string | null;
  lastMediaUniqueId: string | null;
  lastIncomeMediaGroupId: string | null;
  accessSettings: AccessSettings | null;

  constructor(init: StackInit = {}) {
    this.id = init.id ?? newId();
    this.intents = init.intents ? [...init.intents] : [];
    this.lastMessageId = init.lastMessageId ?? null;
    this.lastReplyKeyboard = init.lastReplyKeyboard ?? false;
    this.lastMediaId = init.lastMediaId ?? null;
    this.lastMediaUniqueId = init.lastMediaUniqueId ?? null;
    this.lastIncomeMediaGroupId = init.lastIncomeMediaGroupId ?? null;
    this.accessSettings = init.accessSettings ?? null;
  }

  /**
   * Starts a new dialog on top of this stack and returns its fresh context.
   */
  public push(state: State, startData: unknown = null): Context {
    if (this.intents.length >= MAX_STACK_DEPTH) {
      throw new DialogStackOverflowError(`Cannot open more dialogs in stack "${this.id}"`);
    }
    const context: Context = {
      id: newId(),
      stackId: this.id,
      state,
      startData,
      dialogData: {},
      widgetData: {},
    };
    this.intents.push(context.id);
    return context;
  }

  public pop(): string {
    const intentId = this.intents.pop();
    if (intentId === undefined) {
      throw new DialogStackEmptyError(`Stack "${this.id}" has no intents to pop`);
    }
    return intentId;
  }

  public last(): string | null {
    return this.intents.length > 0 ? this.intents[this.intents.length - 1] : null;
  }

  public empty(): boolean {
    return this.intents.length === 0;
  }
}
