export {
  DialogStackEmptyError,
  DialogStackOverflowError,
  DialogStorageError,
  UnknownIntentError,
  UnknownStateError,
} from './errors';
export {
  type AccessSettingsRecord,
  type ContextRecord,
  type StackRecord,
  chatMemberStatusSchema,
  contextFromRecord,
  contextToRecord,
  dumpAccessSettings,
  parseAccessSettings,
  stackFromRecord,
  stackToRecord,
} from './modules/records';
export {
  STATE_SEPARATOR,
  type StateRegistry,
  type StatesGroup,
  buildStateRegistry,
  createState,
  defineStatesGroup,
  resolveState,
} from './modules/state';
export {
  DefaultKeyBuilder,
  type DialogStorage,
  InMemoryStore,
  type KeyBuilder,
  type KeyBuilderOptions,
  type KeyValueStorageConfig,
  type KeyValueStore,
  KeyValueStorage,
  type StorageData,
  type StorageKey,
} from './modules/storage';
export { type BotIdentity, DESTINY_PREFIX, StorageProxy, type StorageProxyConfig } from './modules/storageProxy';
export * from './types';
export { newId } from './utils/ids';
export { createLogger, resolveLogLevel } from './utils/logger';
