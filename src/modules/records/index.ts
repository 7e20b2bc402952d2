export {
  type AccessSettingsRecord,
  chatMemberStatusSchema,
  dumpAccessSettings,
  parseAccessSettings,
} from './accessSettings';
export { type ContextRecord, contextFromRecord, contextToRecord } from './context';
export { type StackRecord, stackFromRecord, stackToRecord } from './stack';
