import { z } from 'zod';
import { Stack } from '../../types';
import { type AccessSettingsRecord, dumpAccessSettings, parseAccessSettings } from './accessSettings';

const stackRecordSchema = z.object({
  id: z.string(),
  intents: z.array(z.string()),
  last_message_id: z.number().nullish(),
  last_reply_keyboard: z.boolean().nullish(),
  last_media_id: z.string().nullish(),
  last_media_unique_id: z.string().nullish(),
  last_income_media_group_id: z.string().nullish(),
  access_settings: z.unknown(),
});

export interface StackRecord {
  [field: string]: unknown;
  id: string;
  intents: string[];
  last_message_id: number | null;
  last_reply_keyboard: boolean;
  last_media_id: string | null;
  last_media_unique_id: string | null;
  last_income_media_group_id: string | null;
  access_settings: AccessSettingsRecord | null;
}

export function stackToRecord(stack: Stack): StackRecord {
  return {
    id: stack.id,
    intents: [...stack.intents],
    last_message_id: stack.lastMessageId,
    last_reply_keyboard: stack.lastReplyKeyboard,
    last_media_id: stack.lastMediaId,
    last_media_unique_id: stack.lastMediaUniqueId,
    last_income_media_group_id: stack.lastIncomeMediaGroupId,
    access_settings: dumpAccessSettings(stack.accessSettings),
  };
}

export function stackFromRecord(raw: unknown): Stack {
  const record = stackRecordSchema.parse(raw);
  return new Stack({
    id: record.id,
    intents: record.intents,
    lastMessageId: record.last_message_id,
    lastReplyKeyboard: record.last_reply_keyboard ?? false,
    lastMediaId: record.last_media_id,
    lastMediaUniqueId: record.last_media_unique_id,
    lastIncomeMediaGroupId: record.last_income_media_group_id,
    accessSettings: parseAccessSettings(record.access_settings),
  });
}
