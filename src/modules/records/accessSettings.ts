import { z } from 'zod';
import { type AccessSettings, CHAT_MEMBER_STATUSES, type ChatMemberStatus } from '../../types';

export const chatMemberStatusSchema = z.enum(CHAT_MEMBER_STATUSES);

const accessSettingsRecordSchema = z.object({
  user_ids: z.array(z.number()).nullish(),
  member_status: z.string().nullish(),
  custom: z.unknown(),
});

/** Persisted form of `AccessSettings`. */
export interface AccessSettingsRecord {
  user_ids: number[];
  member_status: ChatMemberStatus | null;
  custom: unknown;
}

function isBlank(raw: unknown): boolean {
  if (raw === null || raw === undefined) return true;
  return typeof raw === 'object' && !Array.isArray(raw) && Object.keys(raw).length === 0;
}

/**
 * Reads the `access_settings` sub-record of a stack.
 * Absent or empty input means the stack carries no settings.
 * An unrecognised `member_status` throws the underlying ZodError.
 */
export function parseAccessSettings(raw: unknown): AccessSettings | null {
  if (isBlank(raw)) return null;
  const record = accessSettingsRecordSchema.parse(raw);
  return {
    userIds: record.user_ids ?? [],
    memberStatus: record.member_status ? chatMemberStatusSchema.parse(record.member_status) : null,
    custom: record.custom ?? null,
  };
}

export function dumpAccessSettings(settings: AccessSettings | null | undefined): AccessSettingsRecord | null {
  if (!settings) return null;
  return {
    user_ids: settings.userIds,
    member_status: settings.memberStatus,
    custom: settings.custom,
  };
}
