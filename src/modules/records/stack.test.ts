import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod';
import { Stack } from '../../types';
import { stackFromRecord, stackToRecord } from './stack';

describe('stack records', () => {
  it('flattens every persisted field', () => {
    const stack = new Stack({
      id: 's1',
      intents: ['a', 'b'],
      lastMessageId: 42,
      accessSettings: { userIds: [1], memberStatus: null, custom: null },
    });

    expect(stackToRecord(stack)).toEqual({
      id: 's1',
      intents: ['a', 'b'],
      last_message_id: 42,
      last_reply_keyboard: false,
      last_media_id: null,
      last_media_unique_id: null,
      last_income_media_group_id: null,
      access_settings: { user_ids: [1], member_status: null, custom: null },
    });
  });

  it('reads records written without optional fields', () => {
    const stack = stackFromRecord({ id: 's2', intents: ['x'] });
    expect(stack).toEqual(new Stack({ id: 's2', intents: ['x'] }));
    expect(stack.accessSettings).toBeNull();
  });

  it('rejects a record without intents', () => {
    expect(() => stackFromRecord({ id: 's3' })).toThrow(ZodError);
  });
});
