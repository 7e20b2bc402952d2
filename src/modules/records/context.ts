import { z } from 'zod';
import type { Context, State } from '../../types';

const contextRecordSchema = z.object({
  id: z.string(),
  stack_id: z.string(),
  state: z.string(),
  start_data: z.unknown(),
  dialog_data: z.record(z.unknown()).nullish(),
  widget_data: z.record(z.unknown()).nullish(),
});

export interface ContextRecord {
  [field: string]: unknown;
  id: string;
  stack_id: string;
  /** Textual state id, e.g. "Main:start". */
  state: string;
  start_data: unknown;
  dialog_data: Record<string, unknown>;
  widget_data: Record<string, unknown>;
}

export function contextToRecord(context: Context): ContextRecord {
  return {
    id: context.id,
    stack_id: context.stackId,
    state: context.state.state,
    start_data: context.startData,
    dialog_data: context.dialogData,
    widget_data: context.widgetData,
  };
}

/**
 * Rebuilds a context from its persisted form; `resolve` turns the stored state text
 * into the registered `State` and throws when it cannot.
 */
export function contextFromRecord(raw: unknown, resolve: (state: string) => State): Context {
  const record = contextRecordSchema.parse(raw);
  return {
    id: record.id,
    stackId: record.stack_id,
    state: resolve(record.state),
    startData: record.start_data ?? null,
    dialogData: record.dialog_data ?? {},
    widgetData: record.widget_data ?? {},
  };
}
