import { sqliteTable, text, integer } from 'drizzle-orm/sqlite-core';

/**
 * One row per tool invocation dispatched from a story turn.
 */
export const toolTraces = sqliteTable('tool_traces', {
  id: text('id').primaryKey(),
  createdAt: text('created_at').notNull(),
  sessionId: text('session_id').notNull(),
  toolName: text('tool_name').notNull(),
  /** 'success' | 'failure' */
  status: text('status').notNull(),
  /** ToolFailure kind; null on success. */
  failureKind: text('failure_kind'),
  durationMs: integer('duration_ms').notNull(),
  /** Raw string parameters as extracted from the model output (redacted, truncated). */
  paramsJson: text('params_json').notNull(),
  /** Slot updates produced on success. */
  updatesJson: text('updates_json'),
  errorJson: text('error_json'),
});

export type ToolTraceRow = typeof toolTraces.$inferSelect;
