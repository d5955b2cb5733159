import { and, desc, eq } from 'drizzle-orm';
import { v4 as uuidv4 } from 'uuid';
import { openTraceDatabase, type TraceDatabaseHandle } from '../db/index.js';
import { toolTraces, type ToolTraceRow } from '../db/schema.js';
import type { ToolInvocationRecord } from '../story/engine/toolInvoker.js';
import { safeJsonStringify } from './redact.js';

export interface ListToolTraceFilters {
  sessionId?: string;
  toolName?: string;
  status?: 'success' | 'failure';
  limit?: number;
  offset?: number;
}

export interface ToolTrace {
  id: string;
  createdAt: string;
  sessionId: string;
  toolName: string;
  status: string;
  failureKind: string | null;
  durationMs: number;
  params: unknown;
  updates: unknown;
  error: unknown;
}

function parseJsonField(value: string | null): unknown {
  if (!value) return null;
  try {
    return JSON.parse(value);
  } catch {
    return value;
  }
}

function toTrace(row: ToolTraceRow): ToolTrace {
  return {
    id: row.id,
    createdAt: row.createdAt,
    sessionId: row.sessionId,
    toolName: row.toolName,
    status: row.status,
    failureKind: row.failureKind,
    durationMs: row.durationMs,
    params: parseJsonField(row.paramsJson),
    updates: parseJsonField(row.updatesJson),
    error: parseJsonField(row.errorJson),
  };
}

export class ToolTraceStore {
  constructor(private readonly handle: TraceDatabaseHandle) {}

  close(): void {
    this.handle.close();
  }

  recordToolInvocation(record: ToolInvocationRecord): string {
    const { outcome } = record;
    const id = uuidv4();
    this.handle.db.insert(toolTraces).values({
      id,
      createdAt: new Date().toISOString(),
      sessionId: record.sessionId,
      toolName: record.call.apiName,
      status: outcome.ok ? 'success' : 'failure',
      failureKind: outcome.ok ? null : outcome.failure.kind,
      durationMs: record.durationMs,
      paramsJson: safeJsonStringify(record.call.parameters),
      updatesJson: outcome.ok ? safeJsonStringify(outcome.updates) : null,
      errorJson: outcome.ok ? null : safeJsonStringify(outcome.failure),
    }).run();
    return id;
  }

  listToolTraces(filters: ListToolTraceFilters = {}): ToolTrace[] {
    const conditions = [];
    if (filters.sessionId) conditions.push(eq(toolTraces.sessionId, filters.sessionId));
    if (filters.toolName) conditions.push(eq(toolTraces.toolName, filters.toolName));
    if (filters.status) conditions.push(eq(toolTraces.status, filters.status));

    const limit = Math.min(Math.max(filters.limit ?? 50, 1), 200);
    const offset = Math.max(filters.offset ?? 0, 0);

    return this.handle.db
      .select()
      .from(toolTraces)
      .where(conditions.length ? and(...conditions) : undefined)
      .orderBy(desc(toolTraces.createdAt), desc(toolTraces.id))
      .limit(limit)
      .offset(offset)
      .all()
      .map(toTrace);
  }

  getToolTrace(id: string): ToolTrace | null {
    const row = this.handle.db.select().from(toolTraces).where(eq(toolTraces.id, id)).get();
    return row ? toTrace(row) : null;
  }
}

/** Opens the trace database at `dbPath` (or ':memory:') and wraps it. */
export function createTraceStore(dbPath: string): ToolTraceStore {
  return new ToolTraceStore(openTraceDatabase(dbPath));
}
