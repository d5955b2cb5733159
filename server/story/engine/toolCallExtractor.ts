import { z } from 'zod';
import type { ParseFailure, ToolCall } from '../types/storyTypes.js';

export const TOOL_CALL_START = '<|startofthink|>';
export const TOOL_CALL_END = '<|endofthink|>';

/** The model sometimes continues by writing the user's next turn; everything after this is dropped. */
export const DEFAULT_STOP_MARKERS: readonly string[] = ['<|user|>'];

const ToolCallPayloadSchema = z.object({
  api_name: z.string().min(1),
  parameters: z.record(z.unknown()),
});

export interface ExtractOptions {
  /** Last frame of the turn: nothing more will arrive to complete a block. */
  final?: boolean;
  stopMarkers?: readonly string[];
}

export interface ExtractResult {
  calls: ToolCall[];
  /** Displayable text: extracted spans replaced by a single space, pending block cut off. */
  narrative: string;
  failures: ParseFailure[];
  /** A start marker is still waiting for its end marker. */
  pending: boolean;
}

type PayloadParse =
  | { ok: true; apiName: string; parameters: Record<string, string> }
  | { ok: false; reason: string };

/**
 * Scans the full cumulative text of a frame for delimited tool-call blocks.
 * Never throws: malformed blocks come back as failures and are dropped from the narrative.
 */
export function extractToolCalls(text: string, options: ExtractOptions = {}): ExtractResult {
  const { final = false, stopMarkers = DEFAULT_STOP_MARKERS } = options;
  const source = cutAtStopMarker(text, stopMarkers);

  const calls: ToolCall[] = [];
  const failures: ParseFailure[] = [];
  const parts: string[] = [];
  const seen = new Map<string, number>();
  let pending = false;
  let cursor = 0;

  for (;;) {
    const start = source.indexOf(TOOL_CALL_START, cursor);
    if (start === -1) {
      const tail = source.slice(cursor);
      parts.push(final ? tail : withoutPartialMarker(tail, [TOOL_CALL_START, ...stopMarkers]));
      break;
    }
    parts.push(source.slice(cursor, start));

    const end = source.indexOf(TOOL_CALL_END, start + TOOL_CALL_START.length);
    if (end === -1) {
      const sourceSpan = source.slice(start);
      if (final) {
        failures.push({
          kind: 'ParseFailure',
          reason: 'unterminated tool-call block',
          sourceSpan,
          occurrence: occurrenceKey(seen, sourceSpan),
        });
      } else {
        pending = true;
      }
      break;
    }

    const spanEnd = end + TOOL_CALL_END.length;
    const sourceSpan = source.slice(start, spanEnd);
    const occurrence = occurrenceKey(seen, sourceSpan);
    const parsed = parsePayload(source.slice(start + TOOL_CALL_START.length, end));

    if (parsed.ok) {
      calls.push({ apiName: parsed.apiName, parameters: parsed.parameters, sourceSpan, occurrence });
    } else {
      failures.push({ kind: 'ParseFailure', reason: parsed.reason, sourceSpan, occurrence });
    }
    parts.push(' ');
    cursor = spanEnd;
  }

  return { calls, narrative: parts.join(''), failures, pending };
}

/** Strips ```json fences the model tends to wrap payloads in. */
export function stripCodeFence(payload: string): string {
  return payload
    .trim()
    .replace(/^```(?:json)?\s*/i, '')
    .replace(/\s*```$/, '')
    .trim();
}

function parsePayload(raw: string): PayloadParse {
  let data: unknown;
  try {
    data = JSON.parse(stripCodeFence(raw));
  } catch (err) {
    return { ok: false, reason: `invalid JSON: ${err instanceof Error ? err.message : String(err)}` };
  }

  const result = ToolCallPayloadSchema.safeParse(data);
  if (!result.success) {
    const fields = result.error.issues.map((issue) => issue.path.join('.') || '(root)');
    return { ok: false, reason: `invalid tool-call payload at ${fields.join(', ')}` };
  }

  const parameters: Record<string, string> = {};
  for (const [key, value] of Object.entries(result.data.parameters)) {
    const text = stringifyParameter(value);
    if (text !== undefined) parameters[key] = text;
  }
  return { ok: true, apiName: result.data.api_name, parameters };
}

function stringifyParameter(value: unknown): string | undefined {
  if (value === null || value === undefined) return undefined;
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

export function cutAtStopMarker(text: string, stopMarkers: readonly string[] = DEFAULT_STOP_MARKERS): string {
  let cut = text.length;
  for (const marker of stopMarkers) {
    const at = text.indexOf(marker);
    if (at !== -1 && at < cut) cut = at;
  }
  return text.slice(0, cut);
}

/** Holds back e.g. a trailing "<|startof" or "<|us" until the next frame shows what it becomes. */
function withoutPartialMarker(text: string, markers: readonly string[]): string {
  let held = 0;
  for (const marker of markers) {
    for (let len = Math.min(marker.length - 1, text.length); len > held; len--) {
      if (text.endsWith(marker.slice(0, len))) {
        held = len;
        break;
      }
    }
  }
  return text.slice(0, text.length - held);
}

function occurrenceKey(seen: Map<string, number>, span: string): string {
  const count = seen.get(span) ?? 0;
  seen.set(span, count + 1);
  return `${count}:${span}`;
}
