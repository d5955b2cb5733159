import type { ToolCall, ToolFailure, ToolOutcome } from '../types/storyTypes.js';
import { errorMessage } from '../types/errors.js';
import type { ParameterSpec, ParameterValue, ToolContext, ToolRegistry } from './toolRegistry.js';

export interface ToolInvocationRecord {
  sessionId: string;
  call: ToolCall;
  outcome: ToolOutcome;
  durationMs: number;
}

export interface InvokeOptions {
  onInvocation?: (record: ToolInvocationRecord) => void;
}

type Validation =
  | { ok: true; params: Record<string, ParameterValue> }
  | { ok: false; failure: ToolFailure };

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Looks the call up, validates its parameters against the declared schema and
 * runs the tool. Every failure comes back as data; nothing thrown by a tool escapes.
 */
export async function invokeToolCall(
  call: ToolCall,
  registry: ToolRegistry,
  ctx: ToolContext,
  options: InvokeOptions = {},
): Promise<ToolOutcome> {
  const start = Date.now();
  const outcome = await dispatch(call, registry, ctx);
  const durationMs = Date.now() - start;

  if (outcome.ok) {
    ctx.log.debug({ tool: call.apiName, updates: outcome.updates.length, durationMs }, '[ToolInvoker] tool succeeded');
  } else {
    ctx.log.warn({ tool: call.apiName, failure: outcome.failure, durationMs }, '[ToolInvoker] tool failed');
  }

  if (options.onInvocation) {
    try {
      options.onInvocation({ sessionId: ctx.sessionId, call, outcome, durationMs });
    } catch (err) {
      ctx.log.error({ err, tool: call.apiName }, '[ToolInvoker] invocation hook failed');
    }
  }
  return outcome;
}

async function dispatch(call: ToolCall, registry: ToolRegistry, ctx: ToolContext): Promise<ToolOutcome> {
  const tool = registry.get(call.apiName);
  if (!tool) {
    return { ok: false, tool: call.apiName, failure: { kind: 'UnknownTool' } };
  }

  const validation = validateParameters(call.parameters, tool.parameters);
  if (!validation.ok) {
    return { ok: false, tool: tool.name, failure: validation.failure };
  }

  try {
    const updates = await tool.execute(validation.params, ctx);
    return { ok: true, tool: tool.name, updates };
  } catch (err) {
    return {
      ok: false,
      tool: tool.name,
      failure: { kind: 'ToolExecutionError', message: errorMessage(err) },
    };
  }
}

export function validateParameters(
  raw: Readonly<Record<string, string>>,
  schema: readonly ParameterSpec[],
): Validation {
  const params: Record<string, ParameterValue> = { ...raw };

  for (const spec of schema) {
    const value = raw[spec.name];
    if (value === undefined) {
      if (spec.required) {
        return { ok: false, failure: { kind: 'MissingParameter', parameter: spec.name } };
      }
      continue;
    }

    const coerced = coerce(value, spec);
    if (coerced === undefined) {
      return {
        ok: false,
        failure: { kind: 'BadParameterType', parameter: spec.name, expected: spec.type, received: value },
      };
    }
    params[spec.name] = coerced;
  }

  return { ok: true, params };
}

function coerce(value: string, spec: ParameterSpec): ParameterValue | undefined {
  const trimmed = value.trim();
  switch (spec.type) {
    case 'string':
      return value;
    case 'integer':
      return INTEGER_PATTERN.test(trimmed) ? Number.parseInt(trimmed, 10) : undefined;
    case 'number': {
      if (trimmed === '') return undefined;
      const n = Number(trimmed);
      return Number.isFinite(n) ? n : undefined;
    }
    case 'boolean': {
      const lower = trimmed.toLowerCase();
      if (lower === 'true') return true;
      if (lower === 'false') return false;
      return undefined;
    }
  }
}
