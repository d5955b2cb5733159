import type { Logger } from 'pino';
import type { ParameterType, SlotUpdate } from '../types/storyTypes.js';
import { DuplicateToolError, ToolParameterError } from '../types/errors.js';

export interface ParameterSpec {
  name: string;
  type: ParameterType;
  required: boolean;
  description: string;
}

export type ParameterValue = string | number | boolean;
export type ToolParameters = Readonly<Record<string, ParameterValue>>;

export interface ToolContext {
  sessionId: string;
  maxScenes: number;
  log: Logger;
}

/**
 * What a tool author writes: the capability plus the contract mapping its
 * result onto render slots.
 */
export interface ToolDescriptor<TResult> {
  name: string;
  description: string;
  parameters: readonly ParameterSpec[];
  invoke(params: ToolParameters, ctx: ToolContext): TResult | Promise<TResult>;
  toSlotUpdates(result: TResult, params: ToolParameters): SlotUpdate[];
}

/** Uniform shape the invoker dispatches to: validated parameters in, slot updates out. */
export interface ToolCapability {
  readonly name: string;
  readonly description: string;
  readonly parameters: readonly ParameterSpec[];
  execute(params: ToolParameters, ctx: ToolContext): Promise<SlotUpdate[]>;
}

export function defineTool<TResult>(descriptor: ToolDescriptor<TResult>): ToolCapability {
  return {
    name: descriptor.name,
    description: descriptor.description,
    parameters: descriptor.parameters,
    execute: async (params, ctx) => {
      const result = await descriptor.invoke(params, ctx);
      return descriptor.toSlotUpdates(result, params);
    },
  };
}

export class ToolRegistry {
  private readonly tools = new Map<string, ToolCapability>();

  constructor(tools: Iterable<ToolCapability> = []) {
    for (const tool of tools) this.register(tool);
  }

  register(tool: ToolCapability): this {
    if (this.tools.has(tool.name)) throw new DuplicateToolError(tool.name);
    this.tools.set(tool.name, tool);
    return this;
  }

  get(name: string): ToolCapability | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  list(): ToolCapability[] {
    return [...this.tools.values()];
  }

  /** Tool list block for the system prompt, one JSON line per tool. */
  describeForPrompt(): string {
    return this.list()
      .map((tool) =>
        JSON.stringify({
          api_name: tool.name,
          description: tool.description,
          parameters: tool.parameters.map(({ name, type, required, description }) => ({
            name,
            type,
            required,
            description,
          })),
        }),
      )
      .join('\n');
  }
}

// ─── Parameter accessors for tool bodies ─────────────────────────────────────

export function stringParam(params: ToolParameters, name: string): string {
  const value = params[name];
  if (typeof value !== 'string') {
    throw new ToolParameterError(name, `parameter "${name}" is not a string`);
  }
  return value;
}

export function optionalStringParam(params: ToolParameters, name: string): string | undefined {
  return params[name] === undefined ? undefined : stringParam(params, name);
}

export function integerParam(params: ToolParameters, name: string): number {
  const value = params[name];
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new ToolParameterError(name, `parameter "${name}" is not an integer`);
  }
  return value;
}
