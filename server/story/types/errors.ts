import type { SlotOutOfRange, ToolFailure } from './storyTypes.js';

export class DuplicateToolError extends Error {
  constructor(public readonly toolName: string) {
    super(`Tool "${toolName}" is already registered`);
    this.name = 'DuplicateToolError';
  }
}

export class TurnInProgressError extends Error {
  constructor(public readonly sessionId: string) {
    super(`Session ${sessionId} already has a turn in flight`);
    this.name = 'TurnInProgressError';
  }
}

export class SessionNotFoundError extends Error {
  constructor(public readonly sessionId: string) {
    super(`Session ${sessionId} not found`);
    this.name = 'SessionNotFoundError';
  }
}

/** Upstream generation failed outright. Ends the current turn only. */
export class FrameSourceError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'FrameSourceError';
  }
}

/** Thrown by tools when a parameter accessor is misused. Surfaces as ToolExecutionError. */
export class ToolParameterError extends Error {
  constructor(public readonly parameter: string, message: string) {
    super(message);
    this.name = 'ToolParameterError';
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  return String(err);
}

export function describeToolFailure(failure: ToolFailure): string {
  switch (failure.kind) {
    case 'UnknownTool':
      return 'unknown tool';
    case 'MissingParameter':
      return `missing required parameter "${failure.parameter}"`;
    case 'BadParameterType':
      return `parameter "${failure.parameter}" must be ${failure.expected}, got "${failure.received}"`;
    case 'ToolExecutionError':
      return failure.message;
  }
}

export function describeSlotOutOfRange(failure: SlotOutOfRange): string {
  return `${failure.slot} slot ${failure.index} out of range (max ${failure.maxScenes})`;
}
