// ─── Frames ──────────────────────────────────────────────────────────────────

/** One unit of generated text. `text` is cumulative for the whole turn. */
export interface Frame {
  text: string;
  isFinal: boolean;
}

export type FrameSource = AsyncIterable<Frame>;

// ─── Tool calls ──────────────────────────────────────────────────────────────

export interface ToolCall {
  apiName: string;
  parameters: Record<string, string>;
  /** Raw delimited substring, markers included. */
  sourceSpan: string;
  /** Stable across re-scans of cumulative text: raw span + its occurrence index. */
  occurrence: string;
}

export interface ParseFailure {
  kind: 'ParseFailure';
  reason: string;
  sourceSpan: string;
  occurrence: string;
}

// ─── Slots ───────────────────────────────────────────────────────────────────

export interface ImageRef {
  url: string;
  label?: string;
}

export type SlotUpdate =
  | { slot: 'transcript'; value: string }
  | { slot: 'story'; value: string }
  | { slot: 'image'; index: number; value: ImageRef }
  | { slot: 'caption'; index: number; value: string };

export interface SlotOutOfRange {
  kind: 'SlotOutOfRange';
  slot: 'image' | 'caption';
  index: number;
  maxScenes: number;
}

// ─── Tool outcomes ───────────────────────────────────────────────────────────

export type ParameterType = 'string' | 'integer' | 'number' | 'boolean';

export type ToolFailure =
  | { kind: 'UnknownTool' }
  | { kind: 'MissingParameter'; parameter: string }
  | { kind: 'BadParameterType'; parameter: string; expected: ParameterType; received: string }
  | { kind: 'ToolExecutionError'; message: string };

export type ToolOutcome =
  | { ok: true; tool: string; updates: SlotUpdate[] }
  | { ok: false; tool: string; failure: ToolFailure };

// ─── Render state ────────────────────────────────────────────────────────────

export interface TranscriptEntry {
  user: string | null;
  /** Residual narrative of the latest frame; replaced on every frame. */
  narrative: string;
  /** Transcript-slot writes and diagnostics, in arrival order. */
  notes: string[];
}

export interface RenderState {
  readonly transcript: readonly TranscriptEntry[];
  readonly story: string;
  readonly images: readonly (ImageRef | null)[];
  readonly captions: readonly (string | null)[];
}

/** What the driver renders after every frame. */
export interface RenderSnapshot {
  transcript: Array<[string | null, string]>;
  story: string;
  images: Array<ImageRef | null>;
  captions: Array<string | null>;
}

export type LoopPhase =
  | 'idle'
  | 'awaiting-frame'
  | 'extracting'
  | 'dispatching'
  | 'merging'
  | 'emitting'
  | 'done';
