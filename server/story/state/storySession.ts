import type { Logger } from 'pino';
import type { FrameSource, LoopPhase, RenderSnapshot, RenderState } from '../types/storyTypes.js';
import { TurnInProgressError } from '../types/errors.js';
import type { ToolRegistry } from '../engine/toolRegistry.js';
import type { ToolInvocationRecord } from '../engine/toolInvoker.js';
import { runTurn } from '../engine/sessionLoop.js';
import { createRenderState, toSnapshot } from '../engine/renderState.js';
import { deferredFrames } from '../engine/frameSource.js';

/** Generation side of a session: produces frames and keeps its own memory. */
export interface StoryBackend {
  /** With `replaceLastTurn`, the newest exchange is regenerated: hidden from the prompt and swapped out only once the stream completes. */
  stream(userInput: string, options?: { replaceLastTurn?: boolean }): FrameSource;
  reset(): void;
}

export interface StorySessionOptions {
  sessionId: string;
  registry: ToolRegistry;
  backend: StoryBackend;
  maxScenes: number;
  greeting?: string;
  log: Logger;
  onInvocation?: (record: ToolInvocationRecord) => void;
  onPhase?: (phase: LoopPhase) => void;
}

/**
 * One story-building conversation. Owns the render state between turns and
 * serializes turns: a second turn while one is in flight is rejected.
 */
export class StorySession {
  readonly sessionId: string;
  private state: RenderState;
  private busy = false;
  private destroyed = false;
  /** Bumped by reset(); a turn started under an older epoch stops yielding and never commits. */
  private epoch = 0;
  private lastInput: string | null = null;

  constructor(private readonly options: StorySessionOptions) {
    this.sessionId = options.sessionId;
    this.state = this.initialState();
  }

  get isBusy(): boolean {
    return this.busy;
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }

  get canRegenerate(): boolean {
    return this.lastInput !== null;
  }

  snapshot(): RenderSnapshot {
    return toSnapshot(this.state);
  }

  /**
   * Runs one turn, yielding a render snapshot after the user message and after
   * every frame. The state is committed once the turn reaches its end.
   */
  runTurn(userInput: string): AsyncGenerator<RenderSnapshot, void, undefined> {
    this.acquire();
    return this.drive(userInput, this.state, false);
  }

  /**
   * Re-runs the last user input in place of the last turn. The earlier turn
   * stays in the transcript and in memory until the new one completes.
   */
  regenerate(): AsyncGenerator<RenderSnapshot, void, undefined> {
    const input = this.lastInput;
    if (input === null) throw new Error('Nothing to regenerate');
    this.acquire();
    const start = { ...this.state, transcript: this.state.transcript.slice(0, -1) };
    return this.drive(input, start, true);
  }

  /** Clears render state and agent memory; the session behaves as if freshly created. */
  reset(): void {
    this.epoch += 1;
    this.busy = false;
    this.lastInput = null;
    this.options.backend.reset();
    this.state = this.initialState();
    this.options.log.info('[StorySession] reset');
  }

  destroy(): void {
    this.reset();
    this.destroyed = true;
  }

  private acquire(): void {
    if (this.destroyed) throw new Error(`Session ${this.sessionId} has been destroyed`);
    if (this.busy) throw new TurnInProgressError(this.sessionId);
    this.busy = true;
  }

  private async *drive(
    userInput: string,
    start: RenderState,
    replaceLastTurn: boolean,
  ): AsyncGenerator<RenderSnapshot, void, undefined> {
    const epoch = this.epoch;
    const { registry, backend, maxScenes, log } = this.options;
    log.info({ inputLength: userInput.length, replaceLastTurn }, '[StorySession] turn started');

    const frames = deferredFrames(() => backend.stream(userInput, { replaceLastTurn }));
    const turn = runTurn(start, userInput, frames, {
      sessionId: this.sessionId,
      registry,
      maxScenes,
      log,
      onPhase: this.options.onPhase,
      onInvocation: this.options.onInvocation,
    });

    try {
      for (;;) {
        const step = await turn.next();
        if (epoch !== this.epoch) {
          log.info('[StorySession] turn discarded after reset');
          return;
        }
        if (step.done) {
          this.state = step.value;
          this.lastInput = userInput;
          log.info({ entries: step.value.transcript.length }, '[StorySession] turn finished');
          return;
        }
        yield step.value;
      }
    } finally {
      if (epoch === this.epoch) this.busy = false;
      await turn.return(start);
    }
  }

  private initialState(): RenderState {
    return createRenderState({ maxScenes: this.options.maxScenes, greeting: this.options.greeting });
  }
}
