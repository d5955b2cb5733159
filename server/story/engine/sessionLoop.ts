import type { Logger } from 'pino';
import type {
  Frame,
  FrameSource,
  LoopPhase,
  RenderSnapshot,
  RenderState,
  ToolOutcome,
} from '../types/storyTypes.js';
import { describeSlotOutOfRange, describeToolFailure, errorMessage } from '../types/errors.js';
import { extractToolCalls } from './toolCallExtractor.js';
import { invokeToolCall, type InvokeOptions } from './toolInvoker.js';
import type { ToolContext, ToolRegistry } from './toolRegistry.js';
import { applySlotUpdates, beginTurn, setNarrative } from './slotRouter.js';
import { toSnapshot } from './renderState.js';

export interface TurnOptions {
  sessionId: string;
  registry: ToolRegistry;
  maxScenes: number;
  log: Logger;
  stopMarkers?: readonly string[];
  onPhase?: (phase: LoopPhase) => void;
  onInvocation?: InvokeOptions['onInvocation'];
}

/**
 * Drives one user turn. Yields a snapshot right after the user message is
 * appended and then one per frame; returns the final state.
 *
 * Strictly sequential: a frame is extracted, dispatched, merged and emitted
 * before the next one is pulled, and calls run one at a time in document order.
 */
export async function* runTurn(
  initial: RenderState,
  userInput: string,
  frames: FrameSource,
  options: TurnOptions,
): AsyncGenerator<RenderSnapshot, RenderState, undefined> {
  const { sessionId, registry, maxScenes, log, stopMarkers } = options;
  const ctx: ToolContext = { sessionId, maxScenes, log };
  const dispatched = new Set<string>();
  const reportedParseFailures = new Set<string>();

  const enter = (phase: LoopPhase): void => {
    log.debug({ phase }, '[SessionLoop] phase');
    options.onPhase?.(phase);
  };
  const appendNote = (state: RenderState, note: string): RenderState =>
    applySlotUpdates(state, [{ slot: 'transcript', value: note }], { maxScenes }).state;

  enter('idle');
  let state = beginTurn(initial, userInput);
  yield toSnapshot(state);

  const iterator = frames[Symbol.asyncIterator]();
  let sourceClosed = false;

  try {
    for (;;) {
      enter('awaiting-frame');
      let step: IteratorResult<Frame>;
      try {
        step = await iterator.next();
      } catch (err) {
        sourceClosed = true;
        log.error({ err }, '[SessionLoop] frame source failed');
        state = appendNote(state, `generation failed: ${errorMessage(err)}`);
        enter('emitting');
        yield toSnapshot(state);
        break;
      }

      if (step.done) {
        sourceClosed = true;
        log.error('[SessionLoop] frame source ended without a final frame');
        state = appendNote(state, 'generation failed: stream ended before the final frame');
        enter('emitting');
        yield toSnapshot(state);
        break;
      }

      const frame = step.value;
      enter('extracting');
      const extracted = extractToolCalls(frame.text, { final: frame.isFinal, stopMarkers });

      for (const failure of extracted.failures) {
        if (reportedParseFailures.has(failure.occurrence)) continue;
        reportedParseFailures.add(failure.occurrence);
        log.warn({ reason: failure.reason, span: failure.sourceSpan }, '[SessionLoop] dropped malformed tool call');
      }

      const outcomes: ToolOutcome[] = [];
      const fresh = extracted.calls.filter((call) => !dispatched.has(call.occurrence));
      if (fresh.length > 0) {
        enter('dispatching');
        for (const call of fresh) {
          dispatched.add(call.occurrence);
          outcomes.push(await invokeToolCall(call, registry, ctx, { onInvocation: options.onInvocation }));
        }
      }

      enter('merging');
      for (const outcome of outcomes) {
        if (!outcome.ok) {
          state = appendNote(state, `tool ${outcome.tool} failed: ${describeToolFailure(outcome.failure)}`);
          continue;
        }
        const applied = applySlotUpdates(state, outcome.updates, { maxScenes });
        state = applied.state;
        for (const failure of applied.failures) {
          log.warn({ tool: outcome.tool, failure }, '[SessionLoop] slot update rejected');
          state = appendNote(state, `tool ${outcome.tool}: ${describeSlotOutOfRange(failure)}`);
        }
      }
      state = setNarrative(state, extracted.narrative.trim());

      enter('emitting');
      yield toSnapshot(state);

      if (frame.isFinal) {
        sourceClosed = true;
        break;
      }
    }
  } finally {
    // Consumer walked away mid-turn: release the upstream stream.
    if (!sourceClosed) await iterator.return?.();
  }

  enter('done');
  return state;
}
