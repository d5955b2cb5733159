import type { Frame, FrameSource } from '../types/storyTypes.js';

/**
 * Turns incremental text deltas into cumulative frames. Emits a final frame
 * once the chunk stream completes; an error from the chunk stream propagates.
 */
export async function* framesFromChunks(chunks: AsyncIterable<string>): AsyncGenerator<Frame> {
  let text = '';
  for await (const chunk of chunks) {
    if (!chunk) continue;
    text += chunk;
    yield { text, isFinal: false };
  }
  yield { text, isFinal: true };
}

/**
 * Replays a fixed sequence. Plain strings are treated as cumulative frame
 * texts and the last one is marked final.
 */
export async function* staticFrames(frames: ReadonlyArray<string | Frame>): AsyncGenerator<Frame> {
  for (let i = 0; i < frames.length; i++) {
    const frame = frames[i];
    yield typeof frame === 'string' ? { text: frame, isFinal: i === frames.length - 1 } : frame;
  }
}

/**
 * Opens the underlying source on the first pull, so a backend that throws
 * while starting fails like one whose stream rejects.
 */
export async function* deferredFrames(open: () => FrameSource): AsyncGenerator<Frame> {
  yield* open();
}

export type { Frame, FrameSource };
