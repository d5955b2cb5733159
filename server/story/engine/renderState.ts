import type { RenderSnapshot, RenderState, TranscriptEntry } from '../types/storyTypes.js';

export interface RenderStateOptions {
  maxScenes: number;
  /** Opening agent line shown before the first user turn. */
  greeting?: string;
}

export function createRenderState({ maxScenes, greeting }: RenderStateOptions): RenderState {
  return {
    transcript: greeting ? [{ user: null, narrative: greeting, notes: [] }] : [],
    story: '',
    images: Array.from({ length: maxScenes }, () => null),
    captions: Array.from({ length: maxScenes }, () => null),
  };
}

export function agentText(entry: TranscriptEntry): string {
  return [entry.narrative, ...entry.notes].filter((part) => part.length > 0).join('\n');
}

/** Detached copy handed to the driver. */
export function toSnapshot(state: RenderState): RenderSnapshot {
  return {
    transcript: state.transcript.map((entry): [string | null, string] => [entry.user, agentText(entry)]),
    story: state.story,
    images: state.images.map((image) => (image ? { ...image } : null)),
    captions: [...state.captions],
  };
}
