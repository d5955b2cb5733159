import type { RenderState, SlotOutOfRange, SlotUpdate, TranscriptEntry } from '../types/storyTypes.js';

export interface SlotRouterOptions {
  maxScenes: number;
}

export interface SlotApplyResult {
  state: RenderState;
  failures: SlotOutOfRange[];
}

/**
 * Applies updates in order and returns a new state. Scene slots are
 * last-write-wins; transcript writes append a note to the current turn.
 * An out-of-range index skips that one update only.
 */
export function applySlotUpdates(
  state: RenderState,
  updates: readonly SlotUpdate[],
  { maxScenes }: SlotRouterOptions,
): SlotApplyResult {
  let next = state;
  const failures: SlotOutOfRange[] = [];

  for (const update of updates) {
    switch (update.slot) {
      case 'transcript':
        next = updateCurrentEntry(next, (entry) => ({ ...entry, notes: [...entry.notes, update.value] }));
        break;
      case 'story':
        next = { ...next, story: update.value };
        break;
      case 'image':
        if (!inRange(update.index, maxScenes)) {
          failures.push({ kind: 'SlotOutOfRange', slot: 'image', index: update.index, maxScenes });
          break;
        }
        next = { ...next, images: replaceAt(next.images, update.index, update.value) };
        break;
      case 'caption':
        if (!inRange(update.index, maxScenes)) {
          failures.push({ kind: 'SlotOutOfRange', slot: 'caption', index: update.index, maxScenes });
          break;
        }
        next = { ...next, captions: replaceAt(next.captions, update.index, update.value) };
        break;
    }
  }

  return { state: next, failures };
}

/** Frames are cumulative, so each one replaces the current turn's narrative wholesale. */
export function setNarrative(state: RenderState, narrative: string): RenderState {
  return updateCurrentEntry(state, (entry) => ({ ...entry, narrative }));
}

export function beginTurn(state: RenderState, userInput: string): RenderState {
  return { ...state, transcript: [...state.transcript, { user: userInput, narrative: '', notes: [] }] };
}

function updateCurrentEntry(state: RenderState, fn: (entry: TranscriptEntry) => TranscriptEntry): RenderState {
  const last = state.transcript[state.transcript.length - 1];
  if (!last) {
    return { ...state, transcript: [fn({ user: null, narrative: '', notes: [] })] };
  }
  return { ...state, transcript: [...state.transcript.slice(0, -1), fn(last)] };
}

function inRange(index: number, maxScenes: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < maxScenes;
}

function replaceAt<T>(items: readonly T[], index: number, value: T): T[] {
  const copy = [...items];
  copy[index] = value;
  return copy;
}
