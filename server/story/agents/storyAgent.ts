import { streamText, type LanguageModel, type ModelMessage } from 'ai';
import type { Logger } from 'pino';
import type { Frame } from '../types/storyTypes.js';
import { FrameSourceError, errorMessage } from '../types/errors.js';
import type { ToolRegistry } from '../engine/toolRegistry.js';
import { cutAtStopMarker } from '../engine/toolCallExtractor.js';
import { buildSystemPrompt, TURN_REMINDER } from './storyPrompt.js';

export interface StreamOptions {
  /** Regenerate: the newest user/assistant pair is left out of the prompt and replaced once the stream completes. */
  replaceLastTurn?: boolean;
}

export interface StoryAgentOptions {
  registry: ToolRegistry;
  /** A model, or a resolver called at the start of every turn. */
  model: LanguageModel | (() => LanguageModel);
  maxScenes: number;
  maxHistoryTurns: number;
  log: Logger;
  temperature?: number;
}

/**
 * The language-model side of a session: owns the conversation memory and
 * exposes each generation as a stream of cumulative frames.
 */
export class StoryAgent {
  private messages: ModelMessage[] = [];
  /** Bumped by reset(); a stream started before it never writes to memory. */
  private generation = 0;
  private readonly system: string;

  constructor(private readonly options: StoryAgentOptions) {
    this.system = buildSystemPrompt(options.registry, options.maxScenes);
  }

  get history(): readonly ModelMessage[] {
    return this.messages;
  }

  get systemPrompt(): string {
    return this.system;
  }

  async *stream(userInput: string, options: StreamOptions = {}): AsyncGenerator<Frame> {
    const { log, temperature = 0.8 } = this.options;
    const { replaceLastTurn = false } = options;
    const generation = this.generation;
    const userMessage: ModelMessage = { role: 'user', content: `${userInput}${TURN_REMINDER}` };

    let model: LanguageModel;
    try {
      model = this.resolveModel();
    } catch (err) {
      throw new FrameSourceError(errorMessage(err), err);
    }

    const result = streamText({
      model,
      system: this.system,
      messages: [...this.priorMessages(replaceLastTurn), userMessage],
      temperature,
      onError: ({ error }) => {
        log.debug({ err: error }, '[StoryAgent] stream error');
      },
    });

    let text = '';
    try {
      for await (const part of result.fullStream) {
        if (part.type === 'text-delta') {
          if (!part.text) continue;
          text += part.text;
          yield { text, isFinal: false };
        } else if (part.type === 'error') {
          throw new FrameSourceError(errorMessage(part.error), part.error);
        }
      }
    } catch (err) {
      if (err instanceof FrameSourceError) throw err;
      throw new FrameSourceError(errorMessage(err), err);
    }

    // Remembered before the final frame: consumers stop pulling once they see it.
    if (generation === this.generation) {
      this.remember(userMessage, cutAtStopMarker(text).trim(), replaceLastTurn);
    } else {
      log.info('[StoryAgent] stream finished after reset; not remembered');
    }
    yield { text, isFinal: true };
  }

  /** Drops the most recent user/assistant pair. */
  forgetLastTurn(): void {
    this.messages = this.messages.slice(0, -2);
  }

  reset(): void {
    this.generation += 1;
    this.messages = [];
  }

  private priorMessages(replaceLastTurn: boolean): ModelMessage[] {
    return replaceLastTurn ? this.messages.slice(0, -2) : this.messages;
  }

  private remember(userMessage: ModelMessage, assistantText: string, replaceLastTurn: boolean): void {
    const maxEntries = this.options.maxHistoryTurns * 2;
    this.messages = [
      ...this.priorMessages(replaceLastTurn),
      userMessage,
      { role: 'assistant' as const, content: assistantText },
    ].slice(-maxEntries);
  }

  private resolveModel(): LanguageModel {
    const { model } = this.options;
    return typeof model === 'function' ? model() : model;
  }
}
