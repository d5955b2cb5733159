import { createGoogleGenerativeAI } from '@ai-sdk/google';
import type { LanguageModel } from 'ai';

type GoogleClient = ReturnType<typeof createGoogleGenerativeAI>;

let _googleClient: { apiKey: string; client: GoogleClient } | null = null;

export function getGoogleClient(apiKey: string | undefined): GoogleClient {
  if (!apiKey) throw new Error('GEMINI_API_KEY is not set');
  if (!_googleClient || _googleClient.apiKey !== apiKey) {
    _googleClient = { apiKey, client: createGoogleGenerativeAI({ apiKey }) };
  }
  return _googleClient.client;
}

/**
 * Returns the Gemini chat model used for narration and translation.
 * Resolved lazily so the server can boot without a key; the first turn
 * then fails with a visible diagnostic instead.
 */
export function getStoryModel(config: { geminiApiKey?: string; storyModel: string }): LanguageModel {
  return getGoogleClient(config.geminiApiKey)(config.storyModel);
}
