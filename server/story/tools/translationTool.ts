import { defineTool, stringParam, type ToolCapability } from '../engine/toolRegistry.js';

export type Translator = (text: string) => Promise<string>;

/** English → Chinese translation; the result is written into the conversation. */
export function createTranslationTool(translate: Translator): ToolCapability {
  return defineTool<string>({
    name: 'text-translation-en2zh',
    description: 'Translate English text into Chinese according to the user instruction.',
    parameters: [
      { name: 'input', type: 'string', required: true, description: 'English text to translate' },
    ],
    invoke: async (params) => (await translate(stringParam(params, 'input'))).trim(),
    toSlotUpdates: (translation) => [{ slot: 'transcript', value: translation }],
  });
}
