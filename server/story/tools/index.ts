import { generateText, type LanguageModel } from 'ai';
import { ToolRegistry } from '../engine/toolRegistry.js';
import { generateSceneImage, saveGeneratedImage } from '../../lib/imageGen.js';
import { printStoryTool } from './printStoryTool.js';
import { createShowExampleTool } from './showExampleTool.js';
import { createImageGenerationTool, type ImageRenderer } from './imageGenerationTool.js';
import { createTranslationTool, type Translator } from './translationTool.js';

export interface StoryToolDeps {
  exampleImages: readonly string[];
  renderImage: ImageRenderer;
  translate: Translator;
}

export function buildStoryToolRegistry(deps: StoryToolDeps): ToolRegistry {
  return new ToolRegistry([
    printStoryTool,
    createShowExampleTool(deps.exampleImages),
    createImageGenerationTool(deps.renderImage),
    createTranslationTool(deps.translate),
  ]);
}

/** Gemini image generation, written to disk under a per-session folder. */
export function createGeminiImageRenderer(options: {
  apiKey?: string;
  model: string;
  outputDir: string;
}): ImageRenderer {
  return async (prompt, ctx) => {
    const image = await generateSceneImage(prompt, { apiKey: options.apiKey, model: options.model });
    const url = await saveGeneratedImage(image, options.outputDir, ctx.sessionId);
    ctx.log.info({ url, durationMs: image.durationMs }, '[image_generation] image saved');
    return { url, label: prompt };
  };
}

export function createModelTranslator(resolveModel: () => LanguageModel): Translator {
  return async (text) => {
    const { text: translation } = await generateText({
      model: resolveModel(),
      system: 'Translate the user text from English into Simplified Chinese. Reply with the translation only.',
      prompt: text,
      temperature: 0,
    });
    return translation;
  };
}
