import type { ImageRef } from '../types/storyTypes.js';
import {
  defineTool,
  integerParam,
  optionalStringParam,
  stringParam,
  type ToolCapability,
  type ToolContext,
} from '../engine/toolRegistry.js';

/** Renders a prompt to an image and returns where it can be fetched from. */
export type ImageRenderer = (prompt: string, ctx: ToolContext) => Promise<ImageRef>;

export function buildImagePrompt(text: string, style: string | undefined): string {
  return style ? `${style} style illustration: ${text}` : `Illustration: ${text}`;
}

/**
 * Illustrates one scene of the story. The scene index `idx` addresses both
 * the image slot and the caption slot, so re-running it for the same scene
 * replaces the earlier picture.
 */
export function createImageGenerationTool(render: ImageRenderer): ToolCapability {
  return defineTool<ImageRef>({
    name: 'image_generation',
    description: 'Generate an illustration for one scene of the story and show it with the scene text.',
    parameters: [
      { name: 'text', type: 'string', required: true, description: 'Scene text to illustrate' },
      { name: 'idx', type: 'integer', required: true, description: 'Zero-based scene index, as a string, e.g. "0"' },
      { name: 'type', type: 'string', required: false, description: 'Illustration style, e.g. "cartoon" or "cyberpunk"' },
    ],
    invoke: (params, ctx) =>
      render(buildImagePrompt(stringParam(params, 'text'), optionalStringParam(params, 'type')), ctx),
    toSlotUpdates: (image, params) => {
      const index = integerParam(params, 'idx');
      return [
        { slot: 'image', index, value: image },
        { slot: 'caption', index, value: stringParam(params, 'text') },
      ];
    },
  });
}
