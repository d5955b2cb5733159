import type { ImageRef, SlotUpdate } from '../types/storyTypes.js';
import { defineTool, type ToolCapability } from '../engine/toolRegistry.js';

/**
 * Fills the first image slots with reference pictures so the user can pick an
 * illustration style. Examples beyond the scene count are ignored.
 */
export function createShowExampleTool(exampleImages: readonly string[]): ToolCapability {
  return defineTool<ImageRef[]>({
    name: 'show_image_example',
    description: 'Show example illustrations in different styles to help the user choose a drawing style.',
    parameters: [],
    invoke: (_params, ctx) => {
      if (exampleImages.length === 0) {
        throw new Error('no example images are configured');
      }
      return exampleImages
        .slice(0, ctx.maxScenes)
        .map((url, i) => ({ url, label: `example ${i + 1}` }));
    },
    toSlotUpdates: (images) => images.map((value, index): SlotUpdate => ({ slot: 'image', index, value })),
  });
}
