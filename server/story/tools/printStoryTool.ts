import { defineTool, stringParam } from '../engine/toolRegistry.js';

/** Shows the finished story in the story panel. */
export const printStoryTool = defineTool<string>({
  name: 'print_story_tool',
  description: 'Show the complete story text in the story panel once the user is happy with it.',
  parameters: [
    { name: 'text', type: 'string', required: true, description: 'The full story text' },
  ],
  invoke: (params) => stringParam(params, 'text'),
  toSlotUpdates: (text) => [{ slot: 'story', value: text }],
});
