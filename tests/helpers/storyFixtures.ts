import { createLogger } from '../../server/lib/logger.js'
import { TOOL_CALL_END, TOOL_CALL_START } from '../../server/story/engine/toolCallExtractor.js'
import { staticFrames } from '../../server/story/engine/frameSource.js'
import type { ToolContext } from '../../server/story/engine/toolRegistry.js'
import type { StoryBackend } from '../../server/story/state/storySession.js'
import type { Frame, FrameSource } from '../../server/story/types/storyTypes.js'

export const silentLog = createLogger('silent')

export function toolCall(apiName: string, parameters: Record<string, unknown> = {}): string {
  return `${TOOL_CALL_START}${JSON.stringify({ api_name: apiName, parameters })}${TOOL_CALL_END}`
}

export function toolContext(maxScenes = 4): ToolContext {
  return { sessionId: 'session-1', maxScenes, log: silentLog }
}

/** Drains a generator, keeping every yielded value and the return value. */
export async function drain<T, R>(gen: AsyncGenerator<T, R, undefined>): Promise<{ yielded: T[]; result: R }> {
  const yielded: T[] = []
  for (;;) {
    const step = await gen.next()
    if (step.done) return { yielded, result: step.value }
    yielded.push(step.value)
  }
}

/** Backend that replays one scripted frame list per turn. */
export class ScriptedBackend implements StoryBackend {
  readonly inputs: string[] = []
  readonly replaced: boolean[] = []
  resetCount = 0

  constructor(private readonly scripts: Array<ReadonlyArray<string | Frame>>) {}

  stream(userInput: string, options: { replaceLastTurn?: boolean } = {}): FrameSource {
    this.inputs.push(userInput)
    this.replaced.push(options.replaceLastTurn ?? false)
    const script = this.scripts.shift()
    if (!script) throw new Error(`no scripted reply for "${userInput}"`)
    return staticFrames(script)
  }

  reset(): void {
    this.resetCount += 1
  }
}
