import { describe, it, expect } from 'vitest'
import { simulateReadableStream } from 'ai'
import { MockLanguageModelV2 } from 'ai/test'
import type { LanguageModelV2StreamPart } from '@ai-sdk/provider'
import { StoryAgent } from '../server/story/agents/storyAgent.js'
import { StorySession } from '../server/story/state/storySession.js'
import { StorySessionStore } from '../server/story/state/storySessionStore.js'
import { ToolRegistry } from '../server/story/engine/toolRegistry.js'
import { printStoryTool } from '../server/story/tools/printStoryTool.js'
import { SessionNotFoundError, TurnInProgressError } from '../server/story/types/errors.js'
import { ScriptedBackend, drain, silentLog, toolCall } from './helpers/storyFixtures.js'

const registry = new ToolRegistry([printStoryTool])

function createSession(backend: ScriptedBackend, greeting?: string) {
  return new StorySession({ sessionId: 's1', registry, backend, maxScenes: 2, greeting, log: silentLog })
}

describe('StorySession', () => {
  it('commits the final state once the turn completes', async () => {
    const backend = new ScriptedBackend([[`Here it is. ${toolCall('print_story_tool', { text: 'A fox.' })}`]])
    const session = createSession(backend, 'Hello')
    const { yielded } = await drain(session.runTurn('a fox story'))

    expect(yielded).toHaveLength(2)
    expect(session.snapshot()).toEqual({
      transcript: [[null, 'Hello'], ['a fox story', 'Here it is.']],
      story: 'A fox.',
      images: [null, null],
      captions: [null, null],
    })
    expect(session.isBusy).toBe(false)
    expect(session.canRegenerate).toBe(true)
    expect(backend.inputs).toEqual(['a fox story'])
  })

  it('rejects a second turn while one is in flight', async () => {
    const session = createSession(new ScriptedBackend([['one'], ['two']]))
    const first = session.runTurn('first')
    await first.next()

    expect(session.isBusy).toBe(true)
    expect(() => session.runTurn('second')).toThrow(TurnInProgressError)

    await drain(first)
    await drain(session.runTurn('second'))
    expect(session.snapshot().transcript).toEqual([['first', 'one'], ['second', 'two']])
  })

  it('returns to the fresh state on reset', async () => {
    const backend = new ScriptedBackend([[toolCall('print_story_tool', { text: 'A fox.' })]])
    const session = createSession(backend, 'Hello')
    await drain(session.runTurn('go'))
    session.reset()

    expect(session.snapshot()).toEqual(createSession(new ScriptedBackend([]), 'Hello').snapshot())
    expect(backend.resetCount).toBe(1)
    expect(session.canRegenerate).toBe(false)
  })

  it('drops an in-flight turn on reset', async () => {
    const session = createSession(new ScriptedBackend([['a', 'ab', 'abc']]))
    const turn = session.runTurn('go')
    await turn.next()
    session.reset()

    const step = await turn.next()
    expect(step.done).toBe(true)
    expect(session.snapshot().transcript).toEqual([])
    expect(session.isBusy).toBe(false)
  })

  it('regenerates the last turn from the same input', async () => {
    const backend = new ScriptedBackend([['first answer'], ['second answer']])
    const session = createSession(backend)
    await drain(session.runTurn('tell me a story'))
    await drain(session.regenerate())

    expect(session.snapshot().transcript).toEqual([['tell me a story', 'second answer']])
    expect(backend.inputs).toEqual(['tell me a story', 'tell me a story'])
    expect(backend.replaced).toEqual([false, true])
  })

  it('keeps the previous turn when a regenerate is abandoned', async () => {
    const backend = new ScriptedBackend([['one'], ['two'], ['four']])
    const session = createSession(backend)
    await drain(session.runTurn('a'))
    await drain(session.runTurn('b'))

    const regen = session.regenerate()
    const first = await regen.next()
    expect(first.value).toMatchObject({ transcript: [['a', 'one'], ['b', '']] })
    await regen.return()

    expect(session.snapshot().transcript).toEqual([['a', 'one'], ['b', 'two']])
    expect(session.isBusy).toBe(false)
    expect(session.canRegenerate).toBe(true)

    await drain(session.regenerate())
    expect(session.snapshot().transcript).toEqual([['a', 'one'], ['b', 'four']])
  })

  it('ends the turn with a note when the backend cannot start a stream', async () => {
    const scripts: string[][] = []
    const session = createSession(new ScriptedBackend(scripts))
    const { yielded } = await drain(session.runTurn('hi'))

    expect(yielded.at(-1)?.transcript).toEqual([['hi', 'generation failed: no scripted reply for "hi"']])
    expect(session.isBusy).toBe(false)

    scripts.push(['ok'])
    await drain(session.runTurn('again'))
    expect(session.snapshot().transcript).toEqual([
      ['hi', 'generation failed: no scripted reply for "hi"'],
      ['again', 'ok'],
    ])
  })

  it('does not let a stream cut off by reset write to agent memory', async () => {
    const model = new MockLanguageModelV2({
      doStream: async () => ({
        stream: simulateReadableStream({
          chunks: [
            { type: 'text-start', id: 't1' },
            { type: 'text-delta', id: 't1', delta: 'Once' },
            { type: 'text-end', id: 't1' },
            { type: 'finish', finishReason: 'stop', usage: { inputTokens: 1, outputTokens: 1, totalTokens: 2 } },
          ] satisfies LanguageModelV2StreamPart[],
        }),
      }),
    })
    const agent = new StoryAgent({ registry, model, maxScenes: 2, maxHistoryTurns: 20, log: silentLog })
    const session = new StorySession({ sessionId: 's1', registry, backend: agent, maxScenes: 2, log: silentLog })

    const turn = session.runTurn('hi')
    await turn.next()
    await turn.next()
    session.reset()
    const step = await turn.next()

    expect(step.done).toBe(true)
    expect(agent.history).toEqual([])
    expect(session.snapshot().transcript).toEqual([])
  })

  it('refuses to regenerate before any turn', () => {
    const session = createSession(new ScriptedBackend([]))
    expect(() => session.regenerate()).toThrow('Nothing to regenerate')
  })

  it('refuses turns once destroyed', () => {
    const session = createSession(new ScriptedBackend([['x']]))
    session.destroy()
    expect(session.isDestroyed).toBe(true)
    expect(() => session.runTurn('x')).toThrow('Session s1 has been destroyed')
  })
})

describe('StorySessionStore', () => {
  const store = () =>
    new StorySessionStore(() => ({ registry, backend: new ScriptedBackend([]), maxScenes: 1 }), silentLog)

  it('creates sessions and returns the same one for a known id', () => {
    const sessions = store()
    const session = sessions.create('abc')
    expect(sessions.create('abc')).toBe(session)
    expect(sessions.get('abc')).toBe(session)
    expect(sessions.size).toBe(1)
  })

  it('generates an id when none is given', () => {
    const session = store().create()
    expect(session.sessionId).toMatch(/^[0-9a-f-]{36}$/)
  })

  it('throws for an unknown session', () => {
    expect(() => store().get('missing')).toThrow(SessionNotFoundError)
  })

  it('destroys sessions', () => {
    const sessions = store()
    const session = sessions.create('abc')
    expect(sessions.destroy('abc')).toBe(true)
    expect(sessions.destroy('abc')).toBe(false)
    expect(sessions.has('abc')).toBe(false)
    expect(session.isDestroyed).toBe(true)
  })
})
