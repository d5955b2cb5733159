import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest'
import os from 'node:os'
import path from 'node:path'
import { buildApp } from '../server/app.js'
import { loadConfig } from '../server/config.js'
import { createTraceStore } from '../server/debug/traceStore.js'
import { ToolRegistry } from '../server/story/engine/toolRegistry.js'
import { printStoryTool } from '../server/story/tools/printStoryTool.js'
import type { StoryBackend } from '../server/story/state/storySession.js'
import type { Frame } from '../server/story/types/storyTypes.js'
import { ScriptedBackend, silentLog, toolCall } from './helpers/storyFixtures.js'

const config = loadConfig({
  STORY_GREETING: 'Hello there',
  STORY_MAX_SCENES: '2',
  STORY_OUTPUT_DIR: path.join(os.tmpdir(), 'story-agent-route-spec'),
})

const registry = new ToolRegistry([printStoryTool])

async function setup(backend: () => StoryBackend) {
  return buildApp({
    config,
    logger: silentLog,
    traceStore: createTraceStore(':memory:'),
    sessionFactory: () => ({ registry, backend: backend(), maxScenes: config.maxScenes, greeting: config.greeting }),
  })
}

function ndjson(body: string): unknown[] {
  return body
    .split('\n')
    .filter((line) => line.length > 0)
    .map((line) => JSON.parse(line))
}

describe('story routes', () => {
  let scripts: Array<Array<string | Frame>>
  let app: Awaited<ReturnType<typeof setup>>

  beforeEach(async () => {
    scripts = []
    app = await setup(() => new ScriptedBackend(scripts))
  })

  afterEach(async () => {
    await app.close()
  })

  async function createSession(): Promise<string> {
    const res = await app.inject({ method: 'POST', url: '/api/story/sessions' })
    expect(res.statusCode).toBe(201)
    return res.json().sessionId
  }

  it('answers the health check', async () => {
    const res = await app.inject({ method: 'GET', url: '/health' })
    expect(res.json()).toEqual({ status: 'ok', sessions: 0 })
  })

  it('creates a session holding the greeting', async () => {
    const res = await app.inject({ method: 'POST', url: '/api/story/sessions' })
    expect(res.statusCode).toBe(201)
    expect(res.json().snapshot).toEqual({
      transcript: [[null, 'Hello there']],
      story: '',
      images: [null, null],
      captions: [null, null],
    })
  })

  it('streams one snapshot per step and then done', async () => {
    scripts.push([`Once ${toolCall('print_story_tool', { text: 'A fox.' })}`])
    const sessionId = await createSession()

    const res = await app.inject({
      method: 'POST',
      url: `/api/story/sessions/${sessionId}/turns`,
      payload: { message: 'a fox story' },
    })

    expect(res.statusCode).toBe(200)
    expect(res.headers['content-type']).toMatch(/^application\/x-ndjson/)
    expect(ndjson(res.body)).toEqual([
      {
        type: 'snapshot',
        snapshot: { transcript: [[null, 'Hello there'], ['a fox story', '']], story: '', images: [null, null], captions: [null, null] },
      },
      {
        type: 'snapshot',
        snapshot: {
          transcript: [[null, 'Hello there'], ['a fox story', 'Once']],
          story: 'A fox.',
          images: [null, null],
          captions: [null, null],
        },
      },
      { type: 'done' },
    ])

    const session = await app.inject({ method: 'GET', url: `/api/story/sessions/${sessionId}` })
    expect(session.json().snapshot.story).toBe('A fox.')
    expect(session.json().busy).toBe(false)
  })

  it('records tool invocations as traces', async () => {
    scripts.push([toolCall('print_story_tool', { text: 'A fox.' })])
    const sessionId = await createSession()
    await app.inject({ method: 'POST', url: `/api/story/sessions/${sessionId}/turns`, payload: { message: 'go' } })

    const res = await app.inject({ method: 'GET', url: `/api/debug/traces?sessionId=${sessionId}` })
    const { traces } = res.json()
    expect(traces).toHaveLength(1)
    expect(traces[0]).toMatchObject({ toolName: 'print_story_tool', status: 'success', params: { text: 'A fox.' } })

    const single = await app.inject({ method: 'GET', url: `/api/debug/traces/${traces[0].id}` })
    expect(single.json().id).toBe(traces[0].id)
    const missing = await app.inject({ method: 'GET', url: '/api/debug/traces/missing' })
    expect(missing.statusCode).toBe(404)
  })

  it('rejects an empty message', async () => {
    const sessionId = await createSession()
    const res = await app.inject({
      method: 'POST',
      url: `/api/story/sessions/${sessionId}/turns`,
      payload: { message: '   ' },
    })
    expect(res.statusCode).toBe(400)
  })

  it('returns 404 for an unknown session', async () => {
    const turn = await app.inject({
      method: 'POST',
      url: '/api/story/sessions/missing/turns',
      payload: { message: 'hi' },
    })
    expect(turn.statusCode).toBe(404)
    const get = await app.inject({ method: 'GET', url: '/api/story/sessions/missing' })
    expect(get.statusCode).toBe(404)
  })

  it('rejects a turn while another is in flight', async () => {
    let release: () => void = () => {}
    const gate = new Promise<void>((resolve) => {
      release = resolve
    })
    await app.close()
    app = await setup(() => ({
      async *stream() {
        await gate
        yield { text: 'slow reply', isFinal: true }
      },
      reset() {},
    }))
    const sessionId = await createSession()

    const first = app.inject({ method: 'POST', url: `/api/story/sessions/${sessionId}/turns`, payload: { message: 'one' } })
    await vi.waitFor(async () => {
      const res = await app.inject({ method: 'GET', url: `/api/story/sessions/${sessionId}` })
      expect(res.json().busy).toBe(true)
    })

    const second = await app.inject({
      method: 'POST',
      url: `/api/story/sessions/${sessionId}/turns`,
      payload: { message: 'two' },
    })
    expect(second.statusCode).toBe(409)

    release()
    const done = await first
    expect(ndjson(done.body).at(-1)).toEqual({ type: 'done' })
  })

  it('regenerates the last turn', async () => {
    scripts.push(['first answer'], ['second answer'])
    const sessionId = await createSession()
    await app.inject({ method: 'POST', url: `/api/story/sessions/${sessionId}/turns`, payload: { message: 'go' } })

    const res = await app.inject({ method: 'POST', url: `/api/story/sessions/${sessionId}/regenerate` })
    const lines = ndjson(res.body)
    expect(lines.at(-2)).toEqual({
      type: 'snapshot',
      snapshot: { transcript: [[null, 'Hello there'], ['go', 'second answer']], story: '', images: [null, null], captions: [null, null] },
    })
  })

  it('refuses to regenerate before any turn', async () => {
    const sessionId = await createSession()
    const res = await app.inject({ method: 'POST', url: `/api/story/sessions/${sessionId}/regenerate` })
    expect(res.statusCode).toBe(409)
  })

  it('resets a session to its greeting', async () => {
    scripts.push([toolCall('print_story_tool', { text: 'A fox.' })])
    const sessionId = await createSession()
    await app.inject({ method: 'POST', url: `/api/story/sessions/${sessionId}/turns`, payload: { message: 'go' } })

    const res = await app.inject({ method: 'POST', url: `/api/story/sessions/${sessionId}/reset` })
    expect(res.json()).toEqual({
      snapshot: { transcript: [[null, 'Hello there']], story: '', images: [null, null], captions: [null, null] },
    })
  })

  it('deletes a session', async () => {
    const sessionId = await createSession()
    const del = await app.inject({ method: 'DELETE', url: `/api/story/sessions/${sessionId}` })
    expect(del.statusCode).toBe(204)
    const get = await app.inject({ method: 'GET', url: `/api/story/sessions/${sessionId}` })
    expect(get.statusCode).toBe(404)
  })
})
