import { Readable } from 'node:stream';
import type { FastifyInstance, FastifyReply } from 'fastify';
import type { RenderSnapshot } from '../types/storyTypes.js';
import { SessionNotFoundError, TurnInProgressError, errorMessage } from '../types/errors.js';
import type { StorySession } from '../state/storySession.js';
import type { StorySessionStore } from '../state/storySessionStore.js';

type StreamLine = { type: 'snapshot'; snapshot: RenderSnapshot } | { type: 'done' };

function line(value: StreamLine): string {
  return `${JSON.stringify(value)}\n`;
}

/**
 * NDJSON body for one turn. The first snapshot is pulled before the reply is
 * sent so that the turn has started (and holds the session) by the time
 * headers go out; the finally closes the turn if the client disconnects.
 */
async function* ndjsonTurn(
  first: IteratorResult<RenderSnapshot, void>,
  turn: AsyncGenerator<RenderSnapshot, void, undefined>,
): AsyncGenerator<string> {
  try {
    if (!first.done) yield line({ type: 'snapshot', snapshot: first.value });
    for await (const snapshot of turn) {
      yield line({ type: 'snapshot', snapshot });
    }
    yield line({ type: 'done' });
  } finally {
    await turn.return();
  }
}

function sendError(reply: FastifyReply, err: unknown) {
  if (err instanceof SessionNotFoundError) {
    return reply.status(404).send({ error: err.message });
  }
  if (err instanceof TurnInProgressError) {
    return reply.status(409).send({ error: err.message });
  }
  throw err;
}

async function streamTurn(
  reply: FastifyReply,
  start: () => AsyncGenerator<RenderSnapshot, void, undefined>,
) {
  let turn: AsyncGenerator<RenderSnapshot, void, undefined>;
  try {
    turn = start();
  } catch (err) {
    return sendError(reply, err);
  }
  const first = await turn.next();
  return reply.type('application/x-ndjson').send(Readable.from(ndjsonTurn(first, turn)));
}

export async function storyRoute(app: FastifyInstance, sessions: StorySessionStore) {
  const lookup = (reply: FastifyReply, sessionId: string): StorySession | null => {
    try {
      return sessions.get(sessionId);
    } catch (err) {
      sendError(reply, err);
      return null;
    }
  };

  app.post('/sessions', async (req, reply) => {
    const session = sessions.create();
    req.log.info({ sessionId: session.sessionId }, '[StoryRoute] session created');
    return reply.status(201).send({ sessionId: session.sessionId, snapshot: session.snapshot() });
  });

  app.get<{
    Params: { sessionId: string };
  }>('/sessions/:sessionId', async (req, reply) => {
    const session = lookup(reply, req.params.sessionId);
    if (!session) return reply;
    return reply.send({ sessionId: session.sessionId, busy: session.isBusy, snapshot: session.snapshot() });
  });

  app.post<{
    Params: { sessionId: string };
    Body: { message?: unknown };
  }>('/sessions/:sessionId/turns', async (req, reply) => {
    const message = req.body?.message;
    if (typeof message !== 'string' || message.trim().length === 0) {
      return reply.status(400).send({ error: 'message must be a non-empty string' });
    }
    const session = lookup(reply, req.params.sessionId);
    if (!session) return reply;

    req.log.info({ sessionId: session.sessionId, messageLength: message.length }, '[StoryRoute] turn requested');
    return streamTurn(reply, () => session.runTurn(message.trim()));
  });

  app.post<{
    Params: { sessionId: string };
  }>('/sessions/:sessionId/regenerate', async (req, reply) => {
    const session = lookup(reply, req.params.sessionId);
    if (!session) return reply;
    if (!session.canRegenerate) {
      return reply.status(409).send({ error: 'Nothing to regenerate' });
    }

    req.log.info({ sessionId: session.sessionId }, '[StoryRoute] regenerate requested');
    return streamTurn(reply, () => session.regenerate());
  });

  app.post<{
    Params: { sessionId: string };
  }>('/sessions/:sessionId/reset', async (req, reply) => {
    const session = lookup(reply, req.params.sessionId);
    if (!session) return reply;
    session.reset();
    return reply.send({ snapshot: session.snapshot() });
  });

  app.delete<{
    Params: { sessionId: string };
  }>('/sessions/:sessionId', async (req, reply) => {
    if (!sessions.destroy(req.params.sessionId)) {
      return reply.status(404).send({ error: `Session ${req.params.sessionId} not found` });
    }
    return reply.status(204).send();
  });

  app.setErrorHandler((err, req, reply) => {
    req.log.error({ err }, '[StoryRoute] request failed');
    return reply.status(500).send({ error: errorMessage(err) });
  });
}
