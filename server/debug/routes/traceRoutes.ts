import type { FastifyInstance } from 'fastify';
import type { ToolTraceStore } from '../traceStore.js';

function asStatus(value: string | undefined): 'success' | 'failure' | undefined {
  return value === 'success' || value === 'failure' ? value : undefined;
}

export async function traceRoutes(app: FastifyInstance, traces: ToolTraceStore) {
  app.get<{
    Querystring: {
      sessionId?: string;
      tool?: string;
      status?: string;
      limit?: string;
      offset?: string;
    };
  }>('/traces', async (req, reply) => {
    const result = traces.listToolTraces({
      sessionId: req.query.sessionId,
      toolName: req.query.tool,
      status: asStatus(req.query.status),
      limit: req.query.limit ? Number(req.query.limit) : undefined,
      offset: req.query.offset ? Number(req.query.offset) : undefined,
    });
    return reply.send({ traces: result });
  });

  app.get<{
    Params: { traceId: string };
  }>('/traces/:traceId', async (req, reply) => {
    const trace = traces.getToolTrace(req.params.traceId);
    if (!trace) return reply.status(404).send({ error: 'Trace not found' });
    return reply.send(trace);
  });
}
