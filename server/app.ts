import Fastify from 'fastify';
import cors from '@fastify/cors';
import staticFiles from '@fastify/static';
import fs from 'node:fs';
import path from 'node:path';
import type { AppConfig } from './config.js';
import { createLogger, type Logger } from './lib/logger.js';
import { getStoryModel } from './lib/modelFactory.js';
import { createTraceStore, type ToolTraceStore } from './debug/traceStore.js';
import { traceRoutes } from './debug/routes/traceRoutes.js';
import { StoryAgent } from './story/agents/storyAgent.js';
import {
  buildStoryToolRegistry,
  createGeminiImageRenderer,
  createModelTranslator,
} from './story/tools/index.js';
import { StorySessionStore, type StorySessionFactory } from './story/state/storySessionStore.js';
import { storyRoute } from './story/routes/storyRoute.js';

export interface StoryAppOptions {
  config: AppConfig;
  logger?: Logger;
  /** Replaces the Gemini-backed session parts (tests pass scripted backends). */
  sessionFactory?: StorySessionFactory;
  /** Defaults to a store opened at `config.traceDbPath`. */
  traceStore?: ToolTraceStore;
}

/** Sessions backed by a StoryAgent on the configured Gemini model and the four story tools. */
export function createGeminiSessionFactory(config: AppConfig): StorySessionFactory {
  const resolveModel = () => getStoryModel(config);
  const registry = buildStoryToolRegistry({
    exampleImages: config.exampleImages,
    renderImage: createGeminiImageRenderer({
      apiKey: config.geminiApiKey,
      model: config.imageModel,
      outputDir: config.outputDir,
    }),
    translate: createModelTranslator(resolveModel),
  });

  return (_sessionId, log) => ({
    registry,
    backend: new StoryAgent({
      registry,
      model: resolveModel,
      maxScenes: config.maxScenes,
      maxHistoryTurns: config.maxHistoryTurns,
      log,
    }),
    maxScenes: config.maxScenes,
    greeting: config.greeting,
  });
}

export async function buildApp(options: StoryAppOptions) {
  const { config } = options;
  const log = options.logger ?? createLogger(config.logLevel);
  const traces = options.traceStore ?? createTraceStore(config.traceDbPath);
  const factory = options.sessionFactory ?? createGeminiSessionFactory(config);

  const sessions = new StorySessionStore(
    (sessionId, sessionLog) => ({
      ...factory(sessionId, sessionLog),
      onInvocation: (record) => {
        traces.recordToolInvocation(record);
      },
    }),
    log,
  );

  const app = Fastify({ loggerInstance: log });

  await app.register(cors, {
    origin: config.corsOrigin,
  });

  const generatedRoot = path.resolve(config.outputDir);
  fs.mkdirSync(generatedRoot, { recursive: true });
  await app.register(staticFiles, {
    root: generatedRoot,
    prefix: '/generated/',
    decorateReply: false,
  });

  // Health check
  app.get('/health', async () => ({ status: 'ok', sessions: sessions.size }));

  await app.register(async (storyApp) => {
    await storyRoute(storyApp, sessions);
  }, { prefix: '/api/story' });

  await app.register(async (debugApp) => {
    await traceRoutes(debugApp, traces);
  }, { prefix: '/api/debug' });

  if (!options.traceStore) {
    app.addHook('onClose', async () => {
      traces.close();
    });
  }

  return app;
}
