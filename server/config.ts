import { z } from 'zod';

export const DEFAULT_GREETING =
  "Hi! I'm your StoryAgent. Before we start, tell me the rough idea or outline of the story you'd like to create.";

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ORIGIN: z.string().min(1).default('http://localhost:5173'),
  GEMINI_API_KEY: z.string().min(1).optional(),
  GEMINI_STORY_MODEL: z.string().min(1).default('gemini-2.5-flash'),
  GEMINI_IMAGE_MODEL: z.string().min(1).default('gemini-2.5-flash-image'),
  STORY_MAX_SCENES: z.coerce.number().int().min(1).max(16).default(4),
  STORY_MAX_HISTORY_TURNS: z.coerce.number().int().min(1).default(20),
  STORY_OUTPUT_DIR: z.string().min(1).default('public/generated'),
  STORY_EXAMPLE_IMAGES: z.string().default(''),
  STORY_GREETING: z.string().default(DEFAULT_GREETING),
  TRACE_DB_PATH: z.string().min(1).default('data/story-traces.db'),
});

export interface AppConfig {
  port: number;
  host: string;
  logLevel: z.infer<typeof EnvSchema>['LOG_LEVEL'];
  corsOrigin: string;
  geminiApiKey?: string;
  storyModel: string;
  imageModel: string;
  maxScenes: number;
  maxHistoryTurns: number;
  outputDir: string;
  exampleImages: string[];
  greeting: string;
  traceDbPath: string;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    host: e.HOST,
    logLevel: e.LOG_LEVEL,
    corsOrigin: e.CORS_ORIGIN,
    geminiApiKey: e.GEMINI_API_KEY,
    storyModel: e.GEMINI_STORY_MODEL,
    imageModel: e.GEMINI_IMAGE_MODEL,
    maxScenes: e.STORY_MAX_SCENES,
    maxHistoryTurns: e.STORY_MAX_HISTORY_TURNS,
    outputDir: e.STORY_OUTPUT_DIR,
    exampleImages: e.STORY_EXAMPLE_IMAGES.split(',')
      .map((s) => s.trim())
      .filter((s) => s.length > 0),
    greeting: e.STORY_GREETING,
    traceDbPath: e.TRACE_DB_PATH,
  };
}
