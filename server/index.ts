import { config } from 'dotenv';
import { ConfigError, loadConfig, type AppConfig } from './config.js';
import { createLogger } from './lib/logger.js';
import { buildApp } from './app.js';

config();

const start = async () => {
  let appConfig: AppConfig;
  try {
    appConfig = loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      process.exit(1);
    }
    throw err;
  }

  const log = createLogger(appConfig.logLevel);
  if (!appConfig.geminiApiKey) {
    log.warn('[Server] GEMINI_API_KEY is not set; turns will fail until it is configured');
  }

  const app = await buildApp({ config: appConfig, logger: log });
  try {
    await app.listen({ port: appConfig.port, host: appConfig.host });
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
};

await start();
