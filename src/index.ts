import { env } from './config/env.js';
import { createEngineConfig } from './config/engine.js';
import { SourceRegistry } from './services/source-registry.service.js';
import { RankingEngine } from './services/ranking.service.js';
import { createApp } from './app.js';
import { logger } from './utils/logger.js';

const registry = SourceRegistry.fromFile(env.SOURCES_FILE, {
  maxConsecutiveFailures: env.MAX_CONSECUTIVE_FAILURES,
});
const engine = new RankingEngine(createEngineConfig(), registry);
const app = createApp({ engine });

const server = app.listen(env.PORT, () => {
  logger.info({ port: env.PORT, env: env.NODE_ENV, stats: registry.getStats() }, 'Ranking service listening');
});

function shutdown(signal: string): void {
  logger.info({ signal }, 'Shutting down');
  server.close((err) => {
    if (err) {
      logger.error({ err }, 'Error while closing server');
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
