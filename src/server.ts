import { buildApp } from './app.js';
import { env } from './config/env.js';
import { logger } from './common/logger.js';
import { connectMongo, disconnectMongo } from './db/mongoose.js';
import { MongoDefinitionStore } from './modules/inspection/index.js';

async function main(): Promise<void> {
  const useMongo = env.MONGO_URL !== '';
  if (useMongo) {
    await connectMongo(env.MONGO_URL, env.MONGO_DB);
  } else {
    logger.warn('[Boot] MONGO_URL not set, definitions are kept in memory');
  }

  const app = buildApp({
    inspection: useMongo ? { store: new MongoDefinitionStore() } : {},
  });

  const shutdown = async (signal: string) => {
    logger.info({ signal }, '[Boot] Shutting down');
    await app.close();
    await disconnectMongo();
    process.exit(0);
  };
  const onSignal = (signal: string) => {
    shutdown(signal).catch(err => {
      logger.error({ err }, '[Boot] Shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));

  await app.listen({ port: env.PORT, host: env.HOST });
  logger.info({ port: env.PORT }, '[Boot] Inspection backend started');
}

main().catch(err => {
  logger.error({ err }, '[Boot] Fatal');
  process.exit(1);
});
