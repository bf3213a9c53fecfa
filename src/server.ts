import 'reflect-metadata';
import { Server } from 'http';
import { createApp, SERVICE_NAME, settingsFromEnv } from './app';
import { AppDataSource } from './config/data-source';
import { env } from './config/env';
import { RuntimeConfigService } from './models/shared/runtimeConfig.service';
import { createProviderRegistry } from './providers/registry';
import { MongoResumeStore } from './repositories/mongoResumeStore';
import { describeError, logger } from './utils/logger';
import { S3FileStorage } from './utils/s3Storage';
import { DocumentTextExtractor } from './utils/textParser';

async function startServer(): Promise<Server> {
  // Initialize database connection
  logger.info('Initializing database connection...');
  await AppDataSource.initialize();
  logger.info('Database connected successfully', { database: env.DATABASE_NAME });

  const fileStorage = new S3FileStorage({
    accessKeyId: env.AWS_ACCESS_KEY_ID,
    secretAccessKey: env.AWS_SECRET_ACCESS_KEY,
    region: env.AWS_REGION,
    bucket: env.S3_BUCKET_NAME
  });
  await fileStorage.verify();

  const providers = createProviderRegistry(env);
  const runtimeConfig = new RuntimeConfigService({
    envFilePath: env.PERSIST_RUNTIME_CONFIG ? env.ENV_FILE_PATH : null
  });

  const app = createApp({
    store: new MongoResumeStore(AppDataSource),
    fileStorage,
    textExtractor: new DocumentTextExtractor(),
    providers,
    runtimeConfig,
    auth: {
      configApiKey: env.CONFIG_API_KEY,
      adminApiToken: env.ADMIN_API_TOKEN,
      jwtSecret: env.JWT_SECRET_KEY
    },
    settings: settingsFromEnv(env)
  });

  return app.listen(env.PORT, env.HOST, () => {
    logger.info(`Server running on ${env.HOST}:${env.PORT}`);
    logger.info(`Environment: ${env.NODE_ENV}`);
    logger.info('Processing configuration', {
      ...runtimeConfig.snapshot(),
      availableProviders: providers.availableNames()
    });
    logger.info(`=== ${SERVICE_NAME} Started ===`);
  });
}

function registerShutdown(server: Server): void {
  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, shutting down gracefully...`);
    server.close(() => {
      const closeDatabase = AppDataSource.isInitialized ? AppDataSource.destroy() : Promise.resolve();
      closeDatabase
        .then(() => process.exit(0))
        .catch(error => {
          logger.error('Error during shutdown', { reason: describeError(error) });
          process.exit(1);
        });
    });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

// Start the server
if (require.main === module) {
  startServer()
    .then(registerShutdown)
    .catch(error => {
      logger.error('Failed to start server', { reason: describeError(error) });
      process.exit(1);
    });
}
