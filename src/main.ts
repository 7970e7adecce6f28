import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { LOG_LEVEL, PORT } from './feeds/config/feeds.constants';
import { resolveLogLevels } from './feeds/config/log-levels';
import { FeedPipelineService } from './feeds/services/feed-pipeline.service';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule, {
    logger: resolveLogLevels(LOG_LEVEL),
  });
  app.enableShutdownHooks();
  await app.listen(PORT);

  // resolves after a shutdown signal stops the loop; rejects on a fatal cycle error
  await app.get(FeedPipelineService).run();
}

bootstrap().catch((error: unknown) => {
  const logger = new Logger('Bootstrap');
  if (error instanceof Error) {
    logger.fatal(`pipeline failed: ${error.message}`, error.stack);
  } else {
    logger.fatal(`pipeline failed: ${String(error)}`);
  }
  process.exit(1);
});
