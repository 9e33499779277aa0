import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { ConfigService } from './config/config.service';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule);
  app.enableShutdownHooks();

  const config = app.get(ConfigService);
  await app.listen(config.getPort());
  logger.log(`Claim registry listening on port ${config.getPort()} (storage: ${config.getRegistry().storageDriver})`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error('Failed to start claim registry', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
