import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module.js';
import { EngineConfigService } from './engine/engine-config.service.js';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const { port } = app.get(EngineConfigService).get();
  app.enableShutdownHooks();
  await app.listen(port);
  Logger.log(`Rules server listening on :${port}`, 'Bootstrap');
}

bootstrap().catch((err: unknown) => {
  Logger.error(err instanceof Error ? err.stack : String(err), 'Bootstrap');
  process.exit(1);
});
