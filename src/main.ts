import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { setupApp } from './app.setup';

async function bootstrap() {
  const app = setupApp(await NestFactory.create(AppModule));

  const config = app.get(ConfigService);
  const port = config.getOrThrow<number>('PORT');

  app.enableCors({
    origin: config.getOrThrow<string>('CORS_ORIGIN'),
  });
  app.enableShutdownHooks();

  await app.listen(port);
  Logger.log(
    `Cafe API listening on port ${port} (store: ${config.getOrThrow<string>('CAFE_STORE')})`,
    'Bootstrap',
  );
}

bootstrap().catch((err: unknown) => {
  Logger.error(err instanceof Error ? err.stack : String(err), 'Bootstrap');
  process.exit(1);
});
