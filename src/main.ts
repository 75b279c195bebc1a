import 'reflect-metadata';
import { ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    bufferLogs: true,
  });

  app.useLogger(app.get(Logger));
  const logger = app.get(Logger);
  const configService = app.get(ConfigService);

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
    }),
  );
  app.enableShutdownHooks();

  const port = Number(configService.get<string>('PORT') ?? 3000);
  await app.listen(port);
  logger.log(`Documentation assistant is running on: http://localhost:${port}`);
}

bootstrap().catch((error: unknown) => {
  console.error('Failed to start documentation assistant', error);
  process.exit(1);
});
