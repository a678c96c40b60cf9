import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { ConfigService } from './config/config.service';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const config = app.get(ConfigService);

  app.enableCors({
    origin: config.allowedOrigins === '*' ? '*' : config.allowedOrigins.split(','),
    credentials: true,
  });

  app.useGlobalPipes(
    new ValidationPipe({
      transform: true,
      transformOptions: {
        enableImplicitConversion: true,
      },
    }),
  );

  await app.listen(config.port);
  Logger.log(`Dispatch engine listening on port ${config.port} (${config.nodeEnv})`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  Logger.error('Failed to start dispatch engine', error instanceof Error ? error.stack : String(error), 'Bootstrap');
  process.exit(1);
});
