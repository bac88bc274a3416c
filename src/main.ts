import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger, ValidationPipe } from '@nestjs/common';
import { AppModule } from './modules/app/app.module';
import { swaggerInit } from './utils/swaggerInit';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule);

  // DTOs only check types; domain validation happens in the services.
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
    }),
  );

  swaggerInit(app);
  const port = process.env.PORT ?? 3000;
  await app.listen(port);
  Logger.log(`Movie catalog listening on port ${port}`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  Logger.error('Failed to start application', error instanceof Error ? error.stack : String(error), 'Bootstrap');
  process.exit(1);
});
