import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe, Logger } from '@nestjs/common';
import helmet from 'helmet';
import { AppModule } from './app.module';

async function bootstrap() {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule);

  // Security headers
  app.use(helmet());

  const allowedOrigins = ['http://localhost:3666', process.env.FRONTEND_URL].filter(
    (origin): origin is string => Boolean(origin),
  );
  app.enableCors({ origin: allowedOrigins, credentials: true });

  app.useGlobalPipes(new ValidationPipe({
    whitelist: true,
    transform: true,
  }));

  const port = process.env.PORT || 3667;
  await app.listen(port);
  logger.log(`Backtest API running on port ${port}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(`Failed to start: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
