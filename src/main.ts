import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';
import { LoggingInterceptor } from './common/interceptors/logging.interceptor';
import { TransformInterceptor } from './common/interceptors/transform.interceptor';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';

async function bootstrap() {
  const logger = new Logger('Bootstrap');

  // Create NestJS app with logging levels
  const app = await NestFactory.create(AppModule, {
    logger: ['log', 'error', 'warn', 'debug', 'verbose'],
  });

  // Flush buffered shadow log entries on SIGTERM
  app.enableShutdownHooks();

  // Get config service for environment variables
  const configService = app.get(ConfigService);
  const port = configService.get<number>('port') || 3000;
  const apiVersion = configService.get<string>('apiVersion') || 'api/v1';

  // Set global API prefix
  app.setGlobalPrefix(apiVersion);

  // Global validation pipe
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      transformOptions: {
        enableImplicitConversion: true,
      },
    }),
  );

  // Global interceptors
  app.useGlobalInterceptors(
    new LoggingInterceptor(),
    new TransformInterceptor(),
  );

  // Global exception filter
  app.useGlobalFilters(new HttpExceptionFilter());

  // Enable CORS
  app.enableCors({
    origin: true,
    credentials: true,
  });

  // Swagger API Documentation
  const swaggerConfig = new DocumentBuilder()
    .setTitle('Football Model Gateway API')
    .setDescription('Market probabilities, model rollout, calibration and arbitrage scanning')
    .setVersion('1.0')
    .addTag('Predictions', 'Market probabilities and shadow comparisons')
    .addTag('Models', 'Model registry, promotion and rollback')
    .addTag('A/B Testing', 'Canary routing policy and device buckets')
    .addTag('Calibration', 'Settled outcomes, daily metrics and rollout gates')
    .addTag('Arbitrage', 'Cross-bookmaker sure bets and odds comparison')
    .addTag('Metrics', 'Process counters')
    .build();

  const document = SwaggerModule.createDocument(app, swaggerConfig);
  SwaggerModule.setup('docs', app, document);

  // Start the server
  await app.listen(port);

  // Log startup messages
  const serverUrl = `http://localhost:${port}`;
  logger.log(`Football model gateway is running on: ${serverUrl}`);
  logger.log(`API endpoints: ${serverUrl}/${apiVersion}`);
  logger.log(`Swagger docs: ${serverUrl}/docs`);
}

bootstrap().catch((error) => {
  console.error('Failed to start application:', error);
  process.exit(1);
});
