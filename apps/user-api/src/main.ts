// reflect-metadata must load before any decorated class
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { HttpErrorFilter } from './common/filters/http-error.filter';
import { createHttpLoggingMiddleware } from './logging/http-logging.middleware';
import { JsonLogger } from './logging/json-logger.service';

async function bootstrap() {
  // bufferLogs queues startup logs until the JSON logger is attached
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  const logger = app.get(JsonLogger);
  app.useLogger(logger);

  const config = app.get(ConfigService);

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true
    })
  );

  app.use(createHttpLoggingMiddleware(logger.child('http')));
  app.useGlobalFilters(new HttpErrorFilter(logger.child('errors')));
  app.enableShutdownHooks();

  // Swagger is on unless SWAGGER_ENABLED=false
  if (config.get<boolean>('SWAGGER_ENABLED') ?? true) {
    const document = SwaggerModule.createDocument(
      app,
      new DocumentBuilder()
        .setTitle('User API')
        .setDescription('Users, role assignments and delivery addresses behind a role/scope ACL')
        .setVersion('1.0.0')
        .addBearerAuth({ type: 'http', scheme: 'bearer', bearerFormat: 'JWT', name: 'Authorization', in: 'header' }, 'bearer')
        .build()
    );
    SwaggerModule.setup('docs', app, document, {
      swaggerOptions: { persistAuthorization: true }
    });
  }

  const port = config.get<number>('PORT') ?? 3000;
  await app.listen(port);
  logger.log('HTTP server listening', { port });
}

bootstrap().catch((error: unknown) => {
  const logger = new JsonLogger('bootstrap');
  logger.error('Application failed to start', { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
});
