import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { HttpAdapterHost, NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { DomainExceptionFilter } from './common/domain-exception.filter';
import { OrchestratorConfigService } from './config/orchestrator-config.service';

async function bootstrap() {
  const logger = new Logger('Bootstrap');

  const app = await NestFactory.create(AppModule, { bufferLogs: true });

  // Get configuration service
  const configService = app.get(OrchestratorConfigService);
  app.useLogger(configService.loggerLevels);

  // Configure global prefix, validation and error mapping
  app.setGlobalPrefix('api/v1');
  app.useGlobalPipes(
    new ValidationPipe({ whitelist: true, transform: true }),
  );
  app.useGlobalFilters(new DomainExceptionFilter(app.get(HttpAdapterHost)));
  app.enableShutdownHooks();

  // Enable CORS
  app.enableCors();

  if (configService.nodeEnv !== 'production') {
    const document = SwaggerModule.createDocument(
      app,
      new DocumentBuilder()
        .setTitle('Market Pipeline Orchestrator')
        .setDescription('Pipeline runs, model monitoring and feedback')
        .setVersion('0.1.0')
        .build(),
    );
    SwaggerModule.setup('api/docs', app, document);
  }

  // Start server
  const port = configService.port;
  await app.listen(port);

  logger.log(`🚀 Orchestrator Service started on http://localhost:${port}`);
  logger.log(`🎯 Environment: ${configService.nodeEnv}`);
  logger.log(`💾 Persistence: ${configService.persistenceDriver}`);
  logger.log(`👷 Worker concurrency: ${configService.workerConcurrency}`);
  logger.log(
    `📅 Scheduler: ${configService.schedulerEnabled ? `enabled (${configService.schedulerTimezone})` : 'disabled'}`,
  );
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error('💥 Failed to start orchestrator', error);
  process.exit(1);
});
