import 'reflect-metadata';
import { INestApplication } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { MicroserviceOptions, Transport } from '@nestjs/microservices';
import { ConfigService } from '@nestjs/config';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';
import { configureHttpApp } from './app.setup';
import { initTracer, shutdownTracer } from './shared/tracing/tracer';

const serviceName = process.env.SERVICE_NAME || 'crawl-prime';
const tracer = initTracer(serviceName);
let application: INestApplication | null = null;

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  application = app;
  app.useLogger(app.get(Logger));
  const logger = app.get(Logger);
  configureHttpApp(app);

  const configService = app.get(ConfigService);
  const tcpPort = configService.get<number>('TCP_PORT', 4010);

  // TCP microservice for inter-service communication
  app.connectMicroservice<MicroserviceOptions>({
    transport: Transport.TCP,
    options: {
      host: configService.get<string>('TCP_HOST', '0.0.0.0'),
      port: tcpPort,
    },
  });

  await app.startAllMicroservices();
  logger.log(`TCP microservice is running on port ${tcpPort}`);

  const port = configService.get<number>('PORT', 50060);
  await app.listen(port);
  logger.log(`CrawlPrime service is running on http://localhost:${port}`);
}

// Closing the app stops the job sweeper and drains background ingests.
async function shutdown(): Promise<void> {
  if (application) {
    await application.close();
  }
  await shutdownTracer(tracer);
  process.exit(0);
}

void bootstrap();

process.on('SIGTERM', () => {
  void shutdown();
});

process.on('SIGINT', () => {
  void shutdown();
});
