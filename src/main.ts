import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Transport, MicroserviceOptions } from '@nestjs/microservices';
import { Logger } from 'nestjs-pino';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  app.useLogger(app.get(Logger));
  app.enableShutdownHooks();
  const logger = app.get(Logger);

  const configService = app.get(ConfigService);
  const tcpPort = Number(configService.get<string>('TCP_PORT', '4010'));

  app.connectMicroservice<MicroserviceOptions>({
    transport: Transport.TCP,
    options: {
      host: configService.get<string>('TCP_HOST', 'localhost'),
      port: tcpPort,
    },
  });

  await app.startAllMicroservices();
  logger.log(`TCP microservice is running on port ${tcpPort}`);

  const port = Number(configService.get<string>('PORT', '3000'));
  await app.listen(port);
  logger.log(`RAG service is running on http://localhost:${port}`);
}

void bootstrap();
