import 'reflect-metadata';

import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { FastifyAdapter, type NestFastifyApplication } from '@nestjs/platform-fastify';
import { Logger as PinoLogger } from 'nestjs-pino';

import { AppModule } from './bootstrap/app.module';
import { ConfigService } from './core/services/config.service';

const bootstrapLogger = new Logger('Bootstrap');

async function bootstrap() {
  const cfg = ConfigService.getInstance();

  const app = await NestFactory.create<NestFastifyApplication>(AppModule, new FastifyAdapter(), { bufferLogs: true });
  app.useLogger(app.get(PinoLogger));
  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));
  app.enableCors({
    origin: cfg.corsOrigins.length ? cfg.corsOrigins : true,
    methods: ['GET', 'HEAD', 'PUT', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'Accept'],
    credentials: false,
  });
  // Lets ChannelLookupService wait for in-flight background channel lookups on shutdown
  app.enableShutdownHooks();

  const PORT = Number(process.env.PORT) || 3020;
  await app.listen(PORT, '0.0.0.0');
  bootstrapLogger.log(`HTTP server listening on :${PORT}`);
}

bootstrap().catch((error: unknown) => {
  const context = error instanceof Error ? { name: error.name, message: error.message, stack: error.stack } : { error };
  bootstrapLogger.error(`Bootstrap failure ${JSON.stringify(context)}`);
  process.exit(1);
});
