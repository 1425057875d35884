import 'reflect-metadata';
import 'dotenv/config';
import { Logger, LogLevel, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { join } from 'path';
import { AppModule } from './app.module';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';
import { ResponseInterceptor } from './common/interceptors/response.interceptor';
import { errorStack } from './common/utils/error.util';
import {
  allowedOrigins,
  envNumber,
  envString,
  isDevelopment,
  openAiApiKey,
} from './config/app.config';

async function bootstrap() {
  const logLevels: LogLevel[] = isDevelopment()
    ? ['log', 'error', 'warn', 'debug', 'verbose']
    : ['log', 'error', 'warn'];

  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    logger: logLevels,
  });
  const logger = new Logger('Bootstrap');

  // The research page and its assets; "/" resolves to public/index.html.
  app.useStaticAssets(join(process.cwd(), 'public'));

  // Behind a proxy/LB this keeps req.ip (and so throttling) per client.
  app.set('trust proxy', 1);

  const bodyLimit = envString('REQUEST_BODY_LIMIT', '1mb');
  app.useBodyParser('json', { limit: bodyLimit });
  app.useBodyParser('urlencoded', { extended: true, limit: bodyLimit });

  const origins = allowedOrigins();
  app.enableCors({
    origin: (origin, callback) => {
      if (!origin) return callback(null, true);
      if (origins.includes(origin)) return callback(null, true);
      return callback(new Error(`CORS blocked for origin: ${origin}`), false);
    },
    methods: ['GET', 'HEAD', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
  });

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );
  app.useGlobalInterceptors(new ResponseInterceptor());
  app.useGlobalFilters(new HttpExceptionFilter());
  app.enableShutdownHooks();

  if (!openAiApiKey()) {
    logger.warn(
      'OPENAI_API_KEY is not set. Set it in the environment or a .env file.',
    );
  }

  const port = envNumber('PORT', 8000);
  await app.listen(port, '0.0.0.0');
  logger.log(`Crypto research assistant listening on http://localhost:${port}`);
}

bootstrap().catch((err: unknown) => {
  new Logger('Bootstrap').error('Failed to start', errorStack(err));
  process.exit(1);
});
