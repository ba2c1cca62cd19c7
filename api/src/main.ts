import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import compression from 'compression';
import helmet from 'helmet';
import pinoHttp from 'pino-http';
import { AppModule } from './app.module';
import { AppConfigService } from './core/config/app-config.service';
import { HttpErrorFilter } from './core/filters/http-error.filter';

function validateEnv() {
  const must = ['DATABASE_URL'] as const;
  for (const key of must) {
    if (!process.env[key] || String(process.env[key]).trim() === '') {
      throw new Error(`[ENV] ${key} not configured`);
    }
  }
  if (process.env.NODE_ENV === 'production' && !process.env.ADMIN_KEY) {
    throw new Error('[ENV] ADMIN_KEY not configured');
  }
}

async function bootstrap() {
  validateEnv();
  const app = await NestFactory.create(AppModule, { bufferLogs: false });
  const config = app.get(AppConfigService);
  const logger = new Logger('Bootstrap');

  app.enableShutdownHooks();
  app.use(helmet());
  app.use(compression());
  app.use(
    pinoHttp({
      level: config.getLogLevel(),
      redact: {
        paths: [
          'req.headers.authorization',
          'req.headers["x-admin-key"]',
          'req.headers["x-metrics-token"]',
        ],
        censor: '[REDACTED]',
      },
      autoLogging: true,
    }),
  );
  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));
  app.useGlobalFilters(new HttpErrorFilter());

  const document = SwaggerModule.createDocument(
    app,
    new DocumentBuilder()
      .setTitle('Loyalty Ledger')
      .setDescription('Operator endpoints for the discount ledger and CRM sync')
      .setVersion('0.1.0')
      .build(),
  );
  SwaggerModule.setup('docs', app, document);

  if (config.getNoHttp()) {
    await app.init();
    logger.log('Workers-only mode: NO_HTTP=1 (HTTP server disabled)');
    return;
  }
  const port = config.getPort();
  await app.listen(port);
  logger.log(`API on http://localhost:${port}`);
}

bootstrap().catch((err: unknown) => {
  new Logger('Bootstrap').error(
    err instanceof Error ? (err.stack ?? err.message) : String(err),
  );
  process.exit(1);
});
