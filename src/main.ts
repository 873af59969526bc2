import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { NextFunction, Request, Response } from 'express';
import { AppModule } from './app.module';
import { GlobalExceptionFilter } from './common/filters/global-exception.filter';
import { FigureStorageLayout } from './figure-extraction/figure-storage-layout';

async function bootstrap() {
  const logger = new Logger('Bootstrap');
  try {
    logger.log('Starting NestJS application...');
    logger.log(
      `Environment check: ${JSON.stringify({
        NODE_ENV: process.env.NODE_ENV,
        PORT: process.env.PORT,
        FIREBASE_STORAGE_BUCKET: process.env.FIREBASE_STORAGE_BUCKET ? 'SET' : 'MISSING',
      })}`,
    );

    const app = await NestFactory.create<NestExpressApplication>(AppModule, {
      logger: ['error', 'warn', 'log', 'debug', 'verbose'],
    });

    // Extracted figure images, referenced by the resolver's local URLs
    const layout = app.get(FigureStorageLayout);
    app.useStaticAssets(layout.dataDir, { prefix: layout.staticBaseUrl });

    app.useGlobalFilters(new GlobalExceptionFilter());

    const requestLogger = new Logger('HTTP');
    app.use((req: Request, _res: Response, next: NextFunction) => {
      requestLogger.log(`${req.method} ${req.url}`);
      next();
    });

    const port = process.env.PORT ?? 3000;
    await app.listen(port, '0.0.0.0');
    logger.log(`Server successfully started on port ${port}`);
  } catch (error) {
    logger.error('Failed to start application', error instanceof Error ? error.stack : String(error));
    process.exit(1);
  }
}
void bootstrap();
