import { Type } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { resolveLogLevels } from './config/log-levels';
import { DataProcessingJob } from './jobs/data-processing.job';

/**
 * Creates the application context, runs the job once and closes the context.
 * Initialisation errors reject instead of aborting the process.
 */
export async function bootstrap(rootModule: Type<unknown> = AppModule): Promise<number> {
  const app = await NestFactory.createApplicationContext(rootModule, { bufferLogs: true, abortOnError: false });
  app.useLogger(resolveLogLevels(app.get(ConfigService).get<string>('config.logLevel')));

  try {
    return await app.get(DataProcessingJob).run();
  } finally {
    await app.close();
  }
}
