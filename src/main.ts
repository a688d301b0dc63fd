import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { bootstrap } from './bootstrap';

bootstrap()
  .then((exitCode) => process.exit(exitCode))
  .catch((error: unknown) => {
    new Logger('Bootstrap').error('Job could not start', error instanceof Error ? error.stack : String(error));
    process.exit(1);
  });
