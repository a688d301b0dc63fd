import { registerAs } from '@nestjs/config';

function positiveInt(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

export default registerAs('config', () => ({
  logLevel: process.env.LOG_LEVEL || 'log',

  job: {
    name: process.env.CRONJOB_NAME || 'dockerfile-data-processor',
    executionId: process.env.CRONJOB_EXECUTION_UUID || 'local-run',
    manualTrigger: (process.env.MANUAL_TRIGGER || 'false').toLowerCase() === 'true',
  },

  source: {
    url: process.env.SOURCE_URL || 'https://jsonplaceholder.typicode.com/posts',
    timeout: positiveInt(process.env.SOURCE_TIMEOUT, 30000),
    limit: positiveInt(process.env.SOURCE_LIMIT, 10),
  },

  output: {
    dir: process.env.OUTPUT_DIR || '/tmp/cronjob_output',
    atomicWrites: process.env.OUTPUT_ATOMIC_WRITES !== 'false',
  },
}));

export interface JobConfig {
  name: string;
  executionId: string;
  manualTrigger: boolean;
}

export interface SourceConfig {
  url: string;
  timeout: number;
  limit: number;
}

export interface OutputConfig {
  dir: string;
  atomicWrites: boolean;
}
