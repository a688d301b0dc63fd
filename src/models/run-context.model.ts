import { JobConfig } from '../config/configuration';

export interface RunContext {
  readonly jobName: string;
  readonly executionId: string;
  readonly manualTrigger: boolean;
  readonly startedAt: Date;
}

export function createRunContext(jobConfig: JobConfig, startedAt: Date = new Date()): RunContext {
  return Object.freeze({
    jobName: jobConfig.name,
    executionId: jobConfig.executionId,
    manualTrigger: jobConfig.manualTrigger,
    startedAt,
  });
}
