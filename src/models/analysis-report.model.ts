export interface AggregateRow {
  count: number;
  avgTitleLength: number;
  totalWordCount: number;
}

export interface ExecutionInfo {
  jobName: string;
  executionId: string;
  manualTrigger: boolean;
  completedAt: string;
}

export interface ReportSummary {
  totalRecords: number;
  uniqueGroups: number;
  avgTitleLength: number;
  totalWordCount: number;
  minTitleLength: number;
  maxTitleLength: number;
}

export interface AnalysisReport {
  executionInfo: ExecutionInfo;
  summary: ReportSummary;
  breakdown: Record<string, AggregateRow>;
}
