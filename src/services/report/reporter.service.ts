import { Injectable, Logger } from '@nestjs/common';
import { AggregateRow, AnalysisReport, ReportSummary } from '../../models/analysis-report.model';
import { DerivedRecord } from '../../models/record.model';
import { RunContext } from '../../models/run-context.model';

export type RunMetadata = Pick<RunContext, 'jobName' | 'executionId' | 'manualTrigger'>;

@Injectable()
export class ReporterService {
  private readonly logger = new Logger(ReporterService.name);

  buildReport(
    records: DerivedRecord[],
    breakdown: Map<number, AggregateRow>,
    runMeta: RunMetadata,
    completedAt: Date = new Date(),
  ): AnalysisReport {
    this.logger.log('🔍 Performing data analysis...');

    const groups: Record<string, AggregateRow> = {};
    for (const [groupId, row] of breakdown) {
      groups[String(groupId)] = { ...row };
    }

    return {
      executionInfo: {
        jobName: runMeta.jobName,
        executionId: runMeta.executionId,
        manualTrigger: runMeta.manualTrigger,
        completedAt: completedAt.toISOString(),
      },
      summary: this.summarize(records, breakdown.size),
      breakdown: groups,
    };
  }

  // Computed from the records themselves; the average is left unrounded.
  private summarize(records: DerivedRecord[], uniqueGroups: number): ReportSummary {
    if (records.length === 0) {
      return {
        totalRecords: 0,
        uniqueGroups,
        avgTitleLength: 0,
        totalWordCount: 0,
        minTitleLength: 0,
        maxTitleLength: 0,
      };
    }

    let titleLengthSum = 0;
    let totalWordCount = 0;
    let minTitleLength = Number.POSITIVE_INFINITY;
    let maxTitleLength = Number.NEGATIVE_INFINITY;

    for (const record of records) {
      titleLengthSum += record.titleLength;
      totalWordCount += record.wordCount;
      minTitleLength = Math.min(minTitleLength, record.titleLength);
      maxTitleLength = Math.max(maxTitleLength, record.titleLength);
    }

    return {
      totalRecords: records.length,
      uniqueGroups,
      avgTitleLength: titleLengthSum / records.length,
      totalWordCount,
      minTitleLength,
      maxTitleLength,
    };
  }
}
