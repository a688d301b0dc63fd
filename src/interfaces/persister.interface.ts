import { AnalysisReport } from '../models/analysis-report.model';
import { PersistResult } from '../models/persist-result.model';
import { DerivedRecord } from '../models/record.model';

export interface IPersister {
  persist(
    records: DerivedRecord[],
    report: AnalysisReport,
    outputDir: string,
    executionId: string,
  ): Promise<PersistResult>;
}
