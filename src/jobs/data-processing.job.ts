import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { IDataSource } from '../interfaces/data-source.interface';
import { IPersister } from '../interfaces/persister.interface';
import { AggregateRow, AnalysisReport } from '../models/analysis-report.model';
import { RunContext } from '../models/run-context.model';
import { TransformerService } from '../services/transform/transformer.service';
import { AggregatorService } from '../services/aggregate/aggregator.service';
import { ReporterService } from '../services/report/reporter.service';

export type ExitCode = 0 | 1;

@Injectable()
export class DataProcessingJob {
  private readonly logger = new Logger(DataProcessingJob.name);

  constructor(
    @Inject('IDataSource') private readonly dataSource: IDataSource,
    private readonly transformer: TransformerService,
    private readonly aggregator: AggregatorService,
    private readonly reporter: ReporterService,
    @Inject('IPersister') private readonly persister: IPersister,
    @Inject('RunContext') private readonly context: RunContext,
    private readonly configService: ConfigService,
  ) {}

  async run(): Promise<ExitCode> {
    this.logRunDetails();

    try {
      this.logger.log('🎯 Starting data processing pipeline...');
      const limit = this.configService.getOrThrow<number>('config.source.limit');
      const outputDir = this.configService.getOrThrow<string>('config.output.dir');

      const rawRecords = await this.dataSource.fetch(limit);
      const records = this.transformer.transform(rawRecords, new Date());
      const breakdown = this.aggregator.aggregate(records);
      const report = this.reporter.buildReport(records, breakdown, this.context);
      this.logStatistics(report, breakdown);

      await this.persister.persist(records, report, outputDir, this.context.executionId);

      const executionSeconds = (Date.now() - this.context.startedAt.getTime()) / 1000;
      this.logger.log('✅ Data processing completed successfully!');
      this.logger.log(`⏱️ Total execution time: ${executionSeconds.toFixed(2)} seconds`);
      return 0;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      const stack = error instanceof Error ? error.stack : undefined;
      this.logger.error(`❌ Job ${this.context.jobName} failed with error: ${message}`, stack);
      return 1;
    }
  }

  private logRunDetails(): void {
    this.logger.log('🚀 Data processing job started');
    this.logger.log(`Name: ${this.context.jobName}`);
    this.logger.log(`Execution id: ${this.context.executionId}`);
    this.logger.log(`Manual trigger: ${this.context.manualTrigger}`);
    this.logger.log(`Start time: ${this.context.startedAt.toISOString()}`);
  }

  private logStatistics(report: AnalysisReport, breakdown: Map<number, AggregateRow>): void {
    const { summary } = report;
    this.logger.log('📊 Data processing statistics:');
    this.logger.log(`Total records: ${summary.totalRecords}`);
    this.logger.log(`Unique groups: ${summary.uniqueGroups}`);
    this.logger.log(`Average title length: ${summary.avgTitleLength.toFixed(2)}`);
    this.logger.log(`Total words: ${summary.totalWordCount}`);

    for (const [groupId, row] of breakdown) {
      this.logger.log(
        `Group ${groupId}: ${row.count} records, avg title length: ${row.avgTitleLength}, total words: ${row.totalWordCount}`,
      );
    }
  }
}
