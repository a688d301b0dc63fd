import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import configuration, { JobConfig, OutputConfig, SourceConfig } from './config/configuration';
import { createRunContext } from './models/run-context.model';
import { DataProcessingJob } from './jobs/data-processing.job';
import { HttpRecordSourceClient } from './services/source/http-record-source.client';
import { FallbackDataGenerator } from './services/source/fallback-data.generator';
import { DataSourceService } from './services/source/data-source.service';
import { TransformerService } from './services/transform/transformer.service';
import { AggregatorService } from './services/aggregate/aggregator.service';
import { ReporterService } from './services/report/reporter.service';
import { CsvDatasetService } from './services/csv/csv-dataset.service';
import { FilePersisterService } from './services/storage/file-persister.service';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
    }),
  ],
  providers: [
    {
      provide: 'RunContext',
      useFactory: (configService: ConfigService) => {
        return createRunContext(configService.getOrThrow<JobConfig>('config.job'));
      },
      inject: [ConfigService],
    },
    {
      provide: 'IRecordSourceClient',
      useFactory: (configService: ConfigService) => {
        return new HttpRecordSourceClient(configService.getOrThrow<SourceConfig>('config.source'));
      },
      inject: [ConfigService],
    },
    {
      provide: 'IDataSource',
      useClass: DataSourceService,
    },
    {
      provide: 'IPersister',
      useFactory: (configService: ConfigService, csvDatasetService: CsvDatasetService) => {
        return new FilePersisterService(configService.getOrThrow<OutputConfig>('config.output'), csvDatasetService);
      },
      inject: [ConfigService, CsvDatasetService],
    },
    FallbackDataGenerator,
    TransformerService,
    AggregatorService,
    ReporterService,
    CsvDatasetService,
    DataProcessingJob,
  ],
})
export class AppModule {}
