import { Inject, Injectable, Logger } from '@nestjs/common';
import { IDataSource } from '../../interfaces/data-source.interface';
import { IRecordSourceClient } from '../../interfaces/record-source-client.interface';
import { RawRecord } from '../../models/record.model';
import { FallbackDataGenerator } from './fallback-data.generator';

@Injectable()
export class DataSourceService implements IDataSource {
  private readonly logger = new Logger(DataSourceService.name);

  constructor(
    @Inject('IRecordSourceClient') private readonly recordSourceClient: IRecordSourceClient,
    private readonly fallbackGenerator: FallbackDataGenerator,
  ) {}

  async fetch(limit: number): Promise<RawRecord[]> {
    this.logger.log('📡 Fetching sample data from remote source...');

    const result = await this.recordSourceClient.fetchRecords(limit);

    if (result.success) {
      this.logger.log(`✅ Successfully fetched ${result.data.length} records`);
      return result.data;
    }

    this.logger.error(`❌ Failed to fetch data: ${result.message}`);
    return this.fallbackGenerator.generate(limit);
  }
}
