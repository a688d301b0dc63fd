import { Injectable, Logger } from '@nestjs/common';
import { RawRecord } from '../../models/record.model';

export const FALLBACK_GROUP_COUNT = 3;

@Injectable()
export class FallbackDataGenerator {
  private readonly logger = new Logger(FallbackDataGenerator.name);

  generate(limit: number): RawRecord[] {
    this.logger.log(`🔄 Generating ${limit} mock records as fallback...`);

    const records: RawRecord[] = [];
    for (let i = 0; i < limit; i++) {
      const sequence = i + 1;
      records.push({
        id: sequence,
        title: `Sample Data Entry ${sequence}`,
        body: `This is mock data entry number ${sequence}`,
        groupId: (i % FALLBACK_GROUP_COUNT) + 1,
      });
    }

    return records;
  }
}
