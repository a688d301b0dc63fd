import { Injectable, Logger } from '@nestjs/common';
import { AggregateRow } from '../../models/analysis-report.model';
import { DerivedRecord } from '../../models/record.model';
import { roundHalfEven } from '../../utils/rounding';

interface GroupAccumulator {
  count: number;
  titleLengthSum: number;
  totalWordCount: number;
}

@Injectable()
export class AggregatorService {
  private readonly logger = new Logger(AggregatorService.name);

  /**
   * Groups records by `groupId` in a single pass. The returned map iterates in ascending
   * group order and `avgTitleLength` is rounded half-to-even to 2 decimals.
   */
  aggregate(records: DerivedRecord[]): Map<number, AggregateRow> {
    const accumulators = new Map<number, GroupAccumulator>();

    for (const record of records) {
      let accumulator = accumulators.get(record.groupId);
      if (!accumulator) {
        accumulator = { count: 0, titleLengthSum: 0, totalWordCount: 0 };
        accumulators.set(record.groupId, accumulator);
      }
      accumulator.count++;
      accumulator.titleLengthSum += record.titleLength;
      accumulator.totalWordCount += record.wordCount;
    }

    const breakdown = new Map<number, AggregateRow>();
    const groupIds = [...accumulators.keys()].sort((a, b) => a - b);
    for (const groupId of groupIds) {
      const accumulator = accumulators.get(groupId);
      if (!accumulator) {
        continue;
      }
      breakdown.set(groupId, {
        count: accumulator.count,
        avgTitleLength: roundHalfEven(accumulator.titleLengthSum / accumulator.count),
        totalWordCount: accumulator.totalWordCount,
      });
    }

    this.logger.debug(`Aggregated ${records.length} records into ${breakdown.size} groups`);
    return breakdown;
  }
}
