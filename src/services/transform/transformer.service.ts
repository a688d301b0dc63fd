import { Injectable, Logger } from '@nestjs/common';
import { DerivedRecord, RawRecord } from '../../models/record.model';

@Injectable()
export class TransformerService {
  private readonly logger = new Logger(TransformerService.name);

  /**
   * Adds `processedAt`, `titleLength` and `wordCount` to every record, keeping input order.
   *
   * A missing or null `title`/`body` is read as the empty string, so the record is kept with a
   * length or word count of 0 instead of failing the batch.
   */
  transform(records: RawRecord[], capturedAt: Date): DerivedRecord[] {
    this.logger.log(`⚙️ Transforming ${records.length} records`);

    return records.map((record) => {
      const title = record.title ?? '';
      const body = record.body ?? '';

      return {
        id: record.id,
        title,
        body,
        groupId: record.groupId,
        processedAt: capturedAt,
        titleLength: countCharacters(title),
        wordCount: countWords(body),
      };
    });
  }
}

// Code points, so an emoji or astral character counts once
export function countCharacters(text: string): number {
  return Array.from(text).length;
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter((token) => token.length > 0).length;
}
