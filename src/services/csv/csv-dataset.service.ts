import { Injectable, Logger } from '@nestjs/common';
import csv from 'csv-parser';
import { Readable } from 'stream';
import { DerivedRecord } from '../../models/record.model';

export const CSV_COLUMNS = [
  'id',
  'title',
  'body',
  'groupId',
  'processedAt',
  'titleLength',
  'wordCount',
] as const;

const NEEDS_QUOTING = /[",\r\n]/;

@Injectable()
export class CsvDatasetService {
  private readonly logger = new Logger(CsvDatasetService.name);

  serialize(records: DerivedRecord[]): string {
    const lines = [CSV_COLUMNS.join(',')];

    for (const record of records) {
      lines.push([
        String(record.id),
        escapeField(record.title),
        escapeField(record.body),
        String(record.groupId),
        record.processedAt.toISOString(),
        String(record.titleLength),
        String(record.wordCount),
      ].join(','));
    }

    return lines.join('\n') + '\n';
  }

  /** Reads a written dataset back and checks the header and the number of data rows. */
  async validateCsv(csvStream: Readable, expectedRows: number): Promise<boolean> {
    let rowCount = 0;
    let headers: string[] = [];

    return new Promise((resolve, reject) => {
      csvStream.on('error', (error: Error) => {
        this.logger.error('CSV read error:', error);
        reject(error);
      });

      csvStream.pipe(csv())
        .on('headers', (parsedHeaders: string[]) => {
          headers = parsedHeaders;
        })
        .on('data', () => {
          rowCount++;
        })
        .on('end', () => {
          const hasHeaders = headers.length === CSV_COLUMNS.length
            && CSV_COLUMNS.every((column, index) => headers[index] === column);
          const isValid = hasHeaders && rowCount === expectedRows;
          this.logger.debug(`CSV validation: ${rowCount}/${expectedRows} rows, hasHeaders: ${hasHeaders}, valid: ${isValid}`);
          resolve(isValid);
        })
        .on('error', (error: Error) => {
          this.logger.error('CSV validation error:', error);
          reject(error);
        });
    });
  }
}

export function escapeField(value: string): string {
  if (!NEEDS_QUOTING.test(value)) {
    return value;
  }
  return `"${value.replace(/"/g, '""')}"`;
}
