import csv from 'csv-parser';
import { createReadStream } from 'fs';

export function readCsvRows(path: string): Promise<Record<string, string>[]> {
  return new Promise((resolve, reject) => {
    const rows: Record<string, string>[] = [];
    createReadStream(path)
      .pipe(csv())
      .on('data', (row: Record<string, string>) => rows.push(row))
      .on('end', () => resolve(rows))
      .on('error', reject);
  });
}
