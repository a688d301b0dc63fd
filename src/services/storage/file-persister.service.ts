import { Injectable, Logger } from '@nestjs/common';
import { createReadStream } from 'fs';
import { mkdir, rename, rm, stat, writeFile } from 'fs/promises';
import { join } from 'path';
import { IPersister } from '../../interfaces/persister.interface';
import { AnalysisReport } from '../../models/analysis-report.model';
import { PersistResult } from '../../models/persist-result.model';
import { DerivedRecord } from '../../models/record.model';
import { OutputConfig } from '../../config/configuration';
import { CsvDatasetService } from '../csv/csv-dataset.service';

const EXECUTION_ID_PATTERN = /^[A-Za-z0-9._-]+$/;

export function datasetPath(outputDir: string, executionId: string): string {
  return join(outputDir, `processed_data_${executionId}.csv`);
}

export function reportPath(outputDir: string, executionId: string): string {
  return join(outputDir, `analysis_${executionId}.json`);
}

@Injectable()
export class FilePersisterService implements IPersister {
  private readonly logger = new Logger(FilePersisterService.name);

  constructor(
    private readonly outputConfig: Pick<OutputConfig, 'atomicWrites'>,
    private readonly csvDatasetService: CsvDatasetService,
  ) {}

  async persist(
    records: DerivedRecord[],
    report: AnalysisReport,
    outputDir: string,
    executionId: string,
  ): Promise<PersistResult> {
    this.logger.log('💾 Saving processing results...');
    assertExecutionId(executionId);

    await mkdir(outputDir, { recursive: true });

    const csvPath = datasetPath(outputDir, executionId);
    await this.writeFile(csvPath, this.csvDatasetService.serialize(records), async (writtenPath) => {
      const isValid = await this.csvDatasetService.validateCsv(createReadStream(writtenPath), records.length);
      if (!isValid) {
        throw new Error(`CSV file ${writtenPath} failed validation`);
      }
    });
    this.logger.log(`📄 Saved processed data to: ${csvPath}`);

    const jsonPath = reportPath(outputDir, executionId);
    await this.writeFile(jsonPath, JSON.stringify(report, null, 2));
    this.logger.log(`📊 Saved analysis to: ${jsonPath}`);

    const [csvStats, jsonStats] = await Promise.all([stat(csvPath), stat(jsonPath)]);
    this.logger.log(`📏 File sizes: CSV=${csvStats.size} bytes, JSON=${jsonStats.size} bytes`);

    return {
      csvPath,
      jsonPath,
      csvBytes: csvStats.size,
      jsonBytes: jsonStats.size,
    };
  }

  /**
   * Writes `content` to `<target>.tmp`, runs `verify` on it and renames it onto `target`.
   * With atomic writes disabled the target is written and verified in place.
   */
  private async writeFile(
    target: string,
    content: string,
    verify?: (writtenPath: string) => Promise<void>,
  ): Promise<void> {
    const writtenPath = this.outputConfig.atomicWrites ? `${target}.tmp` : target;

    try {
      await writeFile(writtenPath, content, 'utf8');
      if (verify) {
        await verify(writtenPath);
      }
      if (writtenPath !== target) {
        await rename(writtenPath, target);
      }
    } catch (error) {
      this.logger.error(`Error writing file ${target}:`, error);
      if (writtenPath !== target) {
        await rm(writtenPath, { force: true });
      }
      throw error;
    }
  }
}

function assertExecutionId(executionId: string): void {
  if (!EXECUTION_ID_PATTERN.test(executionId)) {
    throw new Error(`Invalid execution id "${executionId}": use letters, digits, ".", "_" or "-"`);
  }
}
