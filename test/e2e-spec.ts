import { Test, TestingModule } from '@nestjs/testing';
import { mkdtemp, readFile, readdir, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { AppModule } from '../src/app.module';
import { IPersister } from '../src/interfaces/persister.interface';
import { IRecordSourceClient } from '../src/interfaces/record-source-client.interface';
import { DataProcessingJob } from '../src/jobs/data-processing.job';
import { FetchResult } from '../src/models/fetch-result.model';
import { RawRecord } from '../src/models/record.model';
import { createRunContext } from '../src/models/run-context.model';
import { readCsvRows } from './utils/csv';
import { EXAMPLE_RECORDS } from './utils/records';

describe('Data Processing Job E2E Test', () => {
  let outputDir: string;
  let moduleFixture: TestingModule | undefined;

  function sourceReturning(result: FetchResult<RawRecord[]>): IRecordSourceClient {
    return { fetchRecords: jest.fn().mockResolvedValue(result) };
  }

  async function createJob(
    executionId: string,
    recordSourceClient: IRecordSourceClient,
    persister?: IPersister,
  ): Promise<DataProcessingJob> {
    let builder = Test.createTestingModule({ imports: [AppModule] })
      .overrideProvider('IRecordSourceClient')
      .useValue(recordSourceClient)
      .overrideProvider('RunContext')
      .useValue(createRunContext({ name: 'e2e-job', executionId, manualTrigger: true }));

    if (persister) {
      builder = builder.overrideProvider('IPersister').useValue(persister);
    }

    moduleFixture = await builder.compile();
    return moduleFixture.get(DataProcessingJob);
  }

  async function readReport(executionId: string): Promise<unknown> {
    return JSON.parse(await readFile(join(outputDir, `analysis_${executionId}.json`), 'utf8'));
  }

  beforeAll(async () => {
    outputDir = await mkdtemp(join(tmpdir(), 'data-processing-e2e-'));
    process.env.OUTPUT_DIR = outputDir;
    process.env.SOURCE_LIMIT = '10';
  });

  afterEach(async () => {
    if (moduleFixture) {
      await moduleFixture.close();
      moduleFixture = undefined;
    }
  });

  afterAll(async () => {
    await rm(outputDir, { recursive: true, force: true });
  });

  it('processes remote records into a dataset and an analysis report', async () => {
    const job = await createJob('remote-run', sourceReturning({ success: true, data: EXAMPLE_RECORDS }));

    await expect(job.run()).resolves.toBe(0);

    const rows = await readCsvRows(join(outputDir, 'processed_data_remote-run.csv'));
    expect(rows.map((row) => [row.id, row.title, row.body, row.groupId, row.titleLength, row.wordCount])).toEqual([
      ['1', 'AB', 'a b c', '1', '2', '3'],
      ['2', 'CDE', 'd e', '1', '3', '2'],
      ['3', 'F', 'g', '2', '1', '1'],
    ]);
    expect(new Set(rows.map((row) => row.processedAt)).size).toBe(1);

    expect(await readReport('remote-run')).toMatchObject({
      executionInfo: { jobName: 'e2e-job', executionId: 'remote-run', manualTrigger: true },
      summary: { totalRecords: 3, uniqueGroups: 2, avgTitleLength: 2, totalWordCount: 6, minTitleLength: 1, maxTitleLength: 3 },
      breakdown: {
        '1': { count: 2, avgTitleLength: 2.5, totalWordCount: 5 },
        '2': { count: 1, avgTitleLength: 1, totalWordCount: 1 },
      },
    });
  });

  it('falls back to the generated dataset when the remote source fails', async () => {
    const recordSourceClient = sourceReturning({ success: false, message: 'Request failed: timeout of 1000ms exceeded' });
    const job = await createJob('fallback-run', recordSourceClient);

    await expect(job.run()).resolves.toBe(0);

    expect(recordSourceClient.fetchRecords).toHaveBeenCalledWith(10);
    const rows = await readCsvRows(join(outputDir, 'processed_data_fallback-run.csv'));
    expect(rows.map((row) => row.groupId)).toEqual(['1', '2', '3', '1', '2', '3', '1', '2', '3', '1']);

    expect(await readReport('fallback-run')).toMatchObject({
      summary: { totalRecords: 10, uniqueGroups: 3, avgTitleLength: 19.1, totalWordCount: 70, minTitleLength: 19, maxTitleLength: 20 },
      breakdown: {
        '1': { count: 4, avgTitleLength: 19.25, totalWordCount: 28 },
        '2': { count: 3, avgTitleLength: 19, totalWordCount: 21 },
        '3': { count: 3, avgTitleLength: 19, totalWordCount: 21 },
      },
    });
  });

  it('replaces the output of an earlier run with the same execution id', async () => {
    const firstJob = await createJob('rerun', sourceReturning({ success: true, data: EXAMPLE_RECORDS }));
    await expect(firstJob.run()).resolves.toBe(0);
    await moduleFixture?.close();

    const secondJob = await createJob('rerun', sourceReturning({ success: false, message: 'Unexpected status 502' }));
    await expect(secondJob.run()).resolves.toBe(0);

    const files = (await readdir(outputDir)).filter((name) => name.includes('_rerun.'));
    expect(files.sort()).toEqual(['analysis_rerun.json', 'processed_data_rerun.csv']);
    await expect(readCsvRows(join(outputDir, 'processed_data_rerun.csv'))).resolves.toHaveLength(10);
    expect(await readReport('rerun')).toMatchObject({ summary: { totalRecords: 10 } });
  });

  it('exits with 1 when persisting fails', async () => {
    const persister: IPersister = { persist: jest.fn().mockRejectedValue(new Error('disk full')) };
    const job = await createJob('failed-run', sourceReturning({ success: true, data: EXAMPLE_RECORDS }), persister);

    await expect(job.run()).resolves.toBe(1);
    expect(persister.persist).toHaveBeenCalledTimes(1);
  });

  it('exits with 1 for an execution id that cannot name output files', async () => {
    const job = await createJob('bad/id', sourceReturning({ success: true, data: EXAMPLE_RECORDS }));

    await expect(job.run()).resolves.toBe(1);
  });
});
