import { FetchResult } from '../models/fetch-result.model';
import { RawRecord } from '../models/record.model';

export interface IRecordSourceClient {
  fetchRecords(limit: number): Promise<FetchResult<RawRecord[]>>;
}
