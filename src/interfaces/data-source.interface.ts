import { RawRecord } from '../models/record.model';

export interface IDataSource {
  /** Resolves with remote records, or with the fallback dataset when the remote source fails. */
  fetch(limit: number): Promise<RawRecord[]>;
}
