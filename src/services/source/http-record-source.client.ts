import { Injectable, Logger } from '@nestjs/common';
import axios, { AxiosInstance } from 'axios';
import { IRecordSourceClient } from '../../interfaces/record-source-client.interface';
import { FetchResult } from '../../models/fetch-result.model';
import { RawRecord } from '../../models/record.model';
import { SourceConfig } from '../../config/configuration';

@Injectable()
export class HttpRecordSourceClient implements IRecordSourceClient {
  private readonly logger = new Logger(HttpRecordSourceClient.name);
  private readonly httpClient: AxiosInstance;

  constructor(
    private readonly sourceConfig: SourceConfig,
    httpClient?: AxiosInstance,
  ) {
    this.httpClient = httpClient ?? axios.create({
      timeout: sourceConfig.timeout,
      headers: {
        Accept: 'application/json',
      },
    });
  }

  async fetchRecords(limit: number): Promise<FetchResult<RawRecord[]>> {
    try {
      this.logger.log(`Requesting up to ${limit} records from ${this.sourceConfig.url}`);

      // Non-2xx responses resolve and are reported below
      const response = await this.httpClient.get<unknown>(this.sourceConfig.url, {
        timeout: this.sourceConfig.timeout,
        validateStatus: () => true,
      });

      if (response.status < 200 || response.status >= 300) {
        return { success: false, message: `Unexpected status ${response.status}` };
      }

      if (!Array.isArray(response.data)) {
        return { success: false, message: 'Malformed payload: expected a JSON array' };
      }

      const records: RawRecord[] = [];
      const items: unknown[] = response.data.slice(0, limit);
      for (let i = 0; i < items.length; i++) {
        const record = toRawRecord(items[i]);
        if (!record) {
          return { success: false, message: `Malformed payload: invalid record at index ${i}` };
        }
        records.push(record);
      }

      this.logger.debug(`Received ${response.data.length} records, keeping ${records.length}`);
      return { success: true, data: records };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return { success: false, message: `Request failed: ${reason}` };
    }
  }
}

function isOptionalText(value: unknown): value is string | null | undefined {
  return value === undefined || value === null || typeof value === 'string';
}

function isInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value);
}

function isGroupId(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0;
}

/** Maps one payload element to a RawRecord; `userId` becomes `groupId`. */
export function toRawRecord(item: unknown): RawRecord | null {
  if (typeof item !== 'object' || item === null || !('id' in item) || !('userId' in item)) {
    return null;
  }

  const { id, userId } = item;
  const title = 'title' in item ? item.title : undefined;
  const body = 'body' in item ? item.body : undefined;

  if (!isInteger(id) || !isGroupId(userId) || !isOptionalText(title) || !isOptionalText(body)) {
    return null;
  }

  return { id, title, body, groupId: userId };
}
