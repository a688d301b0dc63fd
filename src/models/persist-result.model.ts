export interface PersistResult {
  csvPath: string;
  jsonPath: string;
  csvBytes: number;
  jsonBytes: number;
}
