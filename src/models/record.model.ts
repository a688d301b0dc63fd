export interface RawRecord {
  id: number;
  title?: string | null;
  body?: string | null;
  groupId: number;
}

export interface DerivedRecord {
  id: number;
  title: string;
  body: string;
  groupId: number;
  processedAt: Date;
  titleLength: number;
  wordCount: number;
}
