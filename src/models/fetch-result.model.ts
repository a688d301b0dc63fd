export type FetchResult<T> =
  | { success: true; data: T }
  | { success: false; message: string };
