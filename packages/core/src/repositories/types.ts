import type { HistoryItem } from '../domain/schemas';

export interface HistoryRepository {
  append(item: HistoryItem): Promise<void>;
  /** Entries for one local day (YYYY-MM-DD), newest first. Defaults to today. */
  list(day?: string): Promise<HistoryItem[]>;
  search(term: string, limit?: number): Promise<HistoryItem[]>;
  /** Deletes days older than the retention window; returns the number of files removed. */
  cleanup(retentionDays: number, now?: number): Promise<number>;
}
