import type { AppDatabase } from "@/db/client";
import {
  getMediaProgress,
  getPendingMediaProgress,
  markMediaProgressSynced,
  recordMediaProgressSyncFailure,
  upsertMediaProgress,
} from "@/db/helpers/mediaProgress";
import type { LocalStore, ProgressRecord } from "@/types/progress";

/**
 * LocalStore backed by the media_progress table
 */
export class DrizzleProgressStore implements LocalStore {
  constructor(private readonly db: AppDatabase) {}

  get(itemId: string): Promise<ProgressRecord | null> {
    return getMediaProgress(this.db, itemId);
  }

  put(record: ProgressRecord): Promise<void> {
    return upsertMediaProgress(this.db, record);
  }

  listPending(): Promise<ProgressRecord[]> {
    return getPendingMediaProgress(this.db);
  }

  markSynced(itemId: string, syncedLastUpdate?: number): Promise<void> {
    return markMediaProgressSynced(this.db, itemId, syncedLastUpdate);
  }

  recordSyncFailure(itemId: string, error: string): Promise<void> {
    return recordMediaProgressSyncFailure(this.db, itemId, error);
  }
}
