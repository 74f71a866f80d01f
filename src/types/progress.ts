/**
 * Progress synchronization types
 *
 * These types describe listening progress as the sync core sees it, together
 * with the collaborator interfaces the core depends on. Concrete
 * implementations live in services/progressSync.
 */

/**
 * Playback position for a single library item.
 */
export interface ProgressRecord {
  /** Library item identifier (stable, non-empty) */
  itemId: string;
  /** Playback position in seconds */
  elapsedSeconds: number;
  /** Epoch milliseconds of the last change; higher wins */
  lastUpdate: number;
  /** True until the server has confirmed this value */
  pendingUpload: boolean;
}

/**
 * Outcome of comparing a local record with the server's record.
 */
export type SyncDecision = "keep-local-and-upload" | "adopt-remote";

/**
 * Aggregate result of one batch sync pass.
 */
export interface SyncResult {
  successCount: number;
  failureCount: number;
  /** One entry per failure, in the order failures occurred */
  errors: string[];
}

/**
 * Server side of progress sync. Implementations make a single attempt and
 * never retry on their own.
 */
export interface RemoteProgressClient {
  /**
   * Fetch the server's record for an item.
   * Resolves to null when the server has no progress for the item yet and
   * rejects on transport or response failures.
   */
  fetch(itemId: string): Promise<ProgressRecord | null>;
  /** Push a record. Resolves true when the server accepted it. */
  push(record: ProgressRecord): Promise<boolean>;
}

/**
 * Local persistence for progress records. Every operation is atomic per record.
 */
export interface LocalStore {
  get(itemId: string): Promise<ProgressRecord | null>;
  /**
   * Store a record. A confirmed record (pendingUpload false) must not replace
   * one with a newer lastUpdate.
   */
  put(record: ProgressRecord): Promise<void>;
  /** Records flagged pendingUpload, in a stable order */
  listPending(): Promise<ProgressRecord[]>;
  /**
   * Clear pendingUpload. Marking an already synced item is a no-op, and so is
   * marking one whose lastUpdate is newer than syncedLastUpdate.
   */
  markSynced(itemId: string, syncedLastUpdate?: number): Promise<void>;
  /** Bookkeeping for a failed sync attempt; leaves the record pending */
  recordSyncFailure(itemId: string, error: string): Promise<void>;
}

/**
 * User-facing transient notifications (toasts, banners, etc.).
 */
export interface SyncNotifier {
  notify(message: string): void;
}

/**
 * Events emitted by ProgressSyncService.
 */
export interface ProgressSyncEvents {
  batchStarted: (payload: { pendingCount: number }) => void;
  batchCompleted: (payload: { result: SyncResult }) => void;
  itemSynced: (payload: { itemId: string }) => void;
  itemFailed: (payload: { itemId: string; error: string }) => void;
}
