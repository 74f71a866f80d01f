/**
 * Progress Sync Service
 *
 * Reconciles locally tracked playback positions with the server:
 * - Single item: fetch the server record, resolve by lastUpdate, then either
 *   adopt the server value or upload the local one
 * - Batch: walk every pending record in order and report a SyncResult
 *
 * Nothing here throws to the caller. Failures become false / error strings,
 * are logged, and are emitted as events for the UI layer.
 */

import { getErrorMessage, toError } from "@/lib/helpers/errors";
import { logger } from "@/lib/logger";
import { retryWithBackoff, type SleepFn } from "@/lib/retry";
import type { SyncConfig } from "@/lib/config";
import type {
  LocalStore,
  ProgressRecord,
  ProgressSyncEvents,
  RemoteProgressClient,
  SyncNotifier,
  SyncResult,
} from "@/types/progress";
import AsyncLock from "async-lock";
import EventEmitter from "eventemitter3";
import { resolveProgressConflict } from "./conflictResolver";
import { RetryingUploader } from "./RetryingUploader";

const log = logger.forTag("ProgressSyncService");

const BATCH_LOCK_KEY = "sync-all";

export interface ProgressSyncServiceDeps {
  remote: RemoteProgressClient;
  store: LocalStore;
  config: Pick<SyncConfig, "maxRetries" | "baseDelayMs">;
  uploader?: RetryingUploader;
  notifier?: SyncNotifier;
  sleep?: SleepFn;
  /** Read before notifying; notifications are on when omitted */
  shouldShowErrorNotifications?: () => Promise<boolean>;
}

export class ProgressSyncService extends EventEmitter<ProgressSyncEvents> {
  private readonly remote: RemoteProgressClient;
  private readonly store: LocalStore;
  private readonly config: Pick<SyncConfig, "maxRetries" | "baseDelayMs">;
  private readonly uploader: RetryingUploader;
  private readonly notifier?: SyncNotifier;
  private readonly sleep?: SleepFn;
  private readonly shouldShowErrorNotifications: () => Promise<boolean>;

  private lock = new AsyncLock();
  private abortController = new AbortController();

  constructor(deps: ProgressSyncServiceDeps) {
    super();
    this.remote = deps.remote;
    this.store = deps.store;
    this.config = deps.config;
    this.sleep = deps.sleep;
    this.notifier = deps.notifier;
    this.shouldShowErrorNotifications = deps.shouldShowErrorNotifications ?? (async () => true);
    this.uploader =
      deps.uploader ??
      new RetryingUploader({
        remote: deps.remote,
        store: deps.store,
        policy: deps.config,
        sleep: deps.sleep,
      });
  }

  /**
   * Store a new local playback position, pending upload
   */
  async recordLocalProgress(
    itemId: string,
    elapsedSeconds: number,
    lastUpdate: number = Date.now()
  ): Promise<ProgressRecord> {
    if (!itemId) {
      throw new Error("itemId is required");
    }
    if (!Number.isFinite(elapsedSeconds) || elapsedSeconds < 0) {
      throw new Error(`Invalid playback position for ${itemId}: ${elapsedSeconds}`);
    }
    if (!Number.isSafeInteger(lastUpdate) || lastUpdate < 0) {
      throw new Error(`Invalid lastUpdate for ${itemId}: ${lastUpdate}`);
    }

    const record: ProgressRecord = { itemId, elapsedSeconds, lastUpdate, pendingUpload: true };
    await this.store.put(record);
    log.debug(`Recorded local progress for ${itemId}: ${elapsedSeconds}s`);
    return record;
  }

  /**
   * Sync one item outside of a batch. A failure raises a user notification
   * when the setting allows it.
   */
  async syncItem(local: ProgressRecord): Promise<boolean> {
    const synced = await this.runPipeline(local, this.abortController.signal);
    if (!synced) {
      await this.notifyFailure(local.itemId);
    }
    return synced;
  }

  /**
   * Sync every pending record, one at a time. Concurrent calls queue behind
   * the running batch.
   */
  async syncAllPending(): Promise<SyncResult> {
    return this.lock.acquire<SyncResult>(BATCH_LOCK_KEY, () => this.runBatch());
  }

  /**
   * Abandon backoff waits of everything currently in flight. Syncs started
   * afterwards are unaffected.
   */
  cancel(): void {
    log.info("Cancelling in-flight sync work");
    this.abortController.abort();
    this.abortController = new AbortController();
  }

  private async runBatch(): Promise<SyncResult> {
    const result: SyncResult = { successCount: 0, failureCount: 0, errors: [] };
    const signal = this.abortController.signal;

    let pending: ProgressRecord[];
    try {
      pending = await this.store.listPending();
    } catch (error) {
      log.error("Failed to list pending items", toError(error));
      result.errors.push(`Failed to list pending items: ${getErrorMessage(error)}`);
      this.safeEmit(() => this.emit("batchCompleted", { result }));
      return result;
    }

    log.info(`Syncing ${pending.length} pending item(s)`);
    this.safeEmit(() => this.emit("batchStarted", { pendingCount: pending.length }));

    for (const record of pending) {
      let failure: string | null = null;
      try {
        const synced = await this.runPipeline(record, signal);
        if (synced) {
          await this.store.markSynced(record.itemId, record.lastUpdate);
          result.successCount++;
          this.safeEmit(() => this.emit("itemSynced", { itemId: record.itemId }));
        } else {
          failure = `Failed to sync ${record.itemId}`;
        }
      } catch (error) {
        log.error(`Error syncing ${record.itemId}`, toError(error));
        failure = `Error syncing ${record.itemId}: ${getErrorMessage(error)}`;
      }

      if (failure !== null) {
        result.failureCount++;
        result.errors.push(failure);
        await this.recordFailure(record.itemId, failure);
        const error = failure;
        this.safeEmit(() => this.emit("itemFailed", { itemId: record.itemId, error }));
      }
    }

    log.info(`Batch sync finished: ${result.successCount} succeeded, ${result.failureCount} failed`);
    this.safeEmit(() => this.emit("batchCompleted", { result }));
    return result;
  }

  private async runPipeline(local: ProgressRecord, signal: AbortSignal): Promise<boolean> {
    const fetched = await retryWithBackoff(() => this.remote.fetch(local.itemId), {
      maxRetries: this.config.maxRetries,
      baseDelayMs: this.config.baseDelayMs,
      label: `Fetch progress for ${local.itemId}`,
      sleep: this.sleep,
      signal,
    });

    if (!fetched.ok) {
      log.warn(`Could not fetch server progress for ${local.itemId}: ${getErrorMessage(fetched.error)}`);
      return false;
    }

    const remote = fetched.value;
    if (remote === null) {
      log.debug(`No server progress for ${local.itemId}, uploading local`);
      return this.uploader.uploadWithRetry(local, signal);
    }

    const decision = resolveProgressConflict(local, remote);
    log.debug(
      `${local.itemId}: local ${local.lastUpdate} vs remote ${remote.lastUpdate} -> ${decision}`
    );

    if (decision === "adopt-remote") {
      try {
        await this.store.put({ ...remote, pendingUpload: false });
        return true;
      } catch (error) {
        log.error(`Failed to store server progress for ${local.itemId}`, toError(error));
        return false;
      }
    }

    return this.uploader.uploadWithRetry(local, signal);
  }

  private async recordFailure(itemId: string, error: string): Promise<void> {
    try {
      await this.store.recordSyncFailure(itemId, error);
    } catch (recordError) {
      log.error(`Failed to record sync failure for ${itemId}`, toError(recordError));
    }
  }

  private async notifyFailure(itemId: string): Promise<void> {
    if (!this.notifier) return;
    try {
      if (await this.shouldShowErrorNotifications()) {
        this.notifier.notify(`Failed to sync progress for ${itemId}`);
      }
    } catch (error) {
      log.error(`Failed to notify sync failure for ${itemId}`, toError(error));
    }
  }

  // Listener errors must not break the sync loop
  private safeEmit(emit: () => void): void {
    try {
      emit();
    } catch (error) {
      log.error("Progress sync event listener threw", toError(error));
    }
  }
}
