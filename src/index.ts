/**
 * Progress sync entry point
 *
 * createProgressSync() wires the pieces together:
 * - Progress database (migrations applied on open)
 * - API client for the library server
 * - Progress sync service with its retrying uploader
 * - App store mirroring sync status and settings
 */

import { openDatabase, type DatabaseHandle } from "@/db/client";
import { getShowSyncErrorNotifications } from "@/lib/appSettings";
import { resolveSyncConfig, type SyncConfig } from "@/lib/config";
import { logger } from "@/lib/logger";
import { ApiClientService } from "@/services/ApiClientService";
import { ApiProgressClient } from "@/services/progressSync/ApiProgressClient";
import { DrizzleProgressStore } from "@/services/progressSync/DrizzleProgressStore";
import { ProgressSyncService } from "@/services/progressSync/ProgressSyncService";
import { RetryingUploader } from "@/services/progressSync/RetryingUploader";
import { bindProgressSyncEvents, createAppStore, type AppStore } from "@/stores/appStore";
import type { SyncNotifier } from "@/types/progress";

const log = logger.forTag("ProgressSync");

export interface CreateProgressSyncOptions {
  baseUrl: string;
  accessToken?: string | null;
  /** SQLite file for progress and settings; ":memory:" for a throwaway database */
  databasePath?: string;
  notifier?: SyncNotifier;
  config?: Partial<SyncConfig>;
}

export interface ProgressSync {
  service: ProgressSyncService;
  store: AppStore;
  apiClient: ApiClientService;
  database: DatabaseHandle;
  config: SyncConfig;
  /** Cancel in-flight work, detach listeners and close the database */
  close(): void;
}

export function createProgressSync(options: CreateProgressSyncOptions): ProgressSync {
  const config = resolveSyncConfig(options.config);
  log.info(
    `Starting progress sync: maxRetries=${config.maxRetries}, baseDelayMs=${config.baseDelayMs}, timeoutMs=${config.timeoutMs}`
  );

  const database = openDatabase(options.databasePath);
  const apiClient = new ApiClientService({
    baseUrl: options.baseUrl,
    accessToken: options.accessToken,
    timeout: config.timeoutMs,
  });

  const remote = new ApiProgressClient(apiClient);
  const localStore = new DrizzleProgressStore(database.db);
  const uploader = new RetryingUploader({ remote, store: localStore, policy: config });

  const service = new ProgressSyncService({
    remote,
    store: localStore,
    config,
    uploader,
    notifier: options.notifier,
    shouldShowErrorNotifications: () => getShowSyncErrorNotifications(database.db),
  });

  const store = createAppStore(database.db);
  const unbind = bindProgressSyncEvents(service, store);

  return {
    service,
    store,
    apiClient,
    database,
    config,
    close: () => {
      service.cancel();
      unbind();
      database.close();
      log.info("Progress sync closed");
    },
  };
}

export { resolveProgressConflict } from "@/services/progressSync/conflictResolver";
export { ApiClientService, ApiProgressClient, DrizzleProgressStore, ProgressSyncService, RetryingUploader };
export { retryWithBackoff, getBackoffDelay, RetryAbortedError } from "@/lib/retry";
export { logger } from "@/lib/logger";
export type { RetryOutcome, RetryPolicy } from "@/lib/retry";
export type {
  LocalStore,
  ProgressRecord,
  ProgressSyncEvents,
  RemoteProgressClient,
  SyncDecision,
  SyncNotifier,
  SyncResult,
} from "@/types/progress";
export type { SyncConfig };
export type { AppStore };
