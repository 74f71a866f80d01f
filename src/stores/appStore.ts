/**
 * Main Zustand store combining all slices
 *
 * Vanilla (framework-free) store; a UI layer subscribes through
 * store.subscribe or zustand's useStore.
 */

import type { AppDatabase } from "@/db/client";
import type { ProgressSyncService } from "@/services/progressSync/ProgressSyncService";
import type { ProgressSyncEvents } from "@/types/progress";
import type { StoreState } from "@/types/store";
import { createStore, type StoreApi } from "zustand/vanilla";

import { createSettingsSlice } from "./slices/settingsSlice";
import { createSyncSlice } from "./slices/syncSlice";

export type AppStore = StoreApi<StoreState>;

export function createAppStore(db: AppDatabase): AppStore {
  const settingsSlice = createSettingsSlice(db);

  return createStore<StoreState>()((...args) => ({
    // Sync slice
    ...createSyncSlice(...args),

    // Settings slice
    ...settingsSlice(...args),
  }));
}

/**
 * Mirror sync service events into the store
 * @returns Function that removes the listeners
 */
export function bindProgressSyncEvents(service: ProgressSyncService, store: AppStore): () => void {
  const onBatchStarted: ProgressSyncEvents["batchStarted"] = ({ pendingCount }) =>
    store.getState().markSyncStarted(pendingCount);
  const onBatchCompleted: ProgressSyncEvents["batchCompleted"] = ({ result }) =>
    store.getState().markSyncCompleted(result);
  const onItemFailed: ProgressSyncEvents["itemFailed"] = ({ itemId, error }) =>
    store.getState().recordSyncItemFailure(itemId, error);

  service.on("batchStarted", onBatchStarted);
  service.on("batchCompleted", onBatchCompleted);
  service.on("itemFailed", onItemFailed);

  return () => {
    service.off("batchStarted", onBatchStarted);
    service.off("batchCompleted", onBatchCompleted);
    service.off("itemFailed", onItemFailed);
  };
}
