/**
 * Sync slice for Zustand store
 *
 * Mirrors the progress sync service's status for the UI:
 * - Whether a batch is running and how many items it covers
 * - The last batch result and when it finished
 * - The most recent failure message
 */

import { logger } from "@/lib/logger";
import type { SliceCreator } from "@/types/store";
import type { SyncResult } from "@/types/progress";

const log = logger.forTag("SyncSlice");

/**
 * Sync slice state interface - scoped under 'sync' to avoid conflicts
 */
export interface SyncSliceState {
  sync: {
    /** Whether a batch sync is running */
    isSyncing: boolean;
    /** Items in the running (or last) batch */
    pendingCount: number;
    lastResult: SyncResult | null;
    /** Epoch ms when the last batch finished */
    lastSyncAt: number | null;
    lastError: string | null;
  };
}

export interface SyncSliceActions {
  markSyncStarted: (pendingCount: number) => void;
  markSyncCompleted: (result: SyncResult, completedAt?: number) => void;
  recordSyncItemFailure: (itemId: string, error: string) => void;
  resetSync: () => void;
}

export interface SyncSlice extends SyncSliceState, SyncSliceActions {}

const initialState: SyncSliceState = {
  sync: {
    isSyncing: false,
    pendingCount: 0,
    lastResult: null,
    lastSyncAt: null,
    lastError: null,
  },
};

export const createSyncSlice: SliceCreator<SyncSlice> = (set) => ({
  ...initialState,

  markSyncStarted: (pendingCount: number) => {
    set((state) => ({
      ...state,
      sync: {
        ...state.sync,
        isSyncing: true,
        pendingCount,
        lastError: null,
      },
    }));
  },

  markSyncCompleted: (result: SyncResult, completedAt: number = Date.now()) => {
    log.debug(`Sync completed: ${result.successCount} ok, ${result.failureCount} failed`);
    set((state) => ({
      ...state,
      sync: {
        ...state.sync,
        isSyncing: false,
        lastResult: { ...result, errors: [...result.errors] },
        lastSyncAt: completedAt,
        lastError: result.errors.length > 0 ? result.errors[result.errors.length - 1] : null,
      },
    }));
  },

  recordSyncItemFailure: (itemId: string, error: string) => {
    log.debug(`Sync failed for ${itemId}`);
    set((state) => ({
      ...state,
      sync: {
        ...state.sync,
        lastError: error,
      },
    }));
  },

  resetSync: () => {
    set((state) => ({
      ...state,
      sync: { ...initialState.sync },
    }));
  },
});
