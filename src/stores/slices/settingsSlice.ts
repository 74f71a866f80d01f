/**
 * Settings slice for Zustand store
 *
 * Holds user preferences that affect syncing and persists changes to the
 * app_settings table.
 */

import type { AppDatabase } from "@/db/client";
import { getShowSyncErrorNotifications, setShowSyncErrorNotifications } from "@/lib/appSettings";
import { toError } from "@/lib/helpers/errors";
import { logger } from "@/lib/logger";
import type { SliceCreator } from "@/types/store";

// Create cached sublogger for this slice
const log = logger.forTag("SettingsSlice");

/**
 * Settings slice state interface - scoped under 'settings' to avoid conflicts
 */
export interface SettingsSliceState {
  settings: {
    /** Whether failed standalone syncs notify the user */
    showSyncErrorNotifications: boolean;
    /** Whether the slice has been initialized */
    initialized: boolean;
    /** Whether settings are currently being loaded */
    isLoading: boolean;
  };
}

export interface SettingsSliceActions {
  /** Initialize the slice by loading settings from storage */
  initializeSettings: () => Promise<void>;
  /** Toggle sync error notifications */
  updateShowSyncErrorNotifications: (enabled: boolean) => Promise<void>;
  /** Reset the slice to initial state */
  resetSettings: () => void;
}

export interface SettingsSlice extends SettingsSliceState, SettingsSliceActions {}

const DEFAULT_SETTINGS = {
  showSyncErrorNotifications: true,
};

const initialState: SettingsSliceState = {
  settings: {
    ...DEFAULT_SETTINGS,
    initialized: false,
    isLoading: false,
  },
};

export function createSettingsSlice(db: AppDatabase): SliceCreator<SettingsSlice> {
  return (set, get) => ({
    ...initialState,

    initializeSettings: async () => {
      if (get().settings.initialized) {
        log.debug("Settings already initialized, skipping");
        return;
      }

      log.info("Initializing settings slice...");
      set((state) => ({
        ...state,
        settings: {
          ...state.settings,
          isLoading: true,
        },
      }));

      const showSyncErrorNotifications = await getShowSyncErrorNotifications(db);

      set((state) => ({
        ...state,
        settings: {
          showSyncErrorNotifications,
          initialized: true,
          isLoading: false,
        },
      }));
      log.info(`Settings loaded: showSyncErrorNotifications=${showSyncErrorNotifications}`);
    },

    updateShowSyncErrorNotifications: async (enabled: boolean) => {
      log.info(`Updating sync error notifications to ${enabled}`);

      // Capture previous value BEFORE optimistic update
      const previousValue = get().settings.showSyncErrorNotifications;

      set((state) => ({
        ...state,
        settings: {
          ...state.settings,
          showSyncErrorNotifications: enabled,
        },
      }));

      try {
        await setShowSyncErrorNotifications(db, enabled);
      } catch (error) {
        log.error("Failed to update sync error notifications", toError(error));

        // Revert on error
        set((state) => ({
          ...state,
          settings: {
            ...state.settings,
            showSyncErrorNotifications: previousValue,
          },
        }));

        throw error;
      }
    },

    resetSettings: () => {
      log.info("Resetting settings slice");
      set((state) => ({
        ...state,
        settings: {
          ...DEFAULT_SETTINGS,
          initialized: false,
          isLoading: false,
        },
      }));
    },
  });
}
