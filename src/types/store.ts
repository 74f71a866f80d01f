/**
 * Store-related types for Zustand state management
 */

import type { SettingsSlice } from "@/stores/slices/settingsSlice";
import type { SyncSlice } from "@/stores/slices/syncSlice";
import type { StateCreator } from "zustand/vanilla";

/**
 * Combined store state. New slices are added here.
 */
export interface StoreState extends SyncSlice, SettingsSlice {}

/**
 * Slice creator receiving the full store's set/get
 */
export type SliceCreator<T> = StateCreator<StoreState, [], [], T>;
