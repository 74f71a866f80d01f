/**
 * App Settings Module
 *
 * Manages user preferences stored in the app_settings table.
 */

import type { AppDatabase } from "@/db/client";
import { appSettings } from "@/db/schema/appSettings";
import { toError } from "@/lib/helpers/errors";
import { logger } from "@/lib/logger";
import { eq } from "drizzle-orm";

const log = logger.forTag("AppSettings");

const SETTINGS_KEYS = {
  showSyncErrorNotifications: "@app/showSyncErrorNotifications",
} as const;

type SettingKey = (typeof SETTINGS_KEYS)[keyof typeof SETTINGS_KEYS];

const DEFAULT_SHOW_SYNC_ERROR_NOTIFICATIONS = true;

async function getItem(db: AppDatabase, key: SettingKey): Promise<string | null> {
  const rows = await db.select().from(appSettings).where(eq(appSettings.key, key)).limit(1);
  return rows[0]?.value ?? null;
}

async function setItem(db: AppDatabase, key: SettingKey, value: string): Promise<void> {
  await db
    .insert(appSettings)
    .values({ key, value })
    .onConflictDoUpdate({ target: appSettings.key, set: { value } });
}

/**
 * Whether failed standalone syncs surface a notification to the user
 * Default: true
 */
export async function getShowSyncErrorNotifications(db: AppDatabase): Promise<boolean> {
  try {
    const value = await getItem(db, SETTINGS_KEYS.showSyncErrorNotifications);
    if (value === null) return DEFAULT_SHOW_SYNC_ERROR_NOTIFICATIONS;
    return value === "true";
  } catch (error) {
    log.error("Failed to get sync error notification setting", toError(error));
    return DEFAULT_SHOW_SYNC_ERROR_NOTIFICATIONS;
  }
}

export async function setShowSyncErrorNotifications(db: AppDatabase, enabled: boolean): Promise<void> {
  try {
    await setItem(db, SETTINGS_KEYS.showSyncErrorNotifications, enabled.toString());
  } catch (error) {
    log.error("Failed to save sync error notification setting", toError(error));
    throw error;
  }
}
