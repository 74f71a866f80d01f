import type { AppDatabase } from '@/db/client';
import { mediaProgress, type MediaProgressRow, type NewMediaProgressRow } from '@/db/schema/mediaProgress';
import type { ApiMediaProgress } from '@/types/api';
import type { ProgressRecord } from '@/types/progress';
import { and, asc, eq, lte, sql } from 'drizzle-orm';

export function toProgressRecord(row: MediaProgressRow): ProgressRecord {
  return {
    itemId: row.libraryItemId,
    elapsedSeconds: row.currentTime,
    lastUpdate: row.lastUpdate,
    pendingUpload: row.pendingUpload,
  };
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

// Server progress is always confirmed, so pendingUpload is false.
// Throws on payloads that cannot describe a position.
export function marshalProgressRecordFromApi(data: ApiMediaProgress): ProgressRecord {
  if (typeof data?.libraryItemId !== 'string' || data.libraryItemId === '') {
    throw new Error('Malformed media progress: missing libraryItemId');
  }
  if (!isFiniteNumber(data.currentTime) || data.currentTime < 0) {
    throw new Error(`Malformed media progress for ${data.libraryItemId}: invalid currentTime`);
  }
  if (!isFiniteNumber(data.lastUpdate)) {
    throw new Error(`Malformed media progress for ${data.libraryItemId}: invalid lastUpdate`);
  }

  return {
    itemId: data.libraryItemId,
    elapsedSeconds: data.currentTime,
    lastUpdate: data.lastUpdate,
    pendingUpload: false,
  };
}

export async function getMediaProgress(db: AppDatabase, libraryItemId: string): Promise<ProgressRecord | null> {
  const results = await db
    .select()
    .from(mediaProgress)
    .where(eq(mediaProgress.libraryItemId, libraryItemId))
    .limit(1);

  return results[0] ? toProgressRecord(results[0]) : null;
}

/**
 * Insert or replace the position for an item. Writing a confirmed record
 * (pendingUpload false) also clears the failure bookkeeping, and never
 * replaces a row with a newer lastUpdate.
 */
export async function upsertMediaProgress(db: AppDatabase, record: ProgressRecord): Promise<void> {
  const now = new Date();
  const row: NewMediaProgressRow = {
    libraryItemId: record.itemId,
    currentTime: record.elapsedSeconds,
    lastUpdate: record.lastUpdate,
    pendingUpload: record.pendingUpload,
    updatedAt: now,
  };
  if (!record.pendingUpload) {
    row.syncAttempts = 0;
    row.syncError = null;
  }

  await db
    .insert(mediaProgress)
    .values(row)
    .onConflictDoUpdate({
      target: mediaProgress.libraryItemId,
      set: row,
      setWhere: record.pendingUpload ? undefined : lte(mediaProgress.lastUpdate, record.lastUpdate),
    });
}

/**
 * All rows awaiting upload, oldest change first
 */
export async function getPendingMediaProgress(db: AppDatabase): Promise<ProgressRecord[]> {
  const rows = await db
    .select()
    .from(mediaProgress)
    .where(eq(mediaProgress.pendingUpload, true))
    .orderBy(asc(mediaProgress.lastUpdate), asc(mediaProgress.libraryItemId));

  return rows.map(toProgressRecord);
}

// Only touches pending rows, so repeating the call leaves the row unchanged.
// With syncedLastUpdate, a row changed after that point stays pending.
export async function markMediaProgressSynced(
  db: AppDatabase,
  libraryItemId: string,
  syncedLastUpdate?: number
): Promise<void> {
  const conditions = [eq(mediaProgress.libraryItemId, libraryItemId), eq(mediaProgress.pendingUpload, true)];
  if (syncedLastUpdate !== undefined) {
    conditions.push(lte(mediaProgress.lastUpdate, syncedLastUpdate));
  }

  await db
    .update(mediaProgress)
    .set({
      pendingUpload: false,
      syncAttempts: 0,
      syncError: null,
      updatedAt: new Date(),
    })
    .where(and(...conditions));
}

export async function recordMediaProgressSyncFailure(
  db: AppDatabase,
  libraryItemId: string,
  error: string
): Promise<void> {
  const now = new Date();

  await db
    .update(mediaProgress)
    .set({
      syncAttempts: sql`${mediaProgress.syncAttempts} + 1`,
      lastSyncAttempt: now,
      syncError: error,
      updatedAt: now,
    })
    .where(eq(mediaProgress.libraryItemId, libraryItemId));
}

export async function getMediaProgressRow(
  db: AppDatabase,
  libraryItemId: string
): Promise<MediaProgressRow | null> {
  const results = await db
    .select()
    .from(mediaProgress)
    .where(eq(mediaProgress.libraryItemId, libraryItemId))
    .limit(1);

  return results[0] ?? null;
}
