/**
 * Test data fixtures for unit and integration tests
 *
 * Shapes follow the server's /api/me/progress payloads and the sync core's
 * ProgressRecord.
 */

import type { ApiMediaProgress } from "@/types/api";
import type { ProgressRecord } from "@/types/progress";

// 2024-01-01T00:00:00Z
export const BASE_TIMESTAMP = 1704067200000;

export const mockApiMediaProgress: ApiMediaProgress = {
  id: "progress-1",
  libraryItemId: "li-1",
  episodeId: null,
  duration: 3600,
  progress: 0.5,
  currentTime: 1800,
  isFinished: false,
  hideFromContinueListening: false,
  lastUpdate: BASE_TIMESTAMP,
  startedAt: BASE_TIMESTAMP - 86400000,
  finishedAt: null,
};

export function makeProgressRecord(overrides: Partial<ProgressRecord> = {}): ProgressRecord {
  return {
    itemId: "li-1",
    elapsedSeconds: 120,
    lastUpdate: BASE_TIMESTAMP,
    pendingUpload: true,
    ...overrides,
  };
}
